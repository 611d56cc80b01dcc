/**
 * @sockline/transport
 *
 * Asynchronous socket transport for Effect.
 * Adapts a plain or secure socket and an executor into the operation set a connection
 * protocol layer needs: init, read at least N bytes, gathered writes, one-shot timers,
 * posting work to the executor, and shutdown.
 *
 * Concrete sockets live in their own packages:
 * `@sockline/transport-inmemory`, `@sockline/transport-node` and `@sockline/transport-platform`.
 */

// Transport connection
export {
  makeTransportConnection,
  type TransportConnection,
  type TransportConnectionOptions,
  type InitHandler,
  type ReadHandler,
  type WriteHandler,
  type TimerHandler,
  type TcpInitHandler,
  type TimerHandle,
} from './lib/transport-connection';

// Effect adapters
export { readAtLeast, write, sleep, initialize } from './lib/effect-adapters';

// Executor
export { makeExecutor, type Executor, type ExecutorOptions } from './lib/executor';

// Socket contracts
export type { SocketCapability, StreamSocket } from './lib/socket';
export { makeChunkReader, type ChunkReader } from './lib/chunk-reader';

// Connection handles
export { ConnectionId, makeConnectionHandle, type ConnectionHandle } from './lib/handle';

// Errors
export {
  SocketIoError,
  SocketInitError,
  socketIoError,
  InvalidNumBytesError,
  PassThroughError,
  OperationAbortedError,
  ActionAfterShutdownError,
  WriteInProgressError,
  ExecutorNotBoundError,
  ExecutorAlreadyBoundError,
  BlockingOnExecutorError,
  transportErrorCode,
  type TransportError,
  type TransportErrorCode,
} from './lib/errors';

// Logging & configuration
export { ACCESS_LEVELS, ERROR_LEVELS, type AccessLevel, type ErrorLevel } from './lib/levels';
export {
  TransportLogSinks,
  TransportLogSinksLive,
  makeEffectLogSinks,
  silentLogSinks,
  type LogSink,
  type LogSinks,
} from './lib/log';
export {
  TransportLogConfig,
  TransportLogConfigLive,
  DefaultTransportLogConfig,
  makeTransportLogConfigLive,
  transportLogConfig,
  type TransportLogConfigService,
} from './lib/config';
