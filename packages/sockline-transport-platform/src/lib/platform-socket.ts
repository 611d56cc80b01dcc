/**
 * Platform Socket
 *
 * A socket capability over any `@effect/platform` Socket, for example a WebSocket carrying a
 * byte tunnel (`Socket.makeWebSocket`). Incoming messages are treated as stream chunks with no
 * message boundaries; each gathered write sends one message per segment.
 *
 * `init` starts the socket's run fiber in the executor scope and completes once the socket is
 * open. Its writer is acquired in the same scope, so both end with the executor.
 */

import { Deferred, Effect, Fiber, Option, Ref, Scope, pipe } from 'effect';
import * as Socket from '@effect/platform/Socket';
import type { ReadonlyDeep } from 'type-fest';
import {
  SocketInitError,
  makeChunkReader,
  socketIoError,
  type ChunkReader,
  type Executor,
  type SocketCapability,
  type SocketIoError,
  type StreamSocket,
} from '@sockline/transport';

export type PlatformSocketOptions = ReadonlyDeep<{
  /**
   * Whether the socket underneath is encrypted, e.g. a `wss:` WebSocket.
   */
  secure?: boolean;
  /**
   * Close code sent when the connection shuts down.
   */
  closeCode?: number;
}>;

type SocketWriter = (
  chunk: Uint8Array | string | Socket.CloseEvent
) => Effect.Effect<void, Socket.SocketError>;

interface PlatformSocketState {
  readonly reader: ChunkReader;
  readonly executor: Ref.Ref<Option.Option<Executor>>;
  readonly started: Ref.Ref<boolean>;
  readonly stream: Ref.Ref<Option.Option<StreamSocket>>;
}

// =============================================================================
// Error Mapping
// =============================================================================

const toSocketIoError = (error: Socket.SocketError): SocketIoError =>
  Socket.SocketCloseError.is(error)
    ? socketIoError.closed(`Socket closed with code ${error.code}`)
    : socketIoError.io(`Socket ${error.reason.toLowerCase()} failed`)(error);

const openFailed = (error: Socket.SocketError) =>
  new SocketInitError({ reason: 'socket', message: 'Socket failed to open', cause: error });

// =============================================================================
// Run Fiber
// =============================================================================

const endInput =
  (reader: ChunkReader, opened: Deferred.Deferred<void, SocketInitError>) =>
  (error: Option.Option<Socket.SocketError>): Effect.Effect<void> =>
    Option.match(error, {
      onNone: () => Effect.sync(() => reader.end()),
      onSome: (failure) =>
        pipe(
          Deferred.fail(opened, openFailed(failure)),
          Effect.zipRight(Effect.sync(() => reader.end(toSocketIoError(failure))))
        ),
    });

const runSocket = (
  socket: Socket.Socket,
  reader: ChunkReader,
  opened: Deferred.Deferred<void, SocketInitError>
): Effect.Effect<void> =>
  pipe(
    socket.run((data) => Effect.sync(() => reader.push(data)), {
      onOpen: pipe(Deferred.succeed(opened, undefined), Effect.asVoid),
    }),
    Effect.matchEffect({
      onFailure: (error) => endInput(reader, opened)(Option.some(error)),
      onSuccess: () => endInput(reader, opened)(Option.none()),
    })
  );

// =============================================================================
// Stream
// =============================================================================

const writeSegments =
  (write: SocketWriter) =>
  (segments: ReadonlyArray<Uint8Array>): Effect.Effect<void, SocketIoError> =>
    pipe(
      Effect.forEach(segments, (segment) => write(segment), { discard: true }),
      Effect.mapError(toSocketIoError)
    );

const closeStream = (
  write: SocketWriter,
  reader: ChunkReader,
  runFiber: Fiber.RuntimeFiber<void>,
  closeCode: number
): Effect.Effect<void> =>
  pipe(
    Fiber.poll(runFiber),
    Effect.flatMap(
      Option.match({
        onSome: () => Effect.void,
        onNone: () =>
          pipe(write(new Socket.CloseEvent(closeCode)), Effect.timeout('1 second'), Effect.ignore),
      })
    ),
    Effect.zipRight(reader.close),
    Effect.zipRight(Fiber.interrupt(runFiber)),
    Effect.asVoid
  );

const makeStream = (
  write: SocketWriter,
  reader: ChunkReader,
  runFiber: Fiber.RuntimeFiber<void>,
  options: PlatformSocketOptions
): StreamSocket => ({
  readSome: reader.readSome,
  writeAll: writeSegments(write),
  close: closeStream(write, reader, runFiber, options.closeCode ?? 1000),
});

// =============================================================================
// Capability
// =============================================================================

const requireExecutor = (state: PlatformSocketState): Effect.Effect<Executor, SocketInitError> =>
  pipe(
    Ref.get(state.executor),
    Effect.flatMap(
      Option.match({
        onNone: () =>
          Effect.fail(
            new SocketInitError({
              reason: 'invalid_state',
              message: 'initAsio has not bound an executor',
            })
          ),
        onSome: Effect.succeed,
      })
    )
  );

const markStarted = (state: PlatformSocketState): Effect.Effect<void, SocketInitError> =>
  pipe(
    Ref.getAndSet(state.started, true),
    Effect.flatMap((alreadyStarted) =>
      alreadyStarted
        ? Effect.fail(
            new SocketInitError({
              reason: 'invalid_state',
              message: 'Socket has already been initialized',
            })
          )
        : Effect.void
    )
  );

const startSocket = (
  socket: Socket.Socket,
  state: PlatformSocketState,
  options: PlatformSocketOptions,
  executor: Executor
): Effect.Effect<void, SocketInitError> =>
  pipe(
    Effect.all({
      opened: Deferred.make<void, SocketInitError>(),
      write: Scope.extend(socket.writer, executor.scope),
    }),
    Effect.flatMap(({ opened, write }) =>
      pipe(
        executor.fork(runSocket(socket, state.reader, opened)),
        Effect.tap(() => Deferred.await(opened)),
        Effect.flatMap((runFiber) =>
          Ref.set(state.stream, Option.some(makeStream(write, state.reader, runFiber, options)))
        )
      )
    )
  );

const initPlatform = (
  socket: Socket.Socket,
  state: PlatformSocketState,
  options: PlatformSocketOptions
): Effect.Effect<void, SocketInitError> =>
  pipe(
    requireExecutor(state),
    Effect.tap(() => markStarted(state)),
    Effect.flatMap((executor) => startSocket(socket, state, options, executor))
  );

const buildCapability = (
  socket: Socket.Socket,
  state: PlatformSocketState,
  options: PlatformSocketOptions
): SocketCapability => ({
  isSecure: options.secure ?? false,
  initAsio: (executor: Executor) => Ref.set(state.executor, Option.some(executor)),
  init: initPlatform(socket, state, options),
  getSocket: pipe(
    Ref.get(state.stream),
    Effect.flatMap(
      Option.match({
        onNone: () => Effect.fail(socketIoError.notConnected('Socket has not been opened')),
        onSome: Effect.succeed,
      })
    )
  ),
  shutdown: pipe(
    Ref.get(state.stream),
    Effect.flatMap(
      Option.match({
        onNone: () => state.reader.close,
        onSome: (stream) => stream.close,
      })
    )
  ),
});

/**
 * A socket capability over an `@effect/platform` Socket. Nothing is opened until `init`.
 */
export const makePlatformSocket = (
  socket: Socket.Socket,
  options: PlatformSocketOptions = {}
): Effect.Effect<SocketCapability> =>
  pipe(
    Effect.all({
      reader: makeChunkReader(),
      executor: Ref.make(Option.none<Executor>()),
      started: Ref.make(false),
      stream: Ref.make(Option.none<StreamSocket>()),
    }),
    Effect.map((state) => buildCapability(socket, state, options))
  );
