/**
 * In-Memory Socket
 *
 * A connected pair of byte streams living in one process, and a plain socket capability over
 * either end. Bytes written on one end are read on the other in the order they were written,
 * with no framing: a gathered write may be read back in any split.
 *
 * Useful wherever a real descriptor is not: tests, simulations, and wiring two protocol layers
 * together inside one program.
 */

import { Effect, Option, Ref, Scope, pipe } from 'effect';
import {
  makeChunkReader,
  makeTransportConnection,
  silentLogSinks,
  socketIoError,
  type ChunkReader,
  type Executor,
  type LogSinks,
  type SocketCapability,
  type SocketInitError,
  type SocketIoError,
  type StreamSocket,
  type TransportConnection,
} from '@sockline/transport';

// =============================================================================
// Socket Pair
// =============================================================================

interface PairEnd {
  readonly inbound: ChunkReader;
  readonly closed: Ref.Ref<boolean>;
}

const copySegments = (segments: ReadonlyArray<Uint8Array>): ReadonlyArray<Uint8Array> =>
  segments.map((segment) => Uint8Array.from(segment));

const makePairStream = (local: PairEnd, remote: PairEnd): StreamSocket => ({
  readSome: local.inbound.readSome,
  writeAll: (segments) =>
    pipe(
      Effect.all([Ref.get(local.closed), Ref.get(remote.closed)]),
      Effect.flatMap(([localClosed, remoteClosed]) => {
        if (localClosed) {
          return Effect.fail(socketIoError.closed());
        }
        if (remoteClosed) {
          return Effect.fail(socketIoError.closed('Peer closed the connection'));
        }
        return Effect.sync(() => copySegments(segments).forEach(remote.inbound.push));
      })
    ),
  close: pipe(
    Ref.getAndSet(local.closed, true),
    Effect.flatMap((wasClosed) =>
      wasClosed
        ? Effect.void
        : pipe(
            local.inbound.close,
            Effect.zipRight(Effect.sync(() => remote.inbound.end()))
          )
    )
  ),
});

const makePairEnd = (): Effect.Effect<PairEnd> =>
  Effect.all({ inbound: makeChunkReader(), closed: Ref.make(false) });

/**
 * Two connected byte streams. Closing one end fails its own reads with `closed` and ends the
 * other end's input, so the peer reads `eof` once it has consumed what was already sent.
 */
export const makeSocketPair = (): Effect.Effect<readonly [StreamSocket, StreamSocket]> =>
  pipe(
    Effect.all([makePairEnd(), makePairEnd()]),
    Effect.map(([left, right]) => [makePairStream(left, right), makePairStream(right, left)] as const)
  );

// =============================================================================
// Socket Capability
// =============================================================================

export interface InMemorySocketOptions {
  /**
   * Make `init` fail with this error.
   */
  readonly failInit?: SocketInitError;
  /**
   * Make every write fail with this error.
   */
  readonly failWrites?: SocketIoError;
}

const withFailingWrites = (stream: StreamSocket, error: Option.Option<SocketIoError>): StreamSocket =>
  Option.match(error, {
    onNone: () => stream,
    onSome: (failure) => ({ ...stream, writeAll: () => Effect.fail(failure) }),
  });

/**
 * A plain socket capability over an in-memory stream. `init` has nothing to negotiate.
 */
export const makeInMemorySocket = (
  stream: StreamSocket,
  options: InMemorySocketOptions = {}
): SocketCapability => {
  const socket = withFailingWrites(stream, Option.fromNullable(options.failWrites));
  return {
    isSecure: false,
    initAsio: () => Effect.void,
    init: Option.match(Option.fromNullable(options.failInit), {
      onNone: () => Effect.void,
      onSome: Effect.fail,
    }),
    getSocket: Effect.succeed(socket),
    shutdown: socket.close,
  };
};

// =============================================================================
// Connection Pair
// =============================================================================

export interface InMemoryConnectionPairOptions {
  readonly sinks?: LogSinks;
  readonly client?: InMemorySocketOptions;
  readonly server?: InMemorySocketOptions;
}

export interface InMemoryConnectionPair {
  readonly client: TransportConnection;
  readonly server: TransportConnection;
}

const bindConnection = (
  executor: Executor,
  isServer: boolean,
  socket: SocketCapability,
  sinks: LogSinks
): Effect.Effect<TransportConnection> =>
  pipe(
    makeTransportConnection({ isServer, socket, sinks }),
    Effect.tap((connection) => connection.initAsio(executor))
  );

/**
 * A client and a server transport connection talking to each other, both bound to `executor`.
 * Both connections are shut down when the scope closes.
 */
export const makeInMemoryConnectionPair = (
  executor: Executor,
  options: InMemoryConnectionPairOptions = {}
): Effect.Effect<InMemoryConnectionPair, never, Scope.Scope> => {
  const sinks = options.sinks ?? silentLogSinks;
  return pipe(
    makeSocketPair(),
    Effect.flatMap(([clientEnd, serverEnd]) =>
      Effect.all({
        client: bindConnection(executor, false, makeInMemorySocket(clientEnd, options.client), sinks),
        server: bindConnection(executor, true, makeInMemorySocket(serverEnd, options.server), sinks),
      })
    ),
    Effect.tap(({ client, server }) =>
      Effect.addFinalizer(() => pipe(client.shutdown, Effect.zipRight(server.shutdown)))
    )
  );
};
