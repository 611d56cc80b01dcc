import { Duplex, PassThrough } from 'node:stream';
import { describe, it, expect } from '@effect/vitest';
import { Effect, pipe } from 'effect';
import {
  initialize,
  makeExecutor,
  makeTransportConnection,
  readAtLeast,
  silentLogSinks,
  write,
  type SocketCapability,
} from '@sockline/transport';
import { makePlainSocket } from './plain-socket';

const makeDuplexPair = (): readonly [Duplex, Duplex] => {
  const leftToRight = new PassThrough();
  const rightToLeft = new PassThrough();
  return [
    Duplex.from({ readable: rightToLeft, writable: leftToRight }),
    Duplex.from({ readable: leftToRight, writable: rightToLeft }),
  ];
};

const bytes = (text: string) => new TextEncoder().encode(text);

const connectionOver = (socket: SocketCapability, isServer: boolean) =>
  pipe(
    Effect.all({
      executor: makeExecutor(),
      connection: makeTransportConnection({ isServer, socket, sinks: silentLogSinks }),
    }),
    Effect.tap(({ connection, executor }) => connection.initAsio(executor)),
    Effect.tap(({ connection }) => initialize(connection)),
    Effect.map(({ connection }) => connection)
  );

describe('Plain Node socket', () => {
  it.scopedLive('should carry gathered writes across a duplex', () =>
    Effect.gen(function* () {
      const [left, right] = makeDuplexPair();
      const client = yield* connectionOver(yield* makePlainSocket(left), false);
      const server = yield* connectionOver(yield* makePlainSocket(right), true);
      const buffer = new Uint8Array(16);

      yield* write(client, [bytes('ping '), bytes('pong')]);
      const count = yield* readAtLeast(server, 9, buffer);

      expect(client.isSecure).toBe(false);
      expect(new TextDecoder().decode(buffer.subarray(0, count))).toBe('ping pong');
    })
  );

  it.scopedLive('should fail reads once the peer ends the stream', () =>
    Effect.gen(function* () {
      const [left, right] = makeDuplexPair();
      const server = yield* connectionOver(yield* makePlainSocket(right), true);

      left.end(bytes('last'));
      const buffer = new Uint8Array(8);
      const error = yield* Effect.flip(readAtLeast(server, 8, buffer));

      expect(error).toMatchObject({
        _tag: 'PassThroughError',
        operation: 'read',
        cause: { reason: 'eof' },
      });
      expect(new TextDecoder().decode(buffer.subarray(0, 4))).toBe('last');
    })
  );

  it.live('should destroy the duplex on shutdown', () =>
    Effect.gen(function* () {
      const [left] = makeDuplexPair();
      const capability = yield* makePlainSocket(left);

      yield* capability.shutdown;
      const socket = yield* capability.getSocket;
      const readError = yield* Effect.flip(socket.readSome(new Uint8Array(4)));
      const writeError = yield* Effect.flip(socket.writeAll([bytes('late')]));

      expect(left.destroyed).toBe(true);
      expect(readError.reason).toBe('closed');
      expect(writeError.reason).toBe('closed');
    })
  );
});
