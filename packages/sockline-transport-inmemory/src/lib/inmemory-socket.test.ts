import { describe, it, expect } from '@effect/vitest';
import { Effect, pipe } from 'effect';
import {
  SocketInitError,
  initialize,
  makeExecutor,
  readAtLeast,
  socketIoError,
  write,
} from '@sockline/transport';
import { makeInMemoryConnectionPair, makeInMemorySocket, makeSocketPair } from './inmemory-socket';

const bytes = (text: string) => new TextEncoder().encode(text);
const text = (buffer: Uint8Array) => new TextDecoder().decode(buffer);

describe('In-memory socket pair', () => {
  it.effect('should deliver gathered writes to the other end in order', () =>
    Effect.gen(function* () {
      const [left, right] = yield* makeSocketPair();
      const buffer = new Uint8Array(16);

      yield* left.writeAll([bytes('abc'), bytes('de')]);
      const first = yield* right.readSome(buffer);
      const second = yield* right.readSome(buffer.subarray(first));

      expect(text(buffer.subarray(0, first + second))).toBe('abcde');
    })
  );

  it.effect('should not share buffers with the writer', () =>
    Effect.gen(function* () {
      const [left, right] = yield* makeSocketPair();
      const segment = bytes('keep');
      const buffer = new Uint8Array(4);

      yield* left.writeAll([segment]);
      segment.fill(0);
      yield* right.readSome(buffer);

      expect(text(buffer)).toBe('keep');
    })
  );

  it.effect('should end the peer input when one end closes', () =>
    Effect.gen(function* () {
      const [left, right] = yield* makeSocketPair();
      const buffer = new Uint8Array(8);

      yield* left.writeAll([bytes('bye')]);
      yield* left.close;

      const count = yield* right.readSome(buffer);
      const endOfStream = yield* Effect.flip(right.readSome(buffer));
      const peerWrite = yield* Effect.flip(right.writeAll([bytes('late')]));
      const localRead = yield* Effect.flip(left.readSome(buffer));

      expect(text(buffer.subarray(0, count))).toBe('bye');
      expect(endOfStream.reason).toBe('eof');
      expect(peerWrite).toMatchObject({ reason: 'closed', message: 'Peer closed the connection' });
      expect(localRead.reason).toBe('closed');
    })
  );
});

describe('In-memory socket capability', () => {
  it.effect('should be a plain socket that initializes immediately', () =>
    Effect.gen(function* () {
      const [left] = yield* makeSocketPair();
      const capability = makeInMemorySocket(left);

      yield* capability.init;

      expect(capability.isSecure).toBe(false);
    })
  );

  it.effect('should inject init and write failures', () =>
    Effect.gen(function* () {
      const [left] = yield* makeSocketPair();
      const initFailure = new SocketInitError({ reason: 'socket', message: 'refused' });
      const capability = makeInMemorySocket(left, {
        failInit: initFailure,
        failWrites: socketIoError.io('write refused')(undefined),
      });

      const initError = yield* Effect.flip(capability.init);
      const writeError = yield* pipe(
        capability.getSocket,
        Effect.flatMap((socket) => socket.writeAll([bytes('x')])),
        Effect.flip
      );

      expect(initError).toBe(initFailure);
      expect(writeError).toMatchObject({ reason: 'io', message: 'write refused' });
    })
  );
});

describe('In-memory connection pair', () => {
  it.scoped('should carry bytes between client and server connections', () =>
    Effect.gen(function* () {
      const executor = yield* makeExecutor({ name: 'pair' });
      const { client, server } = yield* makeInMemoryConnectionPair(executor);
      const buffer = new Uint8Array(5);

      yield* initialize(client);
      yield* initialize(server);
      yield* write(client, [bytes('he'), bytes('llo')]);
      const count = yield* readAtLeast(server, 5, buffer);

      expect(client.isServer).toBe(false);
      expect(server.isServer).toBe(true);
      expect(count).toBe(5);
      expect(text(buffer)).toBe('hello');
    })
  );

  it.scoped('should fail the peer read once a connection shuts down', () =>
    Effect.gen(function* () {
      const executor = yield* makeExecutor();
      const { client, server } = yield* makeInMemoryConnectionPair(executor);

      yield* server.shutdown;
      const error = yield* Effect.flip(readAtLeast(client, 1, new Uint8Array(4)));

      expect(error).toMatchObject({
        _tag: 'PassThroughError',
        operation: 'read',
        cause: { reason: 'eof' },
      });
    })
  );
});
