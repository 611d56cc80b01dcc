import { describe, it, expect } from '@effect/vitest';
import { Cause, Deferred, Effect, Exit, Fiber, Option, TestClock, pipe } from 'effect';
import { makeRecordingLogSinks, makeScriptedSocket, type ScriptedSocketOptions } from '../testing';
import {
  BlockingOnExecutorError,
  SocketInitError,
  socketIoError,
  type TransportError,
} from './errors';
import { initialize, readAtLeast, sleep, write } from './effect-adapters';
import { makeExecutor } from './executor';
import { makeTransportConnection } from './transport-connection';

const bytes = (text: string) => new TextEncoder().encode(text);

const connect = (options: ScriptedSocketOptions = {}) =>
  Effect.gen(function* () {
    const executor = yield* makeExecutor();
    const socket = yield* makeScriptedSocket(options);
    const logs = yield* makeRecordingLogSinks();
    const connection = yield* makeTransportConnection({
      isServer: true,
      socket: socket.capability,
      sinks: logs.sinks,
    });
    yield* connection.initAsio(executor);
    return { connection, socket };
  });

describe('Effect adapters', () => {
  it.scoped('should read into the buffer and succeed with the count', () =>
    Effect.gen(function* () {
      const { connection, socket } = yield* connect();
      const buffer = new Uint8Array(6);

      yield* socket.feed(bytes('ping'));
      const count = yield* readAtLeast(connection, 2, buffer);

      expect(count).toBe(4);
      expect(new TextDecoder().decode(buffer.subarray(0, count))).toBe('ping');
    })
  );

  it.scoped('should fail a read with the error its handler received', () =>
    pipe(
      connect(),
      Effect.flatMap(({ connection }) => readAtLeast(connection, 8, new Uint8Array(2))),
      Effect.flip,
      Effect.map((error) => {
        expect(error).toMatchObject({ _tag: 'InvalidNumBytesError', requested: 8, capacity: 2 });
      })
    )
  );

  it.scoped('should write gathered segments', () =>
    Effect.gen(function* () {
      const { connection, socket } = yield* connect();

      yield* write(connection, [bytes('he'), bytes('llo')]);

      const written = yield* socket.written;
      expect(written.map((segments) => segments.length)).toEqual([2]);
      expect(yield* connection.pendingWrites).toEqual([]);
    })
  );

  it.scoped('should fail a write the socket rejected', () =>
    pipe(
      connect({ failWrites: socketIoError.notConnected() }),
      Effect.flatMap(({ connection }) => write(connection, bytes('x'))),
      Effect.flip,
      Effect.map((error) => {
        expect(error).toMatchObject({ _tag: 'PassThroughError', operation: 'write' });
      })
    )
  );

  it.scoped('should sleep on a connection timer', () =>
    Effect.gen(function* () {
      const { connection } = yield* connect();

      const sleeper = yield* Effect.fork(sleep(connection, '3 seconds'));
      yield* Effect.yieldNow();
      yield* TestClock.adjust('3 seconds');

      expect(Exit.isSuccess(yield* Fiber.await(sleeper))).toBe(true);
    })
  );

  it.scoped('should stop waiting when the sleeping fiber is interrupted', () =>
    Effect.gen(function* () {
      const { connection } = yield* connect();

      const sleeper = yield* Effect.fork(sleep(connection, '3 seconds'));
      yield* Effect.yieldNow();
      const exit = yield* Fiber.interrupt(sleeper);

      expect(Exit.isInterrupted(exit)).toBe(true);
    })
  );

  it.scoped('should die instead of blocking the executor it runs on', () =>
    Effect.gen(function* () {
      const { connection, socket } = yield* connect();
      const result = yield* Deferred.make<Exit.Exit<void, TransportError>>();

      yield* connection.dispatch(
        pipe(
          write(connection, bytes('x')),
          Effect.exit,
          Effect.flatMap((exit) => Deferred.succeed(result, exit)),
          Effect.asVoid
        )
      );
      const exit = yield* Deferred.await(result);
      const defect = Exit.isFailure(exit) ? Cause.dieOption(exit.cause) : Option.none();

      expect(Option.getOrUndefined(defect)).toBeInstanceOf(BlockingOnExecutorError);
      expect(Option.getOrUndefined(defect)).toMatchObject({ operation: 'write' });
      expect(yield* socket.written).toEqual([]);

      yield* write(connection, bytes('y'));
      expect((yield* socket.written).length).toBe(1);
    })
  );

  it.scoped('should initialize and report init failures', () =>
    Effect.gen(function* () {
      const ready = yield* connect();
      yield* initialize(ready.connection);

      const failure = new SocketInitError({ reason: 'invalid_state', message: 'already closed' });
      const broken = yield* connect({ failInit: failure });
      const error = yield* Effect.flip(initialize(broken.connection));

      expect(error).toBe(failure);
      expect(Option.isNone(yield* broken.connection.getHandle)).toBe(true);
    })
  );
});
