/**
 * Effect Adapters
 *
 * The handler API as plain Effects, for protocol layers that prefer `yield*` over callbacks.
 * Completion still happens on the connection's executor; the calling fiber only waits for it.
 * The waiting fiber must not be a task of that executor: its worker would block on a handler
 * queued behind the task itself. Such calls die with BlockingOnExecutorError before any I/O.
 */

import { Deferred, Duration, Effect, Option, pipe } from 'effect';
import { blockingOnExecutor, type SocketInitError, type TransportError } from './errors';
import type { TransportConnection } from './transport-connection';

const completeWith =
  <A, E>(deferred: Deferred.Deferred<A, E>, value: A) =>
  (error: Option.Option<E>): Effect.Effect<void> =>
    pipe(
      Option.match(error, {
        onNone: () => Deferred.succeed(deferred, value),
        onSome: (failure) => Deferred.fail(deferred, failure),
      }),
      Effect.asVoid
    );

const awaitCompletion =
  (connection: TransportConnection, operation: string) =>
  <A, E>(issue: Effect.Effect<Deferred.Deferred<A, E>>): Effect.Effect<A, E> =>
    pipe(
      connection.isOnExecutor,
      Effect.flatMap((onExecutor) =>
        onExecutor ? Effect.die(blockingOnExecutor(operation)) : issue
      ),
      Effect.flatMap(Deferred.await)
    );

/**
 * Read until at least `minBytes` bytes are in `buffer`. Succeeds with the number transferred.
 */
export const readAtLeast = (
  connection: TransportConnection,
  minBytes: number,
  buffer: Uint8Array
): Effect.Effect<number, TransportError> =>
  pipe(
    Deferred.make<number, TransportError>(),
    Effect.tap((deferred) =>
      connection.asyncReadAtLeast(minBytes, buffer, (error, bytesTransferred) =>
        completeWith(deferred, bytesTransferred)(error)
      )
    ),
    awaitCompletion(connection, 'readAtLeast')
  );

export const write = (
  connection: TransportConnection,
  data: Uint8Array | ReadonlyArray<Uint8Array>
): Effect.Effect<void, TransportError> =>
  pipe(
    Deferred.make<void, TransportError>(),
    Effect.tap((deferred) => connection.asyncWrite(data, completeWith(deferred, undefined))),
    awaitCompletion(connection, 'write')
  );

/**
 * Wait on a connection timer. Interrupting the waiting fiber cancels the timer.
 */
export const sleep = (
  connection: TransportConnection,
  duration: Duration.DurationInput
): Effect.Effect<void, TransportError> =>
  pipe(
    connection.isOnExecutor,
    Effect.flatMap((onExecutor) =>
      onExecutor
        ? Effect.die(blockingOnExecutor('sleep'))
        : Effect.scoped(
            pipe(
              Deferred.make<void, TransportError>(),
              Effect.tap((deferred) =>
                connection.setTimerScoped(duration, completeWith(deferred, undefined))
              ),
              Effect.flatMap(Deferred.await)
            )
          )
    )
  );

export const initialize = (
  connection: TransportConnection
): Effect.Effect<void, SocketInitError> =>
  pipe(
    Deferred.make<void, SocketInitError>(),
    Effect.tap((deferred) => connection.init(completeWith(deferred, undefined))),
    awaitCompletion(connection, 'initialize')
  );
