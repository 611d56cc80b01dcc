/**
 * Executor
 *
 * The scheduler a transport connection runs on. Work posted to an executor is queued and run
 * one task at a time by a single worker fiber, so completion handlers of the connections bound
 * to the same executor never interleave. Fibers that perform I/O or wait on timers are forked
 * into the executor's scope and end with it.
 */

import { Cause, Effect, Fiber, FiberRef, Option, Queue, Runtime, Scope, pipe } from 'effect';

// =============================================================================
// Contract
// =============================================================================

export interface Executor {
  readonly name: string;
  /**
   * Queue work to run on the worker fiber. Never runs it on the caller's fiber.
   */
  readonly post: (work: Effect.Effect<void>) => Effect.Effect<void>;
  /**
   * Same as `post`, for code that is not running inside an Effect fiber
   * (Node event listeners, other runtimes).
   */
  readonly unsafePost: (work: Effect.Effect<void>) => void;
  /**
   * True only while a task posted to this executor is running.
   */
  readonly isCurrent: Effect.Effect<boolean>;
  /**
   * Fork an effect into the executor's scope.
   */
  readonly fork: <A, E>(effect: Effect.Effect<A, E>) => Effect.Effect<Fiber.RuntimeFiber<A, E>>;
  readonly scope: Scope.Scope;
}

export interface ExecutorOptions {
  readonly name?: string;
}

// =============================================================================
// Implementation
// =============================================================================

const currentExecutor = FiberRef.unsafeMake<Option.Option<symbol>>(Option.none());

const runTask =
  (identity: symbol, name: string) =>
  (work: Effect.Effect<void>): Effect.Effect<void> =>
    pipe(
      work,
      Effect.catchAllCause((cause) =>
        Effect.logError(`Executor task failed: ${Cause.pretty(cause)}`)
      ),
      Effect.locally(currentExecutor, Option.some(identity)),
      Effect.annotateLogs({ executor: name })
    );

const startWorker = (
  queue: Queue.Dequeue<Effect.Effect<void>>,
  identity: symbol,
  name: string
): Effect.Effect<void, never, Scope.Scope> =>
  pipe(
    Queue.take(queue),
    Effect.flatMap(runTask(identity, name)),
    Effect.forever,
    Effect.forkScoped,
    Effect.asVoid
  );

const makeUnsafePost =
  (queue: Queue.Enqueue<Effect.Effect<void>>, runtime: Runtime.Runtime<never>, name: string) =>
  (work: Effect.Effect<void>): void => {
    if (!queue.unsafeOffer(work)) {
      Runtime.runFork(runtime)(
        Effect.logWarning(`Executor ${name} is shut down, dropping posted work`)
      );
    }
  };

const isCurrentExecutor = (identity: symbol): Effect.Effect<boolean> =>
  pipe(
    FiberRef.get(currentExecutor),
    Effect.map(Option.exists((current) => current === identity))
  );

const forkIn =
  (scope: Scope.Scope) =>
  <A, E>(effect: Effect.Effect<A, E>): Effect.Effect<Fiber.RuntimeFiber<A, E>> =>
    pipe(effect, Effect.locally(currentExecutor, Option.none()), Effect.forkIn(scope));

let executorCount = 0;

/**
 * Create an executor whose worker and forked fibers live as long as the current scope.
 */
export const makeExecutor = (
  options: ExecutorOptions = {}
): Effect.Effect<Executor, never, Scope.Scope> => {
  const name = options.name ?? `executor-${++executorCount}`;
  const identity = Symbol(name);

  return pipe(
    Effect.all({
      queue: Effect.acquireRelease(Queue.unbounded<Effect.Effect<void>>(), Queue.shutdown),
      runtime: Effect.runtime<never>(),
      scope: Effect.scope,
    }),
    Effect.tap(({ queue }) => startWorker(queue, identity, name)),
    Effect.map(({ queue, runtime, scope }) => {
      const unsafePost = makeUnsafePost(queue, runtime, name);
      return {
        name,
        post: (work: Effect.Effect<void>) => Effect.sync(() => unsafePost(work)),
        unsafePost,
        isCurrent: isCurrentExecutor(identity),
        fork: forkIn(scope),
        scope,
      };
    })
  );
};
