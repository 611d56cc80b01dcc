/**
 * Transport Connection
 *
 * Adapts a socket capability and an executor into the operations a connection protocol layer
 * drives: init, read at least N bytes, scatter-gather write, one-shot timers, posting work,
 * and shutdown.
 *
 * Every operation returns as soon as it is issued. Results are delivered to the caller's
 * handler exactly once, always through the executor, so a handler never runs on the fiber
 * that issued the operation and never runs concurrently with another handler of the same
 * connection.
 *
 * Buffers handed to `asyncReadAtLeast` and `asyncWrite` belong to the caller. The connection
 * keeps views on them, not copies: they must stay valid and unmodified until the handler runs.
 */

import {
  Cause,
  Duration,
  Effect,
  Either,
  Exit,
  Fiber,
  Option,
  Ref,
  Scope,
  pipe,
} from 'effect';
import {
  ActionAfterShutdownError,
  InvalidNumBytesError,
  OperationAbortedError,
  SocketInitError,
  SocketIoError,
  WriteInProgressError,
  executorAlreadyBound,
  executorNotBound,
  passThrough,
  type TransportError,
} from './errors';
import type { Executor } from './executor';
import type { ConnectionHandle } from './handle';
import type { LogSinks } from './log';
import type { SocketCapability, StreamSocket } from './socket';

// =============================================================================
// Handler Types
// =============================================================================

export type InitHandler = (error: Option.Option<SocketInitError>) => Effect.Effect<void>;

export type ReadHandler = (
  error: Option.Option<TransportError>,
  bytesTransferred: number
) => Effect.Effect<void>;

export type WriteHandler = (error: Option.Option<TransportError>) => Effect.Effect<void>;

export type TimerHandler = (error: Option.Option<TransportError>) => Effect.Effect<void>;

export type TcpInitHandler = (handle: Option.Option<ConnectionHandle>) => Effect.Effect<void>;

export interface TimerHandle {
  /**
   * Cancel the wait. The timer's handler receives OperationAbortedError unless it already fired.
   */
  readonly cancel: Effect.Effect<void>;
}

// =============================================================================
// Connection Contract
// =============================================================================

export interface TransportConnection {
  readonly isServer: boolean;
  readonly isSecure: boolean;

  readonly initAsio: (executor: Executor) => Effect.Effect<void>;
  readonly setTcpInitHandler: (handler: TcpInitHandler) => Effect.Effect<void>;
  readonly getHandle: Effect.Effect<Option.Option<ConnectionHandle>>;
  readonly setHandle: (handle: ConnectionHandle) => Effect.Effect<void>;

  readonly init: (handler: InitHandler) => Effect.Effect<void>;
  readonly asyncReadAtLeast: (
    minBytes: number,
    buffer: Uint8Array,
    handler: ReadHandler
  ) => Effect.Effect<void>;
  readonly asyncWrite: (
    data: Uint8Array | ReadonlyArray<Uint8Array>,
    handler: WriteHandler
  ) => Effect.Effect<void>;
  readonly setTimer: (
    duration: Duration.DurationInput,
    handler: TimerHandler
  ) => Effect.Effect<TimerHandle>;
  /**
   * A timer cancelled when the surrounding scope closes.
   */
  readonly setTimerScoped: (
    duration: Duration.DurationInput,
    handler: TimerHandler
  ) => Effect.Effect<TimerHandle, never, Scope.Scope>;
  readonly interrupt: (work: Effect.Effect<void>) => Effect.Effect<void>;
  readonly dispatch: (work: Effect.Effect<void>) => Effect.Effect<void>;
  readonly shutdown: Effect.Effect<void>;

  /**
   * True only inside a task run by the executor this connection is bound to.
   */
  readonly isOnExecutor: Effect.Effect<boolean>;

  /**
   * Segments of the write currently in flight. Empty when no write is outstanding.
   */
  readonly pendingWrites: Effect.Effect<ReadonlyArray<Uint8Array>>;
}

export interface TransportConnectionOptions {
  readonly isServer: boolean;
  readonly socket: SocketCapability;
  readonly sinks: LogSinks;
}

// =============================================================================
// Internal State
// =============================================================================

interface ConnectionState {
  readonly executor: Option.Option<Executor>;
  readonly handle: Option.Option<ConnectionHandle>;
  readonly tcpInitHandler: Option.Option<TcpInitHandler>;
  readonly pendingWrites: ReadonlyArray<Uint8Array>;
  readonly writeInFlight: boolean;
  readonly isShutdown: boolean;
}

interface ConnectionContext {
  readonly isServer: boolean;
  readonly socket: SocketCapability;
  readonly sinks: LogSinks;
  readonly stateRef: Ref.Ref<ConnectionState>;
}

const initialState: ConnectionState = {
  executor: Option.none(),
  handle: Option.none(),
  tcpInitHandler: Option.none(),
  pendingWrites: [],
  writeInFlight: false,
  isShutdown: false,
};

const requireExecutor = (
  ctx: ConnectionContext,
  operation: string
): Effect.Effect<readonly [Executor, ConnectionState]> =>
  pipe(
    Ref.get(ctx.stateRef),
    Effect.flatMap((state) =>
      Option.match(state.executor, {
        onNone: () => Effect.die(executorNotBound(operation)),
        onSome: (executor) => Effect.succeed([executor, state] as const),
      })
    )
  );

const describeIoError = (error: SocketIoError) => `${error.reason} (${error.message})`;

// =============================================================================
// Initialization
// =============================================================================

const bindExecutor =
  (ctx: ConnectionContext) =>
  (executor: Executor): Effect.Effect<void> =>
    pipe(
      Ref.modify(ctx.stateRef, (state): readonly [boolean, ConnectionState] =>
        Option.isSome(state.executor)
          ? [false, state]
          : [true, { ...state, executor: Option.some(executor) }]
      ),
      Effect.flatMap((bound) => (bound ? Effect.void : Effect.die(executorAlreadyBound()))),
      Effect.zipRight(ctx.sinks.access.write('devel', 'transport connection initAsio')),
      Effect.zipRight(ctx.socket.initAsio(executor, ctx.isServer))
    );

const runTcpInitHandler = (ctx: ConnectionContext): Effect.Effect<void> =>
  pipe(
    Ref.get(ctx.stateRef),
    Effect.flatMap((state) =>
      Option.match(state.tcpInitHandler, {
        onNone: () => Effect.void,
        onSome: (handler) =>
          pipe(
            handler(state.handle),
            Effect.catchAllCause((cause) =>
              ctx.sinks.error.write('library', `tcp init handler failed: ${Cause.pretty(cause)}`)
            )
          ),
      })
    )
  );

const initOutcome = (exit: Exit.Exit<void, SocketInitError>): Option.Option<SocketInitError> =>
  Exit.match(exit, {
    onSuccess: () => Option.none(),
    onFailure: (cause) =>
      pipe(
        Cause.failureOption(cause),
        Option.orElse(() =>
          Option.some(
            new SocketInitError({
              reason: 'socket',
              message: 'Socket initialization failed',
              cause: Cause.squash(cause),
            })
          )
        )
      ),
  });

const completeInit =
  (ctx: ConnectionContext, executor: Executor, handler: InitHandler) =>
  (exit: Exit.Exit<void, SocketInitError>): Effect.Effect<void> =>
    executor.post(pipe(runTcpInitHandler(ctx), Effect.zipRight(handler(initOutcome(exit)))));

const init =
  (ctx: ConnectionContext) =>
  (handler: InitHandler): Effect.Effect<void> =>
    pipe(
      requireExecutor(ctx, 'init'),
      Effect.tap(() => ctx.sinks.access.write('devel', 'transport connection init')),
      Effect.flatMap(([executor]) =>
        executor.fork(
          pipe(ctx.socket.init, Effect.exit, Effect.flatMap(completeInit(ctx, executor, handler)))
        )
      ),
      Effect.asVoid
    );

// =============================================================================
// Read
// =============================================================================

const fillAtLeast = (
  socket: StreamSocket,
  buffer: Uint8Array,
  minBytes: number,
  transferred: Ref.Ref<number>
): Effect.Effect<void, SocketIoError> =>
  pipe(
    Ref.get(transferred),
    Effect.flatMap((total) =>
      total >= minBytes
        ? Effect.void
        : pipe(
            socket.readSome(buffer.subarray(total)),
            Effect.flatMap((count) => Ref.update(transferred, (current) => current + count)),
            Effect.flatMap(() => fillAtLeast(socket, buffer, minBytes, transferred))
          )
    )
  );

const completeRead =
  (ctx: ConnectionContext, executor: Executor, handler: ReadHandler, transferred: number) =>
  (result: Either.Either<void, SocketIoError>): Effect.Effect<void> =>
    Either.match(result, {
      onLeft: (error) =>
        pipe(
          ctx.sinks.error.write(
            'devel',
            `async_read_at_least error::pass_through Original Error: ${describeIoError(error)}`
          ),
          Effect.zipRight(executor.post(handler(Option.some(passThrough.read(error)), transferred)))
        ),
      onRight: () => executor.post(handler(Option.none(), transferred)),
    });

const performRead = (
  ctx: ConnectionContext,
  executor: Executor,
  minBytes: number,
  buffer: Uint8Array,
  handler: ReadHandler
): Effect.Effect<void> =>
  pipe(
    Ref.make(0),
    Effect.flatMap((transferred) =>
      pipe(
        ctx.socket.getSocket,
        Effect.flatMap((socket) => fillAtLeast(socket, buffer, minBytes, transferred)),
        Effect.catchAllDefect((defect) =>
          Effect.fail(new SocketIoError({ reason: 'io', message: 'Socket read failed', cause: defect }))
        ),
        Effect.either,
        Effect.flatMap((result) =>
          pipe(
            Ref.get(transferred),
            Effect.flatMap((count) => completeRead(ctx, executor, handler, count)(result))
          )
        )
      )
    )
  );

const rejectInvalidRead = (
  ctx: ConnectionContext,
  executor: Executor,
  minBytes: number,
  capacity: number,
  handler: ReadHandler
): Effect.Effect<void> =>
  pipe(
    ctx.sinks.error.write('devel', 'async_read_at_least error::invalid_num_bytes'),
    Effect.zipRight(
      executor.post(
        handler(Option.some(new InvalidNumBytesError({ requested: minBytes, capacity })), 0)
      )
    )
  );

const asyncReadAtLeast =
  (ctx: ConnectionContext) =>
  (minBytes: number, buffer: Uint8Array, handler: ReadHandler): Effect.Effect<void> =>
    pipe(
      requireExecutor(ctx, 'asyncReadAtLeast'),
      Effect.tap(() => ctx.sinks.access.write('devel', `async_read_at_least: ${minBytes}`)),
      Effect.flatMap(([executor, state]) => {
        if (minBytes > buffer.length) {
          return rejectInvalidRead(ctx, executor, minBytes, buffer.length, handler);
        }
        if (state.isShutdown) {
          return executor.post(
            handler(Option.some(new ActionAfterShutdownError({ operation: 'read' })), 0)
          );
        }
        return pipe(executor.fork(performRead(ctx, executor, minBytes, buffer, handler)), Effect.asVoid);
      })
    );

// =============================================================================
// Write
// =============================================================================

type WriteAdmission =
  | { readonly _tag: 'Admitted'; readonly segments: ReadonlyArray<Uint8Array> }
  | { readonly _tag: 'Rejected'; readonly error: TransportError };

const toSegments = (data: Uint8Array | ReadonlyArray<Uint8Array>): ReadonlyArray<Uint8Array> =>
  data instanceof Uint8Array ? [data] : data;

const admitWrite =
  (segments: ReadonlyArray<Uint8Array>) =>
  (state: ConnectionState): readonly [WriteAdmission, ConnectionState] => {
    if (state.isShutdown) {
      return [
        { _tag: 'Rejected', error: new ActionAfterShutdownError({ operation: 'write' }) },
        state,
      ];
    }
    if (state.writeInFlight) {
      return [
        {
          _tag: 'Rejected',
          error: new WriteInProgressError({ pendingSegments: state.pendingWrites.length }),
        },
        state,
      ];
    }
    const pendingWrites = [...state.pendingWrites, ...segments];
    return [
      { _tag: 'Admitted', segments: pendingWrites },
      { ...state, pendingWrites, writeInFlight: true },
    ];
  };

const clearPendingWrites = (ctx: ConnectionContext): Effect.Effect<void> =>
  Ref.update(ctx.stateRef, (state) => ({ ...state, pendingWrites: [], writeInFlight: false }));

const writeOutcome = (
  ctx: ConnectionContext,
  result: Either.Either<void, SocketIoError>
): Effect.Effect<Option.Option<TransportError>> =>
  Either.match(result, {
    onLeft: (error) =>
      pipe(
        ctx.sinks.error.write(
          'devel',
          `async_write error::pass_through Original Error: ${describeIoError(error)}`
        ),
        Effect.as(Option.some<TransportError>(passThrough.write(error)))
      ),
    onRight: () => Effect.succeed(Option.none()),
  });

const performWrite = (
  ctx: ConnectionContext,
  executor: Executor,
  segments: ReadonlyArray<Uint8Array>,
  handler: WriteHandler
): Effect.Effect<void> =>
  pipe(
    ctx.socket.getSocket,
    Effect.flatMap((socket) => socket.writeAll(segments)),
    Effect.catchAllDefect((defect) =>
      Effect.fail(new SocketIoError({ reason: 'io', message: 'Socket write failed', cause: defect }))
    ),
    Effect.either,
    Effect.flatMap((result) => writeOutcome(ctx, result)),
    Effect.flatMap((error) =>
      executor.post(pipe(clearPendingWrites(ctx), Effect.zipRight(handler(error))))
    )
  );

const rejectWrite = (
  ctx: ConnectionContext,
  executor: Executor,
  error: TransportError,
  handler: WriteHandler
): Effect.Effect<void> =>
  pipe(
    error._tag === 'WriteInProgressError'
      ? ctx.sinks.error.write('library', 'async_write issued while another write is in flight')
      : Effect.void,
    Effect.zipRight(executor.post(handler(Option.some(error))))
  );

const asyncWrite =
  (ctx: ConnectionContext) =>
  (data: Uint8Array | ReadonlyArray<Uint8Array>, handler: WriteHandler): Effect.Effect<void> =>
    pipe(
      requireExecutor(ctx, 'asyncWrite'),
      Effect.flatMap(([executor]) =>
        pipe(
          Ref.modify(ctx.stateRef, admitWrite(toSegments(data))),
          Effect.flatMap((admission) =>
            admission._tag === 'Admitted'
              ? pipe(
                  executor.fork(performWrite(ctx, executor, admission.segments, handler)),
                  Effect.asVoid
                )
              : rejectWrite(ctx, executor, admission.error, handler)
          )
        )
      )
    );

// =============================================================================
// Timers
// =============================================================================

const completeTimer =
  (ctx: ConnectionContext, executor: Executor, handler: TimerHandler) =>
  (exit: Exit.Exit<void>): Effect.Effect<void> =>
    Exit.match(exit, {
      onSuccess: () => executor.post(handler(Option.none())),
      onFailure: (cause) =>
        Cause.isInterruptedOnly(cause)
          ? executor.post(handler(Option.some(new OperationAbortedError({ operation: 'timer' }))))
          : pipe(
              ctx.sinks.error.write(
                'devel',
                `async_wait error::pass_through Original Error: ${Cause.pretty(cause)}`
              ),
              Effect.zipRight(
                executor.post(handler(Option.some(passThrough.timer(Cause.squash(cause)))))
              )
            ),
    });

const setTimer =
  (ctx: ConnectionContext) =>
  (duration: Duration.DurationInput, handler: TimerHandler): Effect.Effect<TimerHandle> =>
    pipe(
      requireExecutor(ctx, 'setTimer'),
      Effect.flatMap(([executor]) =>
        pipe(
          Effect.sleep(duration),
          Effect.interruptible,
          Effect.exit,
          Effect.flatMap(completeTimer(ctx, executor, handler)),
          executor.fork,
          // the wait fiber starts uninterruptible so a cancel that arrives first still reports
          Effect.uninterruptible
        )
      ),
      Effect.map((fiber) => ({ cancel: pipe(Fiber.interrupt(fiber), Effect.asVoid) }))
    );

const setTimerScoped =
  (ctx: ConnectionContext) =>
  (
    duration: Duration.DurationInput,
    handler: TimerHandler
  ): Effect.Effect<TimerHandle, never, Scope.Scope> =>
    Effect.acquireRelease(setTimer(ctx)(duration, handler), (timer) => timer.cancel);

// =============================================================================
// Posting & Shutdown
// =============================================================================

const post =
  (ctx: ConnectionContext, operation: 'interrupt' | 'dispatch') =>
  (work: Effect.Effect<void>): Effect.Effect<void> =>
    pipe(
      requireExecutor(ctx, operation),
      Effect.flatMap(([executor]) => executor.post(work))
    );

const shutdown = (ctx: ConnectionContext): Effect.Effect<void> =>
  pipe(
    Ref.modify(ctx.stateRef, (state): readonly [boolean, ConnectionState] => [
      !state.isShutdown,
      { ...state, isShutdown: true },
    ]),
    Effect.flatMap((first) =>
      first
        ? pipe(
            ctx.sinks.access.write('devel', 'transport connection shutdown'),
            Effect.zipRight(ctx.socket.shutdown)
          )
        : Effect.void
    )
  );

// =============================================================================
// Construction
// =============================================================================

const buildConnection = (ctx: ConnectionContext): TransportConnection => ({
  isServer: ctx.isServer,
  isSecure: ctx.socket.isSecure,
  initAsio: bindExecutor(ctx),
  setTcpInitHandler: (handler) =>
    Ref.update(ctx.stateRef, (state) => ({ ...state, tcpInitHandler: Option.some(handler) })),
  getHandle: pipe(
    Ref.get(ctx.stateRef),
    Effect.map((state) => state.handle)
  ),
  setHandle: (handle) =>
    Ref.update(ctx.stateRef, (state) => ({ ...state, handle: Option.some(handle) })),
  init: init(ctx),
  asyncReadAtLeast: asyncReadAtLeast(ctx),
  asyncWrite: asyncWrite(ctx),
  setTimer: setTimer(ctx),
  setTimerScoped: setTimerScoped(ctx),
  interrupt: post(ctx, 'interrupt'),
  dispatch: post(ctx, 'dispatch'),
  shutdown: shutdown(ctx),
  isOnExecutor: pipe(
    Ref.get(ctx.stateRef),
    Effect.flatMap((state) =>
      Option.match(state.executor, {
        onNone: () => Effect.succeed(false),
        onSome: (executor) => executor.isCurrent,
      })
    )
  ),
  pendingWrites: pipe(
    Ref.get(ctx.stateRef),
    Effect.map((state) => state.pendingWrites)
  ),
});

/**
 * Create a transport connection over a socket capability.
 * The connection is inert until `initAsio` binds it to an executor.
 */
export const makeTransportConnection = (
  options: TransportConnectionOptions
): Effect.Effect<TransportConnection> =>
  pipe(
    Ref.make(initialState),
    Effect.map((stateRef) =>
      buildConnection({
        isServer: options.isServer,
        socket: options.socket,
        sinks: options.sinks,
        stateRef,
      })
    ),
    Effect.tap(() => options.sinks.access.write('devel', 'transport connection constructor'))
  );
