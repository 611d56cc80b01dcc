import { Data } from 'effect';

// ============================================================================
// Socket Errors
// ============================================================================

/**
 * Failure reported by a byte stream while reading or writing.
 */
export class SocketIoError extends Data.TaggedError('SocketIoError')<{
  readonly reason: 'eof' | 'closed' | 'not_connected' | 'io';
  readonly message: string;
  readonly cause?: unknown;
}> {}

/**
 * Failure reported by a socket capability while it sets itself up
 * (for a secure socket, the TLS handshake).
 */
export class SocketInitError extends Data.TaggedError('SocketInitError')<{
  readonly reason: 'invalid_state' | 'tls_handshake_failed' | 'socket';
  readonly message: string;
  readonly cause?: unknown;
}> {}

export const socketIoError = {
  eof: () => new SocketIoError({ reason: 'eof', message: 'End of stream' }),
  closed: (message = 'Socket is closed') => new SocketIoError({ reason: 'closed', message }),
  notConnected: (message = 'Socket is not connected') =>
    new SocketIoError({ reason: 'not_connected', message }),
  io: (message: string) => (cause: unknown) => new SocketIoError({ reason: 'io', message, cause }),
};

// ============================================================================
// Transport Errors
// ============================================================================

export class InvalidNumBytesError extends Data.TaggedError('InvalidNumBytesError')<{
  readonly requested: number;
  readonly capacity: number;
}> {}

export class PassThroughError extends Data.TaggedError('PassThroughError')<{
  readonly operation: 'read' | 'write' | 'timer';
  readonly cause: unknown;
}> {}

export class OperationAbortedError extends Data.TaggedError('OperationAbortedError')<{
  readonly operation: 'timer';
}> {}

export class ActionAfterShutdownError extends Data.TaggedError('ActionAfterShutdownError')<{
  readonly operation: 'read' | 'write';
}> {}

export class WriteInProgressError extends Data.TaggedError('WriteInProgressError')<{
  readonly pendingSegments: number;
}> {}

/**
 * Every error a transport operation can hand to its completion handler.
 */
export type TransportError =
  | InvalidNumBytesError
  | PassThroughError
  | OperationAbortedError
  | ActionAfterShutdownError
  | WriteInProgressError;

export type TransportErrorCode =
  | 'invalid_num_bytes'
  | 'pass_through'
  | 'operation_aborted'
  | 'action_after_shutdown'
  | 'write_in_progress';

const errorCodes = {
  InvalidNumBytesError: 'invalid_num_bytes',
  PassThroughError: 'pass_through',
  OperationAbortedError: 'operation_aborted',
  ActionAfterShutdownError: 'action_after_shutdown',
  WriteInProgressError: 'write_in_progress',
} as const satisfies Record<TransportError['_tag'], TransportErrorCode>;

export const transportErrorCode = (error: TransportError): TransportErrorCode =>
  errorCodes[error._tag];

export const passThrough = {
  read: (cause: unknown) => new PassThroughError({ operation: 'read', cause }),
  write: (cause: unknown) => new PassThroughError({ operation: 'write', cause }),
  timer: (cause: unknown) => new PassThroughError({ operation: 'timer', cause }),
};

// ============================================================================
// Programmer Errors (raised as defects)
// ============================================================================

export class ExecutorNotBoundError extends Data.TaggedError('ExecutorNotBoundError')<{
  readonly operation: string;
  readonly message: string;
}> {}

export class ExecutorAlreadyBoundError extends Data.TaggedError('ExecutorAlreadyBoundError')<{
  readonly message: string;
}> {}

export class BlockingOnExecutorError extends Data.TaggedError('BlockingOnExecutorError')<{
  readonly operation: string;
  readonly message: string;
}> {}

export const executorNotBound = (operation: string) =>
  new ExecutorNotBoundError({
    operation,
    message: `${operation} called before initAsio bound an executor`,
  });

export const executorAlreadyBound = () =>
  new ExecutorAlreadyBoundError({
    message: 'initAsio called more than once on the same transport connection',
  });

export const blockingOnExecutor = (operation: string) =>
  new BlockingOnExecutorError({
    operation,
    message: `${operation} would wait on its own executor; issue the handler operation instead`,
  });
