/**
 * Socket Capability Contracts
 *
 * What a transport connection needs from the socket underneath it. A capability may be plain
 * or encrypted; the connection only sees whether it is secure and, once set up, a byte stream.
 */

import type { Effect } from 'effect';
import type { SocketInitError, SocketIoError } from './errors';
import type { Executor } from './executor';

/**
 * A connected byte stream.
 */
export interface StreamSocket {
  /**
   * Read into `buffer`, completing once at least one byte arrived.
   * Never transfers more than `buffer.length` bytes.
   */
  readonly readSome: (buffer: Uint8Array) => Effect.Effect<number, SocketIoError>;
  /**
   * Write every segment, in order, as one gathered write.
   */
  readonly writeAll: (segments: ReadonlyArray<Uint8Array>) => Effect.Effect<void, SocketIoError>;
  readonly close: Effect.Effect<void>;
}

export interface SocketCapability {
  readonly isSecure: boolean;
  /**
   * Bind the capability to the executor its connection runs on.
   * Called once, before anything else.
   */
  readonly initAsio: (executor: Executor, isServer: boolean) => Effect.Effect<void>;
  /**
   * Connection specific setup, such as a TLS handshake.
   */
  readonly init: Effect.Effect<void, SocketInitError>;
  readonly getSocket: Effect.Effect<StreamSocket, SocketIoError>;
  /**
   * Close the underlying descriptor. Pending reads and writes fail.
   */
  readonly shutdown: Effect.Effect<void>;
}
