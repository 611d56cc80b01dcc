/**
 * Secure Socket
 *
 * A socket capability that runs a TLS handshake over an already connected `Duplex` when the
 * connection is initialized. The server or client side of the handshake is picked by the
 * `isServer` flag the connection hands to `initAsio`.
 *
 * Certificate policy is whatever the secure context options say; this module only runs the
 * handshake and reports its outcome.
 */

import * as tls from 'node:tls';
import type { Duplex } from 'node:stream';
import { Duration, Effect, MutableRef, Option, Ref, pipe } from 'effect';
import {
  SocketInitError,
  socketIoError,
  type Executor,
  type SocketCapability,
  type StreamSocket,
} from '@sockline/transport';
import { makeDuplexStream } from './duplex-stream';

export interface SecureSocketOptions {
  /**
   * Key, certificate, CA and cipher settings for the secure context.
   */
  readonly context?: tls.SecureContextOptions;
  /**
   * Server name sent by a client for SNI and checked against the server certificate.
   */
  readonly servername?: string;
  /**
   * Client side only. Defaults to true.
   */
  readonly rejectUnauthorized?: boolean;
  /**
   * Fail `init` when the handshake has not completed in time.
   */
  readonly handshakeTimeout?: Duration.DurationInput;
}

type HandshakePhase = 'idle' | 'handshaking' | 'secure';

interface SecureSocketState {
  /**
   * First error the raw duplex emitted, filled in by a listener attached at creation.
   */
  readonly rawError: MutableRef.MutableRef<Option.Option<Error>>;
  readonly isServer: Ref.Ref<boolean>;
  readonly phase: Ref.Ref<HandshakePhase>;
  readonly stream: Ref.Ref<Option.Option<StreamSocket>>;
}

interface Handshake {
  readonly socket: tls.TLSSocket;
  readonly release: () => void;
}

const handshakeFailed = (message: string, cause?: unknown) =>
  new SocketInitError({ reason: 'tls_handshake_failed', message, cause });

const createSecureContext = (options: SecureSocketOptions) =>
  Effect.try({
    try: () => tls.createSecureContext(options.context),
    catch: (cause) =>
      new SocketInitError({ reason: 'socket', message: 'Invalid TLS context options', cause }),
  });

const openTlsSocket = (
  duplex: Duplex,
  isServer: boolean,
  secureContext: tls.SecureContext,
  options: SecureSocketOptions
): readonly [tls.TLSSocket, 'secure' | 'secureConnect'] =>
  isServer
    ? [
        new tls.TLSSocket(duplex, { isServer: true, secureContext }),
        'secure',
      ]
    : [
        tls.connect({
          socket: duplex,
          secureContext,
          servername: options.servername,
          rejectUnauthorized: options.rejectUnauthorized ?? true,
        }),
        'secureConnect',
      ];

// The error listener stays on until `release` runs, so nothing emitted between the handshake
// and the stream adapter taking over goes unhandled.
const runHandshake = (
  duplex: Duplex,
  isServer: boolean,
  secureContext: tls.SecureContext,
  options: SecureSocketOptions
): Effect.Effect<Handshake, SocketInitError> =>
  Effect.async<Handshake, SocketInitError>((resume) => {
    const [socket, readyEvent] = openTlsSocket(duplex, isServer, secureContext, options);
    const onError = (error: Error) => resume(Effect.fail(handshakeFailed(error.message, error)));
    const onClose = () => resume(Effect.fail(handshakeFailed('Socket closed during TLS handshake')));
    const onReady = () => {
      socket.off('close', onClose);
      resume(Effect.succeed({ socket, release: () => socket.off('error', onError) }));
    };

    socket.once(readyEvent, onReady);
    socket.on('error', onError);
    socket.once('close', onClose);

    return Effect.sync(() => {
      socket.off(readyEvent, onReady);
      socket.off('close', onClose);
      socket.destroy();
    });
  });

const withHandshakeTimeout =
  (options: SecureSocketOptions) =>
  <A>(handshake: Effect.Effect<A, SocketInitError>): Effect.Effect<A, SocketInitError> =>
    Option.match(Option.fromNullable(options.handshakeTimeout), {
      onNone: () => handshake,
      onSome: (duration) =>
        Effect.timeoutFail(handshake, {
          duration,
          onTimeout: () =>
            handshakeFailed(
              `TLS handshake timed out after ${Duration.format(Duration.decode(duration))}`
            ),
        }),
    });

const beginHandshake = (state: SecureSocketState): Effect.Effect<void, SocketInitError> =>
  pipe(
    Ref.modify(state.phase, (phase): readonly [boolean, HandshakePhase] =>
      phase === 'idle' ? [true, 'handshaking'] : [false, phase]
    ),
    Effect.flatMap((started) =>
      started
        ? Effect.void
        : Effect.fail(
            new SocketInitError({
              reason: 'invalid_state',
              message: 'TLS handshake already started on this socket',
            })
          )
    )
  );

const completeHandshake = (state: SecureSocketState, handshake: Handshake) =>
  pipe(
    makeDuplexStream(handshake.socket),
    Effect.tap(() => Effect.sync(handshake.release)),
    Effect.flatMap((stream) => Ref.set(state.stream, Option.some(stream))),
    Effect.zipRight(Ref.set(state.phase, 'secure'))
  );

const requireUsableDuplex = (
  duplex: Duplex,
  state: SecureSocketState
): Effect.Effect<void, SocketInitError> =>
  Option.match(MutableRef.get(state.rawError), {
    onSome: (error) =>
      Effect.fail(
        new SocketInitError({
          reason: 'socket',
          message: `Socket failed before TLS handshake: ${error.message}`,
          cause: error,
        })
      ),
    onNone: () =>
      duplex.destroyed
        ? Effect.fail(
            new SocketInitError({ reason: 'socket', message: 'Socket closed before TLS handshake' })
          )
        : Effect.void,
  });

const initSecure = (
  duplex: Duplex,
  options: SecureSocketOptions,
  state: SecureSocketState
): Effect.Effect<void, SocketInitError> =>
  pipe(
    beginHandshake(state),
    Effect.zipRight(requireUsableDuplex(duplex, state)),
    Effect.zipRight(Effect.all([Ref.get(state.isServer), createSecureContext(options)])),
    Effect.flatMap(([isServer, secureContext]) =>
      pipe(runHandshake(duplex, isServer, secureContext, options), withHandshakeTimeout(options))
    ),
    Effect.flatMap((handshake) => completeHandshake(state, handshake))
  );

const shutdownSecure = (duplex: Duplex, state: SecureSocketState): Effect.Effect<void> =>
  pipe(
    Ref.get(state.stream),
    Effect.flatMap(
      Option.match({
        onNone: () => Effect.void,
        onSome: (stream) => stream.close,
      })
    ),
    Effect.zipRight(Effect.sync(() => duplex.destroy()))
  );

const buildCapability = (
  duplex: Duplex,
  options: SecureSocketOptions,
  state: SecureSocketState
): SocketCapability => ({
  isSecure: true,
  initAsio: (_executor: Executor, isServer: boolean) => Ref.set(state.isServer, isServer),
  init: initSecure(duplex, options, state),
  getSocket: pipe(
    Ref.get(state.stream),
    Effect.flatMap(
      Option.match({
        onNone: () => Effect.fail(socketIoError.notConnected('TLS handshake has not completed')),
        onSome: Effect.succeed,
      })
    )
  ),
  shutdown: shutdownSecure(duplex, state),
});

const guardRawDuplex = (duplex: Duplex, rawError: MutableRef.MutableRef<Option.Option<Error>>) =>
  Effect.sync(() => {
    duplex.on('error', (error: Error) => {
      if (Option.isNone(MutableRef.get(rawError))) {
        MutableRef.set(rawError, Option.some(error));
      }
    });
  });

/**
 * A secure socket capability over an already connected `Duplex`.
 * The socket is unusable until `init` completes the handshake. Errors the duplex emits before
 * then are kept and fail `init`.
 */
export const makeSecureSocket = (
  duplex: Duplex,
  options: SecureSocketOptions = {}
): Effect.Effect<SocketCapability> =>
  pipe(
    Effect.all({
      rawError: Effect.sync(() => MutableRef.make(Option.none<Error>())),
      isServer: Ref.make(false),
      phase: Ref.make<HandshakePhase>('idle'),
      stream: Ref.make(Option.none<StreamSocket>()),
    }),
    Effect.tap(({ rawError }) => guardRawDuplex(duplex, rawError)),
    Effect.map((state) => buildCapability(duplex, options, state))
  );
