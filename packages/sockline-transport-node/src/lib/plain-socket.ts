import type { Duplex } from 'node:stream';
import { Effect, pipe } from 'effect';
import type { SocketCapability } from '@sockline/transport';
import { makeDuplexStream } from './duplex-stream';

/**
 * A plain socket capability over an already connected or accepted `net.Socket` (any `Duplex`).
 * There is nothing to negotiate, so `init` succeeds at once. `shutdown` destroys the duplex.
 */
export const makePlainSocket = (duplex: Duplex): Effect.Effect<SocketCapability> =>
  pipe(
    makeDuplexStream(duplex),
    Effect.map((stream): SocketCapability => ({
      isSecure: false,
      initAsio: () => Effect.void,
      init: Effect.void,
      getSocket: Effect.succeed(stream),
      shutdown: stream.close,
    }))
  );
