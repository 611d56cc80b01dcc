/**
 * Duplex Stream Adapter
 *
 * Presents a Node `Duplex` (a `net.Socket`, a `tls.TLSSocket`, or any in-process duplex) as a
 * StreamSocket. Inbound chunks are buffered by a chunk reader from the moment the adapter is
 * created, so bytes that arrive before the first read are not lost.
 */

import type { Duplex } from 'node:stream';
import { Effect, pipe } from 'effect';
import {
  makeChunkReader,
  socketIoError,
  type SocketIoError,
  type StreamSocket,
} from '@sockline/transport';

const isClosed = (duplex: Duplex) => duplex.destroyed || duplex.writableEnded;

const writeSegments = (
  duplex: Duplex,
  segments: ReadonlyArray<Uint8Array>
): Effect.Effect<void, SocketIoError> =>
  Effect.async<void, SocketIoError>((resume) => {
    if (isClosed(duplex)) {
      resume(Effect.fail(socketIoError.closed()));
      return;
    }
    const onWritten = (error?: Error | null) => {
      resume(error ? Effect.fail(socketIoError.io('Socket write failed')(error)) : Effect.void);
    };
    if (segments.length === 0) {
      onWritten();
      return;
    }
    duplex.cork();
    segments.forEach((segment, index) => {
      duplex.write(segment, index === segments.length - 1 ? onWritten : undefined);
    });
    process.nextTick(() => duplex.uncork());
  });

/**
 * Start buffering the duplex's input and expose it as a StreamSocket.
 * Closing the stream destroys the duplex.
 */
export const makeDuplexStream = (duplex: Duplex): Effect.Effect<StreamSocket> =>
  pipe(
    makeChunkReader(),
    Effect.map((reader) => {
      const onData = (chunk: Uint8Array | string) => {
        reader.push(typeof chunk === 'string' ? new TextEncoder().encode(chunk) : chunk);
      };
      const onEnd = () => reader.end();
      const onError = (error: Error) => reader.end(socketIoError.io(error.message)(error));
      const onClose = () => reader.end(socketIoError.closed('Socket closed by peer'));

      duplex.on('data', onData);
      duplex.on('end', onEnd);
      duplex.on('error', onError);
      duplex.on('close', onClose);

      return {
        readSome: reader.readSome,
        writeAll: (segments: ReadonlyArray<Uint8Array>) => writeSegments(duplex, segments),
        close: pipe(
          reader.close,
          Effect.zipRight(Effect.sync(() => duplex.destroy()))
        ),
      };
    })
  );
