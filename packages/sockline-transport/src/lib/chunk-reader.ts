/**
 * Chunk Reader
 *
 * Turns a push-based source of chunks (Node `data` events, `Socket.run` handlers, an
 * in-memory peer) into the pull-based `readSome` a StreamSocket exposes. Chunks are consumed
 * oldest first; whatever does not fit the caller's buffer is kept for the next read.
 *
 * Pushed chunks are owned by the reader from then on: callers that reuse their buffers must
 * push a copy.
 */

import { Effect, Option, Queue, Ref, pipe } from 'effect';
import { socketIoError, type SocketIoError } from './errors';

type InboundEvent =
  | { readonly _tag: 'Data'; readonly chunk: Uint8Array }
  | { readonly _tag: 'End'; readonly error: SocketIoError };

export interface ChunkReader {
  readonly push: (chunk: Uint8Array) => void;
  /**
   * Mark the end of input. Reads fail with `error`, or with `eof` once queued data is consumed.
   */
  readonly end: (error?: SocketIoError) => void;
  readonly readSome: (buffer: Uint8Array) => Effect.Effect<number, SocketIoError>;
  /**
   * Fail pending and future reads with `closed`, discarding queued data.
   */
  readonly close: Effect.Effect<void>;
}

interface ReaderState {
  readonly inbound: Queue.Queue<InboundEvent>;
  readonly remainder: Ref.Ref<Option.Option<Uint8Array>>;
  readonly terminal: Ref.Ref<Option.Option<SocketIoError>>;
}

const handleInboundEvent =
  (state: ReaderState) =>
  (event: InboundEvent): Effect.Effect<Uint8Array, SocketIoError> =>
    event._tag === 'Data'
      ? Effect.succeed(event.chunk)
      : pipe(
          Ref.update(state.terminal, Option.orElse(() => Option.some(event.error))),
          Effect.zipRight(Ref.get(state.terminal)),
          Effect.flatMap(Option.match({ onNone: () => Effect.fail(event.error), onSome: Effect.fail }))
        );

const nextChunk = (state: ReaderState): Effect.Effect<Uint8Array, SocketIoError> =>
  pipe(
    Ref.get(state.remainder),
    Effect.flatMap(
      Option.match({
        onSome: (chunk) => pipe(Ref.set(state.remainder, Option.none()), Effect.as(chunk)),
        onNone: () => pipe(Queue.take(state.inbound), Effect.flatMap(handleInboundEvent(state))),
      })
    )
  );

const copyInto =
  (state: ReaderState, buffer: Uint8Array) =>
  (chunk: Uint8Array): Effect.Effect<number> => {
    const count = Math.min(chunk.length, buffer.length);
    buffer.set(chunk.subarray(0, count));
    const rest = chunk.subarray(count);
    return pipe(
      Ref.set(state.remainder, rest.length > 0 ? Option.some(rest) : Option.none()),
      Effect.as(count)
    );
  };

const readSome =
  (state: ReaderState) =>
  (buffer: Uint8Array): Effect.Effect<number, SocketIoError> =>
    pipe(
      Ref.get(state.terminal),
      Effect.flatMap(
        Option.match({
          onSome: Effect.fail,
          onNone: () => pipe(nextChunk(state), Effect.flatMap(copyInto(state, buffer))),
        })
      )
    );

const closeReader = (state: ReaderState): Effect.Effect<void> => {
  const closed = socketIoError.closed();
  return pipe(
    Ref.set(state.terminal, Option.some(closed)),
    Effect.zipRight(Ref.set(state.remainder, Option.none())),
    Effect.zipRight(Queue.offer(state.inbound, { _tag: 'End', error: closed })),
    Effect.asVoid
  );
};

export const makeChunkReader = (): Effect.Effect<ChunkReader> =>
  pipe(
    Effect.all({
      inbound: Queue.unbounded<InboundEvent>(),
      remainder: Ref.make(Option.none<Uint8Array>()),
      terminal: Ref.make(Option.none<SocketIoError>()),
    }),
    Effect.map((state) => ({
      push: (chunk: Uint8Array) => {
        if (chunk.length > 0) {
          state.inbound.unsafeOffer({ _tag: 'Data', chunk });
        }
      },
      end: (error?: SocketIoError) => {
        state.inbound.unsafeOffer({ _tag: 'End', error: error ?? socketIoError.eof() });
      },
      readSome: readSome(state),
      close: closeReader(state),
    }))
  );
