/**
 * Test helpers for code built on a transport connection: log sinks that record what they are
 * given, and a socket capability driven by the test.
 */

import { Deferred, Effect, Option, Ref, pipe } from 'effect';
import { makeChunkReader, type ChunkReader } from './lib/chunk-reader';
import { socketIoError, type SocketInitError, type SocketIoError } from './lib/errors';
import type { Executor } from './lib/executor';
import type { AccessLevel, ErrorLevel } from './lib/levels';
import type { LogSinks } from './lib/log';
import type { SocketCapability, StreamSocket } from './lib/socket';

// =============================================================================
// Recording Log Sinks
// =============================================================================

export type LogEntry =
  | { readonly channel: 'access'; readonly level: AccessLevel; readonly message: string }
  | { readonly channel: 'error'; readonly level: ErrorLevel; readonly message: string };

export interface RecordingLogSinks {
  readonly sinks: LogSinks;
  readonly entries: Effect.Effect<ReadonlyArray<LogEntry>>;
  readonly messages: (channel: LogEntry['channel']) => Effect.Effect<ReadonlyArray<string>>;
}

export const makeRecordingLogSinks = (): Effect.Effect<RecordingLogSinks> =>
  pipe(
    Ref.make<ReadonlyArray<LogEntry>>([]),
    Effect.map((ref) => ({
      sinks: {
        access: {
          write: (level: AccessLevel, message: string) =>
            Ref.update(ref, (entries): ReadonlyArray<LogEntry> => [...entries, { channel: 'access', level, message }]),
        },
        error: {
          write: (level: ErrorLevel, message: string) =>
            Ref.update(ref, (entries): ReadonlyArray<LogEntry> => [...entries, { channel: 'error', level, message }]),
        },
      },
      entries: Ref.get(ref),
      messages: (channel: LogEntry['channel']) =>
        pipe(
          Ref.get(ref),
          Effect.map((entries) =>
            entries.filter((entry) => entry.channel === channel).map((entry) => entry.message)
          )
        ),
    }))
  );

// =============================================================================
// Scripted Socket
// =============================================================================

export interface ScriptedSocketOptions {
  readonly isSecure?: boolean;
  readonly failInit?: SocketInitError;
  readonly failWrites?: SocketIoError;
  /**
   * Keep every write pending until `releaseWrites` runs or the socket is closed.
   */
  readonly holdWrites?: boolean;
}

export interface ScriptedSocket {
  readonly capability: SocketCapability;
  /**
   * Deliver bytes to the next reads.
   */
  readonly feed: (chunk: Uint8Array) => Effect.Effect<void>;
  /**
   * End the inbound stream. Reads fail with `error`, or `eof` once buffered bytes are consumed.
   */
  readonly finish: (error?: SocketIoError) => Effect.Effect<void>;
  readonly releaseWrites: Effect.Effect<void>;
  /**
   * Copies of the segments of every completed write, one entry per write.
   */
  readonly written: Effect.Effect<ReadonlyArray<ReadonlyArray<Uint8Array>>>;
  readonly reads: Effect.Effect<number>;
  readonly initAsioCalls: Effect.Effect<ReadonlyArray<boolean>>;
  readonly shutdownCalls: Effect.Effect<number>;
}

interface ScriptedState {
  readonly reader: ChunkReader;
  readonly written: Ref.Ref<ReadonlyArray<ReadonlyArray<Uint8Array>>>;
  readonly reads: Ref.Ref<number>;
  readonly initAsioCalls: Ref.Ref<ReadonlyArray<boolean>>;
  readonly shutdownCalls: Ref.Ref<number>;
  readonly writeGate: Deferred.Deferred<void>;
  readonly closed: Deferred.Deferred<void>;
}

const awaitWriteGate = (state: ScriptedState, options: ScriptedSocketOptions) =>
  options.holdWrites === true
    ? Effect.raceFirst(Deferred.await(state.writeGate), Deferred.await(state.closed))
    : Effect.void;

const failWhenClosed = (state: ScriptedState): Effect.Effect<void, SocketIoError> =>
  pipe(
    Deferred.isDone(state.closed),
    Effect.flatMap((closed) => (closed ? Effect.fail(socketIoError.closed()) : Effect.void))
  );

const scriptedStream = (state: ScriptedState, options: ScriptedSocketOptions): StreamSocket => ({
  readSome: (buffer) =>
    pipe(Ref.update(state.reads, (count) => count + 1), Effect.zipRight(state.reader.readSome(buffer))),
  writeAll: (segments) =>
    pipe(
      awaitWriteGate(state, options),
      Effect.zipRight(failWhenClosed(state)),
      Effect.zipRight(
        Option.match(Option.fromNullable(options.failWrites), {
          onNone: () =>
            Ref.update(state.written, (writes) => [
              ...writes,
              segments.map((segment) => Uint8Array.from(segment)),
            ]),
          onSome: Effect.fail,
        })
      )
    ),
  close: pipe(
    state.reader.close,
    Effect.zipRight(Deferred.succeed(state.closed, undefined)),
    Effect.asVoid
  ),
});

const scriptedCapability = (
  state: ScriptedState,
  options: ScriptedSocketOptions
): SocketCapability => {
  const stream = scriptedStream(state, options);
  return {
    isSecure: options.isSecure ?? false,
    initAsio: (_executor: Executor, isServer: boolean) =>
      Ref.update(state.initAsioCalls, (calls) => [...calls, isServer]),
    init: Option.match(Option.fromNullable(options.failInit), {
      onNone: () => Effect.void,
      onSome: Effect.fail,
    }),
    getSocket: Effect.succeed(stream),
    shutdown: pipe(
      Ref.update(state.shutdownCalls, (count) => count + 1),
      Effect.zipRight(stream.close)
    ),
  };
};

export const makeScriptedSocket = (
  options: ScriptedSocketOptions = {}
): Effect.Effect<ScriptedSocket> =>
  pipe(
    Effect.all({
      reader: makeChunkReader(),
      written: Ref.make<ReadonlyArray<ReadonlyArray<Uint8Array>>>([]),
      reads: Ref.make(0),
      initAsioCalls: Ref.make<ReadonlyArray<boolean>>([]),
      shutdownCalls: Ref.make(0),
      writeGate: Deferred.make<void>(),
      closed: Deferred.make<void>(),
    }),
    Effect.map((state) => ({
      capability: scriptedCapability(state, options),
      feed: (chunk: Uint8Array) => Effect.sync(() => state.reader.push(chunk)),
      finish: (error?: SocketIoError) => Effect.sync(() => state.reader.end(error)),
      releaseWrites: pipe(Deferred.succeed(state.writeGate, undefined), Effect.asVoid),
      written: Ref.get(state.written),
      reads: Ref.get(state.reads),
      initAsioCalls: Ref.get(state.initAsioCalls),
      shutdownCalls: Ref.get(state.shutdownCalls),
    }))
  );
