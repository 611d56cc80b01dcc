/**
 * Transport Log Sinks
 *
 * A transport connection never decides where its diagnostics go. It writes to two injected
 * sinks, one per channel, and the application decides which levels are kept and how they are
 * rendered. The default sinks forward to Effect's logger so the usual Logger layers apply.
 */

import { Context, Effect, Layer, LogLevel, pipe } from 'effect';
import { TransportLogConfig, type TransportLogConfigService } from './config';
import type { AccessLevel, ErrorLevel } from './levels';

// ============================================================================
// Sink Contracts
// ============================================================================

export interface LogSink<Level extends string> {
  readonly write: (level: Level, message: string) => Effect.Effect<void>;
}

export interface LogSinks {
  readonly access: LogSink<AccessLevel>;
  readonly error: LogSink<ErrorLevel>;
}

export class TransportLogSinks extends Context.Tag('@sockline/TransportLogSinks')<
  TransportLogSinks,
  LogSinks
>() {}

// ============================================================================
// Effect Logger Sinks
// ============================================================================

const accessLogLevels: Record<AccessLevel, LogLevel.LogLevel> = {
  connect: LogLevel.Info,
  disconnect: LogLevel.Info,
  devel: LogLevel.Debug,
  app: LogLevel.Info,
  fail: LogLevel.Error,
};

const errorLogLevels: Record<ErrorLevel, LogLevel.LogLevel> = {
  devel: LogLevel.Debug,
  library: LogLevel.Debug,
  info: LogLevel.Info,
  warn: LogLevel.Warning,
  rerror: LogLevel.Error,
  fatal: LogLevel.Fatal,
};

const makeEffectLogSink = <Level extends string>(
  channel: 'access' | 'error',
  enabled: ReadonlyArray<Level>,
  logLevels: Record<Level, LogLevel.LogLevel>
): LogSink<Level> => {
  const enabledLevels = new Set<string>(enabled);
  return {
    write: (level, message) =>
      enabledLevels.has(level)
        ? pipe(
            Effect.logWithLevel(logLevels[level], message),
            Effect.annotateLogs({ channel, level })
          )
        : Effect.void,
  };
};

export const makeEffectLogSinks = (config: TransportLogConfigService): LogSinks => ({
  access: makeEffectLogSink('access', config.accessLevels, accessLogLevels),
  error: makeEffectLogSink('error', config.errorLevels, errorLogLevels),
});

const silentSink = { write: () => Effect.void };

export const silentLogSinks: LogSinks = {
  access: silentSink,
  error: silentSink,
};

export const TransportLogSinksLive = Layer.effect(
  TransportLogSinks,
  pipe(TransportLogConfig, Effect.map(makeEffectLogSinks))
);
