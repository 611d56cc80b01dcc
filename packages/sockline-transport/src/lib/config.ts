import { Config, Context, Layer, pipe } from 'effect';
import { ACCESS_LEVELS, ERROR_LEVELS, type AccessLevel, type ErrorLevel } from './levels';

// ============================================================================
// Log Channel Configuration
// ============================================================================

export type TransportLogConfigService = {
  readonly accessLevels: ReadonlyArray<AccessLevel>;
  readonly errorLevels: ReadonlyArray<ErrorLevel>;
};

export class TransportLogConfig extends Context.Tag('@sockline/TransportLogConfig')<
  TransportLogConfig,
  TransportLogConfigService
>() {}

/**
 * Levels enabled when nothing is configured: everything except developer detail.
 */
export const DefaultTransportLogConfig: TransportLogConfigService = {
  accessLevels: ['connect', 'disconnect', 'app', 'fail'],
  errorLevels: ['info', 'warn', 'rerror', 'fatal'],
};

/**
 * Reads the enabled levels from `<prefix>_ACCESS_LEVELS` and `<prefix>_ERROR_LEVELS`
 * (comma separated). Unknown level names fail with a ConfigError.
 */
export const transportLogConfig = (prefix = 'TRANSPORT_LOG'): Config.Config<TransportLogConfigService> =>
  Config.nested(
    Config.all({
      accessLevels: pipe(
        Config.array(Config.literal(...ACCESS_LEVELS)(), 'ACCESS_LEVELS'),
        Config.withDefault(DefaultTransportLogConfig.accessLevels)
      ),
      errorLevels: pipe(
        Config.array(Config.literal(...ERROR_LEVELS)(), 'ERROR_LEVELS'),
        Config.withDefault(DefaultTransportLogConfig.errorLevels)
      ),
    }),
    prefix
  );

export const makeTransportLogConfigLive = (prefix: string) =>
  Layer.effect(TransportLogConfig, transportLogConfig(prefix));

export const TransportLogConfigLive = makeTransportLogConfigLive('TRANSPORT_LOG');
