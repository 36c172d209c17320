/**
 * Environment-driven logging configuration
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export type LogFormat = 'json' | 'pretty';

export interface IDebugConfig {
  /**
   * Emit parser traces (tokens, derivations)
   */
  enabled: boolean;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

const toBool = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  return value.trim().toLowerCase() === 'true';
};

const toLogLevel = (value: string | undefined, defaultValue: LogLevel): LogLevel => {
  if (!value) {
    return defaultValue;
  }

  switch (value.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return defaultValue;
  }
};

const toLogFormat = (value: string | undefined, defaultValue: LogFormat): LogFormat => {
  if (!value) {
    return defaultValue;
  }

  return value.trim().toLowerCase() === 'json' ? 'json' : defaultValue;
};

/**
 * Read the debug configuration from the environment.
 *
 * - RESTFILTER_DEBUG: `true` to emit parser traces
 * - RESTFILTER_LOG_LEVEL: debug | info | warn | error (default info, debug when traces are on)
 * - RESTFILTER_LOG_FORMAT: pretty | json (default pretty)
 */
export function loadDebugConfig(env: NodeJS.ProcessEnv = process.env): IDebugConfig {
  const enabled = toBool(env.RESTFILTER_DEBUG, false);

  return {
    enabled,
    logLevel: toLogLevel(env.RESTFILTER_LOG_LEVEL, enabled ? LogLevel.DEBUG : LogLevel.INFO),
    logFormat: toLogFormat(env.RESTFILTER_LOG_FORMAT, 'pretty')
  };
}
