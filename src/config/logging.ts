export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export type LogFormat = 'json' | 'pretty';

export interface LoggingConfig {
  debugEnabled: boolean;
  logRequests: boolean;
  logFilters: boolean;
  logRepository: boolean;
  logLevel: LogLevel;
  logFormat: LogFormat;
  enableRequestTiming: boolean;
  enableQueryPerformance: boolean;
  slowQueryThresholdMs: number;
}

export const toBool = (value: string | undefined, defaultValue: boolean) => {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  return value.trim().toLowerCase() === 'true';
};

const toLogLevel = (value: string | undefined, defaultValue: LogLevel): LogLevel => {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  switch (normalized) {
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

export const toNumber = (value: string | undefined, defaultValue: number): number => {
  if (!value) {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
};

export function loadLoggingConfig(): LoggingConfig {
  const debugEnabled = toBool(process.env.ENTITY_DEBUG_MODE, false);

  // Level, format and timing apply whether or not debug categories are on
  const logLevel = toLogLevel(process.env.ENTITY_LOG_LEVEL, LogLevel.INFO);
  const logFormat = toLogFormat(process.env.ENTITY_LOG_FORMAT, 'pretty');
  const enableRequestTiming = toBool(process.env.ENTITY_ENABLE_REQUEST_TIMING, true);
  const enableQueryPerformance = toBool(process.env.ENTITY_ENABLE_QUERY_PERFORMANCE, true);
  const slowQueryThresholdMs = toNumber(process.env.ENTITY_SLOW_QUERY_THRESHOLD_MS, 100);

  if (!debugEnabled) {
    return {
      debugEnabled: false,
      logRequests: false,
      logFilters: false,
      logRepository: false,
      logLevel,
      logFormat,
      enableRequestTiming,
      enableQueryPerformance,
      slowQueryThresholdMs,
    };
  }

  return {
    debugEnabled: true,
    logRequests: toBool(process.env.ENTITY_DEBUG_REQUESTS, true),
    logFilters: toBool(process.env.ENTITY_DEBUG_FILTERS, true),
    logRepository: toBool(process.env.ENTITY_DEBUG_REPOSITORY, true),
    logLevel,
    logFormat,
    enableRequestTiming,
    enableQueryPerformance,
    slowQueryThresholdMs,
  };
}
