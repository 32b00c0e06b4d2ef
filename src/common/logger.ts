export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
}

const format = (scope: string, message: string, meta?: Record<string, unknown>): string => {
  const line = `[${scope}] ${message}`;
  return meta && Object.keys(meta).length ? `${line} ${JSON.stringify(meta)}` : line;
};

export const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

/**
 * Console logger tagged with a scope, e.g. `[ContentFetcher] page skipped`.
 * Errors are always written; other levels respect the threshold.
 */
export const createLogger = (level: LogLevel = 'info', scope = 'app'): Logger => {
  const threshold = levelWeights[level];
  const shouldLog = (candidate: LogLevel) => levelWeights[candidate] >= threshold;
  /* eslint-disable no-console */
  return {
    debug: (message, meta) => {
      if (shouldLog('debug')) console.debug(format(scope, message, meta));
    },
    info: (message, meta) => {
      if (shouldLog('info')) console.log(format(scope, message, meta));
    },
    warn: (message, meta) => {
      if (shouldLog('warn')) console.warn(format(scope, message, meta));
    },
    error: (message, meta) => console.error(format(scope, message, meta)),
  };
  /* eslint-enable no-console */
};
