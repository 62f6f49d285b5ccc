/* eslint-disable no-console */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogThreshold = LogLevel | 'silent';

export type LoggerMetadata = Record<string, unknown>;

const LEVEL_VALUES: Record<LogThreshold, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

// Resolved per call so a replaced console method is honoured.
const consoleWriters = {
  debug: (...args: unknown[]) => console.debug(...args),
  info: (...args: unknown[]) => console.info(...args),
  warn: (...args: unknown[]) => console.warn(...args),
  error: (...args: unknown[]) => console.error(...args),
} as const;

let threshold: LogThreshold = 'info';

export const setLogLevel = (level: LogThreshold): void => {
  threshold = level;
};

export const getLogLevel = (): LogThreshold => threshold;

const formatConsolePayload = (
  level: LogLevel,
  module: string,
  message: string,
  metadata: LoggerMetadata,
) => {
  const timestamp = new Date().toISOString();
  return [
    `[${timestamp}] [${level.toUpperCase()}] [${module}] ${message}`,
    metadata,
  ] as const;
};

const createEmitter =
  (module: string, level: LogLevel) =>
  (message: string, metadata: LoggerMetadata = {}) => {
    if (LEVEL_VALUES[level] < LEVEL_VALUES[threshold]) {
      return;
    }
    const [consoleMessage, consoleMetadata] = formatConsolePayload(
      level,
      module,
      message,
      metadata,
    );
    consoleWriters[level](consoleMessage, consoleMetadata);
  };

export const createLogger = (module: string) => ({
  debug: createEmitter(module, 'debug'),
  info: createEmitter(module, 'info'),
  warn: createEmitter(module, 'warn'),
  error: createEmitter(module, 'error'),
});

export type Logger = ReturnType<typeof createLogger>;

const loggerCache = new Map<string, Logger>();

export const getLogger = (module: string): Logger => {
  const cached = loggerCache.get(module);
  if (cached) {
    return cached;
  }

  const logger = createLogger(module);
  loggerCache.set(module, logger);
  return logger;
};
