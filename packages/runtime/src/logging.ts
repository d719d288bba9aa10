// Structured logging
//
// Engines log through this interface so hosts can route output to the
// console, a file, or an external service.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Structured logger interface.
 */
export type Logger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

/**
 * Console logger that drops entries below `minLevel`.
 */
export function createConsoleLogger(options: { minLevel?: LogLevel } = {}): Logger {
  const threshold = LEVEL_ORDER[options.minLevel ?? 'debug'];
  const write = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
    if (LEVEL_ORDER[level] < threshold) return;
    const line = `[${level.toUpperCase()}] ${message}`;
    if (data === undefined) {
      console[level](line);
    } else {
      console[level](line, data);
    }
  };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}

/**
 * Default console logger implementation
 */
export const consoleLogger: Logger = createConsoleLogger();

/**
 * Silent logger for testing
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Wrap a logger so every entry carries the given fields.
 * Fields passed per call win over the bound ones.
 */
export function withLogContext(logger: Logger, bindings: Record<string, unknown>): Logger {
  const bind =
    (level: LogLevel) =>
    (message: string, data?: Record<string, unknown>) =>
      logger[level](message, { ...bindings, ...data });

  return {
    debug: bind('debug'),
    info: bind('info'),
    warn: bind('warn'),
    error: bind('error'),
  };
}

export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
};

/**
 * Create a capturing logger that stores log entries for inspection
 */
export function createCapturingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const log = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
    entries.push({
      level,
      message,
      data,
      timestamp: new Date().toISOString(),
    });
  };

  return {
    entries,
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}
