// Structured logging for the engine
//
// Components take an EngineLogger in their options and log short messages
// with a data object. Every logger here is createLogger over some sink.

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
export type EngineLogger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
};

export type LogSink = (entry: LogEntry) => void;

export type CreateLoggerOptions = {
  /**
   * Entries below this level are dropped (default: debug)
   */
  level?: LogLevel;
};

/**
 * Build a logger that hands every entry at or above the level to a sink.
 */
export function createLogger(sink: LogSink, options: CreateLoggerOptions = {}): EngineLogger {
  const threshold = LEVEL_ORDER[options.level ?? 'debug'];
  const at = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
    if (LEVEL_ORDER[level] < threshold) return;
    sink({ level, message, data, timestamp: new Date().toISOString() });
  };

  return { debug: at('debug'), info: at('info'), warn: at('warn'), error: at('error') };
}

function consoleSink(entry: LogEntry): void {
  const line = `[${entry.level.toUpperCase()}] ${entry.message}`;
  if (entry.data === undefined) {
    console[entry.level](line);
  } else {
    console[entry.level](line, entry.data);
  }
}

/**
 * Console logger at info level and above
 */
export const consoleLogger: EngineLogger = createLogger(consoleSink, { level: 'info' });

/**
 * Console logger with a chosen threshold
 */
export function createConsoleLogger(level: LogLevel): EngineLogger {
  return createLogger(consoleSink, { level });
}

/**
 * Logger that drops everything
 */
export const silentLogger: EngineLogger = createLogger(() => {}, { level: 'error' });

/**
 * Logger that keeps every entry for inspection in tests.
 */
export function createCapturingLogger(): EngineLogger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { ...createLogger((entry) => entries.push(entry)), entries };
}

/**
 * Wrap a logger so every entry carries the given context. Entry data wins
 * over context on conflicting keys.
 */
export function withContext(logger: EngineLogger, context: Record<string, unknown>): EngineLogger {
  const merge = (data?: Record<string, unknown>) => ({ ...context, ...data });
  return {
    debug: (message, data) => logger.debug(message, merge(data)),
    info: (message, data) => logger.info(message, merge(data)),
    warn: (message, data) => logger.warn(message, merge(data)),
    error: (message, data) => logger.error(message, merge(data)),
  };
}
