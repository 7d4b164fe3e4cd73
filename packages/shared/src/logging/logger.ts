import type { LogLevel } from '@nfe-intake/contracts';

export type { LogLevel };

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/**
 * Destination for formatted log lines.
 */
export interface LogSink {
  write(level: LogLevel, line: string): void;
}

/**
 * Logger options
 */
export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  context?: Record<string, unknown>;
  /**
   * Where lines go. Defaults to the console.
   */
  sinks?: readonly LogSink[];
  /**
   * Clock used for timestamps (tests)
   */
  now?: () => Date;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Writes each line with the console method matching its level.
 */
export const consoleSink: LogSink = {
  write(level, line) {
    switch (level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  },
};

/**
 * Create a leveled logger.
 *
 * Lines look like
 * `[2024-05-01T12:00:00.000Z] [INFO] [nfe-intake] message {"key":"value"}`
 * and are fanned out to every sink. A sink that throws is reported on
 * stderr and skipped for that line.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = LOG_LEVELS[options.level ?? 'info'];
  const prefix = options.prefix ?? 'nfe-intake';
  const baseContext = options.context ?? {};
  const sinks = options.sinks ?? [consoleSink];
  const now = options.now ?? (() => new Date());

  const shouldLog = (level: LogLevel): boolean => LOG_LEVELS[level] >= minLevel;

  const formatMessage = (level: LogLevel, message: string, context?: Record<string, unknown>): string => {
    const timestamp = now().toISOString();
    const mergedContext = { ...baseContext, ...context };
    const contextStr = Object.keys(mergedContext).length > 0
      ? ` ${JSON.stringify(mergedContext)}`
      : '';

    return `[${timestamp}] [${level.toUpperCase()}] [${prefix}] ${message}${contextStr}`;
  };

  const emit = (level: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (!shouldLog(level)) {
      return;
    }
    const line = formatMessage(level, message, context);
    for (const sink of sinks) {
      try {
        sink.write(level, line);
      } catch (error) {
        // A failing sink must not turn a logged outcome into a failed one
        const reason = error instanceof Error ? error.message : String(error);
        process.stderr.write(`[${prefix}] log sink failed: ${reason}\n`);
      }
    }
  };

  const logger: Logger = {
    debug(message: string, context?: Record<string, unknown>) {
      emit('debug', message, context);
    },

    info(message: string, context?: Record<string, unknown>) {
      emit('info', message, context);
    },

    warn(message: string, context?: Record<string, unknown>) {
      emit('warn', message, context);
    },

    error(message: string, context?: Record<string, unknown>) {
      emit('error', message, context);
    },

    child(context: Record<string, unknown>): Logger {
      return createLogger({
        ...options,
        prefix,
        context: { ...baseContext, ...context },
      });
    },
  };

  return logger;
}

/**
 * Logger that drops everything (tests, library defaults).
 */
export function createSilentLogger(): Logger {
  return createLogger({ sinks: [] });
}
