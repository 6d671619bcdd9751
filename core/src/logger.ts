export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

/** Anything console-shaped; the default is `globalThis.console`. */
export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export interface CreateLoggerOptions {
  level?: LogLevel;
  prefix?: string;
  sink?: LogSink;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
  const sink = options.sink ?? globalThis.console;
  const prefix = options.prefix;

  const emit = (level: LogLevel) => (message: string, meta?: LogMeta) => {
    if (LOG_LEVELS.indexOf(level) < threshold) {
      return;
    }
    const text = prefix ? `${prefix} ${message}` : message;
    if (meta && Object.keys(meta).length > 0) {
      sink[level](text, meta);
    } else {
      sink[level](text);
    }
  };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}
