export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogMeta = Record<string, unknown>;

/** Logger used by every component to emit diagnostics. */
export type HeosLogger = {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
};

const WEIGHTS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const noopLogger: HeosLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  prefix?: string;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(WEIGHTS, value);
}

/** Logger writing `[prefix] message {meta}` lines to stderr. */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): HeosLogger {
  const threshold = WEIGHTS[options.level ?? 'info'];
  const prefix = options.prefix ?? 'HEOS';

  const write = (level: Exclude<LogLevel, 'silent'>, message: string, meta?: LogMeta): void => {
    if (WEIGHTS[level] < threshold) return;
    const suffix = meta && Object.keys(meta).length > 0 ? ` ${formatMeta(meta)}` : '';
    console.error(`[${prefix}] ${level.toUpperCase()} ${message}${suffix}`);
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
  };
}

function formatMeta(meta: LogMeta): string {
  return JSON.stringify(meta, (_key, value: unknown) =>
    value instanceof Error ? `${value.name}: ${value.message}` : value,
  );
}

/** Error text for log metadata. */
export function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}
