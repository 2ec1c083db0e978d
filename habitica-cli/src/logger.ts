export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogSink = (line: string) => void;

/** Diagnostics go to stderr so stdout stays the command's own output. */
export function createLogger(minLevel: LogLevel = 'warn', sink: LogSink = (line) => console.error(line)): Logger {
  const emit = (level: LogLevel, message: string, context?: LogContext) => {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel]) return;
    const suffix = context && Object.keys(context).length > 0 ? ` ${safeStringify(context)}` : '';
    sink(`[habitica] ${level} ${message}${suffix}`);
  };
  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),
  };
}

export const silentLogger: Logger = createLogger('error', () => {});

export function levelFromFlags(flags: { verbose?: boolean; debug?: boolean }): LogLevel {
  if (flags.debug) return 'debug';
  if (flags.verbose) return 'info';
  return 'warn';
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}
