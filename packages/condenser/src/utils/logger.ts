export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext, error?: Error): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Create a logger writing one line per entry. Output goes to stderr so that
 * commands can print JSON results on stdout.
 */
export function createLogger(
  level: LogLevel = 'info',
  write: (line: string) => void = (line) => process.stderr.write(`${line}\n`),
): Logger {
  const threshold = SEVERITY[level];

  function emit(entryLevel: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext, error?: Error): void {
    if (SEVERITY[entryLevel] < threshold) return;
    let line = `[route-condenser] ${entryLevel.toUpperCase()} ${message}`;
    if (context && Object.keys(context).length > 0) {
      line += ` ${JSON.stringify(context)}`;
    }
    if (error) {
      line += ` - ${error.message}`;
    }
    write(line);
  }

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context, error) => emit('error', message, context, error),
  };
}
