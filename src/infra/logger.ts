/**
 * Structured console logger.
 * Lines look like `[2024-01-01T00:00:00.000Z] [INFO] message {"key":"value"}`.
 * Never pass secrets, passwords or tokens in the context.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';

export type LogContext = Record<string, unknown>;

const SEVERITY: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogThreshold(value: string | undefined): value is LogThreshold {
  return value !== undefined && Object.hasOwn(SEVERITY, value);
}

export class Logger {
  constructor(private threshold: LogThreshold = 'info') {}

  setLevel(threshold: LogThreshold): void {
    this.threshold = threshold;
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (error instanceof Error) {
      this.write('error', message, {
        ...context,
        error: error.message,
        stack: error.stack,
      });
      return;
    }
    this.write('error', message, error === undefined ? context : { ...context, error: String(error) });
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (SEVERITY[level] < SEVERITY[this.threshold]) {
      return;
    }
    const line = this.format(level, message, context);
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private format(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const contextStr = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
  }
}

const envLevel = process.env.LOG_LEVEL;

export const logger = new Logger(isLogThreshold(envLevel) ? envLevel : 'info');
