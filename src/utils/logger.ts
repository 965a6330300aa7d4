// Utility: Structured logger
// One JSON line per event, tagged with the emitting component

export interface LogContext {
  [key: string]: string | number | boolean | null | undefined;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

/**
 * Resolve the active level from the environment.
 * Tests stay quiet unless LOG_LEVEL asks otherwise.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const requested = env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(requested)) {
    return requested;
  }
  return env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export class Logger {
  private static level: LogLevel = resolveLogLevel();

  constructor(private readonly component: string) {}

  static setLevel(level: LogLevel): void {
    Logger.level = level;
  }

  static getLevel(): LogLevel {
    return Logger.level;
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[Logger.level]) {
      return;
    }

    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      message,
      ...context,
    };

    const formatted = JSON.stringify(logEntry);
    if (level === 'error') {
      console.error(formatted);
    } else {
      console.log(formatted);
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }
}

export const authLogger = new Logger('auth');
export const sessionLogger = new Logger('session');
export const mailLogger = new Logger('mail');
export const httpLogger = new Logger('http');
export const serverLogger = new Logger('server');

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
