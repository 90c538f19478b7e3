import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: unknown): void;
  child(context: Record<string, unknown>): Logger;
}

/**
 * Thin wrapper so call sites pass (message, data) like the rest of the code
 * instead of pino's (data, message).
 */
class PinoLogger implements Logger {
  constructor(private readonly pino: pino.Logger) {}

  debug(msg: string, data?: Record<string, unknown>): void {
    this.pino.debug(data ?? {}, msg);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.pino.info(data ?? {}, msg);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.pino.warn(data ?? {}, msg);
  }

  error(msg: string, error?: unknown): void {
    if (error instanceof Error) {
      this.pino.error({ err: error }, msg);
    } else if (error === undefined) {
      this.pino.error(msg);
    } else {
      this.pino.error({ detail: error }, msg);
    }
  }

  child(context: Record<string, unknown>): Logger {
    return new PinoLogger(this.pino.child(context));
  }
}

let rootLogger: Logger | null = null;

function resolveLevel(level?: string): LogLevel {
  switch (level) {
    case 'trace':
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'fatal':
    case 'silent':
      return level;
    default:
      return 'info';
  }
}

/**
 * Root logger. Level comes from LOG_LEVEL unless given explicitly on first use.
 */
export function getLogger(level?: LogLevel): Logger {
  if (!rootLogger) {
    rootLogger = new PinoLogger(
      pino({
        name: 'session-manager',
        level: level ?? resolveLevel(process.env.LOG_LEVEL),
        redact: ['password', 'token', '*.password', '*.token'],
      })
    );
  }
  return rootLogger;
}

/**
 * Logger tagged with the component that owns it.
 */
export function createLogger(component: string): Logger {
  return getLogger().child({ component });
}
