import { pino, type Level } from 'pino';

export interface LoggerLike {
  debug(message: string, meta?: unknown): void;
  log(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

export type LogLevel = Level | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

const initialLevel = process.env['LOG_LEVEL'] ?? 'info';

const rootLogger = pino({
  level: isLogLevel(initialLevel) ? initialLevel : 'info',
  base: undefined,
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Change the level of every Logger instance at once
 */
export function setLogLevel(level: LogLevel): void {
  rootLogger.level = level;
}

export class Logger implements LoggerLike {
  public constructor(private readonly context: string) {}

  public debug(message: string, meta?: unknown): void {
    this.write('debug', message, meta);
  }

  public log(message: string, meta?: unknown): void {
    this.write('info', message, meta);
  }

  public warn(message: string, meta?: unknown): void {
    this.write('warn', message, meta);
  }

  public error(message: string, meta?: unknown): void {
    this.write('error', message, meta);
  }

  private write(level: Level, message: string, meta?: unknown): void {
    if (meta === undefined) {
      rootLogger[level]({ context: this.context }, message);
      return;
    }
    if (meta instanceof Error) {
      rootLogger[level]({ context: this.context, err: meta }, message);
      return;
    }
    rootLogger[level]({ context: this.context, meta }, message);
  }
}
