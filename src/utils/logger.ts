import { ILogger, LogMeta } from '../interfaces/logger.interface.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function describeError(error: unknown): LogMeta | undefined {
  if (error === undefined) {
    return undefined;
  }
  if (error instanceof Error) {
    return { error: { name: error.name, message: error.message } };
  }
  return { error };
}

export class Logger implements ILogger {
  constructor(
    private readonly level: LogLevel = 'info',
    private readonly scope?: string
  ) {}

  debug(message: string, meta?: LogMeta): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write('warn', message, meta);
  }

  error(message: string, error?: unknown, meta?: LogMeta): void {
    const details = describeError(error);
    this.write('error', message, details || meta ? { ...details, ...meta } : undefined);
  }

  child(scope: string): ILogger {
    return new Logger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, meta?: LogMeta): void {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.level]) {
      return;
    }

    const prefix = `${new Date().toISOString()} ${level.toUpperCase()}${this.scope ? ` [${this.scope}]` : ''}`;
    const line = meta ? `${prefix} ${message} ${JSON.stringify(meta)}` : `${prefix} ${message}`;

    if (level === 'error' || level === 'warn') {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}
