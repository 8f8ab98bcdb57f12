export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Minimal logging surface every component accepts, so tests can pass spies.
 */
export interface LoggerLike {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const value = (raw ?? '').trim().toLowerCase();
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') {
    return value;
  }
  return fallback;
}

export class Logger implements LoggerLike {
  constructor(
    private readonly level: LogLevel = 'info',
    private readonly scope?: string
  ) {}

  child(scope: string): Logger {
    return new Logger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  debug(message: string, ...meta: unknown[]): void {
    this.write('debug', message, meta);
  }

  info(message: string, ...meta: unknown[]): void {
    this.write('info', message, meta);
  }

  warn(message: string, ...meta: unknown[]): void {
    this.write('warn', message, meta);
  }

  error(message: string, ...meta: unknown[]): void {
    this.write('error', message, meta);
  }

  private write(level: LogLevel, message: string, meta: unknown[]): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const prefix = `[${new Date().toISOString()}] ${level.toUpperCase()}${
      this.scope ? ` [${this.scope}]` : ''
    }`;
    const line = `${prefix} ${message}`;
    switch (level) {
      case 'debug':
        console.debug(line, ...meta);
        return;
      case 'info':
        console.log(line, ...meta);
        return;
      case 'warn':
        console.warn(line, ...meta);
        return;
      case 'error':
        console.error(line, ...meta);
        return;
    }
  }
}

/**
 * Logger that drops everything. Used as the default where a caller supplies none.
 */
export const silentLogger: LoggerLike = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
