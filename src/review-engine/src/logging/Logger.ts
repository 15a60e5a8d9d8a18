/**
 * Logger - Console-backed logger handed to every component via config.
 *
 * There is no module-level logger: the level and scope travel with the
 * configuration value, so two engines in one process can log differently.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  /** Derive a logger that prefixes messages with a sub-scope */
  child(scope: string): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

class ConsoleLogger implements Logger {
  constructor(
    private readonly level: LogLevel,
    private readonly scope: string
  ) {}

  debug(message: string, ...details: unknown[]): void {
    if (this.enabled('debug')) console.debug(this.format(message), ...details);
  }

  info(message: string, ...details: unknown[]): void {
    if (this.enabled('info')) console.info(this.format(message), ...details);
  }

  warn(message: string, ...details: unknown[]): void {
    if (this.enabled('warn')) console.warn(this.format(message), ...details);
  }

  error(message: string, ...details: unknown[]): void {
    if (this.enabled('error')) console.error(this.format(message), ...details);
  }

  child(scope: string): Logger {
    return new ConsoleLogger(this.level, `${this.scope}:${scope}`);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  private format(message: string): string {
    return `[${this.scope}] ${message}`;
  }
}

export function createConsoleLogger(level: LogLevel = 'info', scope: string = 'review-engine'): Logger {
  return new ConsoleLogger(level, scope);
}

/** Logger that drops everything (tests, library embedding) */
export const silentLogger: Logger = createConsoleLogger('silent');

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}
