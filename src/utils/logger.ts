export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let globalLevel: LogLevel = 'info';

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Set the minimum level for every logger
 */
export function setLogLevel(level: LogLevel): void {
  globalLevel = level;
}

export class Logger {
  constructor(private readonly prefix = 'app') {}

  child(prefix: string): Logger {
    return new Logger(`${this.prefix}:${prefix}`);
  }

  debug(message: string, ...extra: unknown[]): void {
    if (this.enabled('debug')) console.debug(this.format('DEBUG', message), ...extra);
  }

  info(message: string, ...extra: unknown[]): void {
    if (this.enabled('info')) console.log(this.format('INFO', message), ...extra);
  }

  warn(message: string, ...extra: unknown[]): void {
    if (this.enabled('warn')) console.warn(this.format('WARN', message), ...extra);
  }

  error(message: string, ...extra: unknown[]): void {
    if (this.enabled('error')) console.error(this.format('ERROR', message), ...extra);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[globalLevel];
  }

  private format(level: 'DEBUG' | 'INFO' | 'WARN' | 'ERROR', message: string): string {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] [${this.prefix}] [${level}] ${message}`;
  }
}
