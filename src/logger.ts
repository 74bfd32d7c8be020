export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

/**
 * Console logger writing `[scope] message` lines.
 * Messages below the configured level are dropped; errors always print.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private scope: string,
    private level: LogLevel = 'info'
  ) {}

  child(scope: string): ConsoleLogger {
    return new ConsoleLogger(scope, this.level);
  }

  debug(message: string): void {
    if (this.enabled('debug')) console.log(`[${this.scope}] ${message}`);
  }

  info(message: string): void {
    if (this.enabled('info')) console.log(`[${this.scope}] ${message}`);
  }

  warn(message: string): void {
    if (this.enabled('warn')) console.warn(`[${this.scope}] ${message}`);
  }

  error(message: string, err?: unknown): void {
    console.error(`[${this.scope}] ${message}${err === undefined ? '' : `: ${describeError(err)}`}`);
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
