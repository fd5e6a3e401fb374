import { Logger } from './logger';

/**
 * A logger implementation that silently discards all logs.
 * Useful for:
 * - Hot paths such as per-event path resolution
 * - Testing components where logs are not relevant
 * - Explicitly suppressing all logging output
 */
export class NoLogger implements Logger {
  private static instance: NoLogger | undefined;

  private constructor() {}

  static getInstance(): NoLogger {
    if (!NoLogger.instance) {
      NoLogger.instance = new NoLogger();
    }
    return NoLogger.instance;
  }

  info(_message: string, ..._args: unknown[]): void {}
  error(_message: string, ..._args: unknown[]): void {}
  warn(_message: string, ..._args: unknown[]): void {}
  debug(_message: string, ..._args: unknown[]): void {}

  createNested(_prefix: string): Logger {
    return this;
  }
}

/**
 * A singleton instance of NoLogger that can be reused.
 */
export const noLogger = NoLogger.getInstance();
