export { NoLogger, noLogger } from './no-logger';

export interface Logger {
  /**
   * General informational messages.
   */
  info(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
  createNested(prefix: string): Logger;
}

type ConsoleMethod = 'info' | 'error' | 'warn' | 'debug';

export class ConsoleLogger implements Logger {
  constructor(
    private prefix?: string,
    private _console: Pick<Console, ConsoleMethod> = console,
  ) {}

  info(message: string, data?: unknown) {
    this.write('info', message, data);
  }

  error(message: string, data?: unknown) {
    this.write('error', message, data);
  }

  warn(message: string, data?: unknown) {
    this.write('warn', message, data);
  }

  debug(message: string, data?: unknown) {
    this.write('debug', message, data);
  }

  createNested(prefix: string): ConsoleLogger {
    const combinedPrefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return new ConsoleLogger(combinedPrefix, this._console);
  }

  private write(method: ConsoleMethod, message: string, data?: unknown) {
    if (this.prefix) {
      message = `[${this.prefix}] ${message}`;
    }
    if (data !== undefined) {
      this._console[method](message, data);
    } else {
      this._console[method](message);
    }
  }
}

export interface LogEntry {
  level: 'info' | 'warn' | 'debug' | 'error';
  message: string;
  data?: unknown;
}

export class TestLogger implements Logger {
  constructor(
    private name: string = 'TestLogger',
    private logs: LogEntry[] = [],
  ) {}

  info(message: string, data?: unknown) {
    this.logs.push({ level: 'info', message, data });
  }

  warn(message: string, data?: unknown) {
    this.logs.push({ level: 'warn', message, data });
  }
  debug(message: string, data?: unknown) {
    this.logs.push({ level: 'debug', message, data });
  }
  error(message: string, data?: unknown) {
    this.logs.push({ level: 'error', message, data });
  }
  getLogs() {
    return this.logs;
  }
  getName() {
    return this.name;
  }
  clear() {
    // Nested loggers hold the same array, so empty it in place
    this.logs.length = 0;
  }
  createNested(prefix: string): TestLogger {
    const nestedPrefix = this.name ? `${this.name}:${prefix}` : prefix;
    // Share the logs array with the parent
    return new TestLogger(nestedPrefix, this.logs);
  }
}
