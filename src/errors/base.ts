import { ErrorCategory, ErrorCode, ERROR_CATEGORIES } from './codes';

/**
 * Base error class for all path expression errors
 */
export class PathExpressionError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly context: Record<string, unknown>,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'PathExpressionError';

    // Ensure the prototype chain is set up correctly
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    // Set up the prototype chain for instanceof checks
    Object.setPrototypeOf(this, PathExpressionError.prototype);
  }

  get category(): ErrorCategory {
    return ERROR_CATEGORIES[this.code];
  }

  toString(options?: { includeStack?: boolean }): string {
    let str = `${this.name}: ${this.message}`;
    if (this.code) str += ` [code=${this.code}]`;
    for (const [key, value] of Object.entries(this.context)) {
      if (value === undefined) continue;
      str += ` [${key}=${String(value)}]`;
    }
    if (this.cause) {
      str += ` [cause=${this.cause.message}]`;
    }
    if (options?.includeStack && this.stack) {
      str += `\n${this.stack}`;
    }
    return str;
  }
}

/**
 * Error class for invalid options and configuration values
 */
export class ValidationError extends PathExpressionError {
  constructor(message: string, context: Record<string, unknown>) {
    super(message, ErrorCode.VALIDATION_ERROR, context);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Error class for operations a component deliberately does not provide
 */
export class NotSupportedError extends PathExpressionError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.NOT_SUPPORTED, context);
    this.name = 'NotSupportedError';
    Object.setPrototypeOf(this, NotSupportedError.prototype);
  }
}

/**
 * Error class for a property getter that threw while a path was being walked
 */
export class MemberAccessError extends PathExpressionError {
  constructor(
    message: string,
    context: { member: string; targetType: string; path?: string },
    cause?: Error,
  ) {
    super(message, ErrorCode.MEMBER_ACCESS_FAILED, context, cause);
    this.name = 'MemberAccessError';
    Object.setPrototypeOf(this, MemberAccessError.prototype);
  }
}
