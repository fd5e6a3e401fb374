/**
 * Error codes carried by every {@link PathExpressionError}
 */
export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_SUPPORTED = 'NOT_SUPPORTED',
  MEMBER_ACCESS_FAILED = 'MEMBER_ACCESS_FAILED',
}

/**
 * Broad grouping of error codes
 */
export enum ErrorCategory {
  CONFIGURATION = 'CONFIGURATION',
  USAGE = 'USAGE',
  DATA = 'DATA',
}

export const ERROR_CATEGORIES: Record<ErrorCode, ErrorCategory> = {
  [ErrorCode.VALIDATION_ERROR]: ErrorCategory.CONFIGURATION,
  [ErrorCode.NOT_SUPPORTED]: ErrorCategory.USAGE,
  [ErrorCode.MEMBER_ACCESS_FAILED]: ErrorCategory.DATA,
};
