/**
 * Application Error Types
 *
 * Centralized error handling with typed error codes and safe messages.
 * Safe messages are user-facing and do not expose store internals.
 */

export type AppErrorCode =
  | 'AUTH_ERROR'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'CONFLICT'
  | 'DB_ERROR';

/**
 * Application Error
 *
 * Extends Error with a typed error code and safe user-facing message.
 */
export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly safeMessage: string;
  /** Optional payload for observability (e.g. the offending field) */
  public readonly details?: Record<string, unknown>;

  constructor(
    code: AppErrorCode,
    safeMessage: string,
    causeOrDetails?: unknown,
  ) {
    super(safeMessage);
    this.name = 'AppError';
    this.code = code;
    this.safeMessage = safeMessage;

    if (causeOrDetails instanceof Error) {
      // Preserve original error as cause (for debugging)
      this.cause = causeOrDetails;
    } else if (isPlainRecord(causeOrDetails)) {
      this.details = causeOrDetails;
    } else if (causeOrDetails) {
      this.cause = new Error(String(causeOrDetails));
    }
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): {
    code: AppErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      code: this.code,
      message: this.safeMessage,
      ...(this.details && { details: this.details }),
    };
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

const HTTP_STATUS: Record<AppErrorCode, number> = {
  AUTH_ERROR: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  VALIDATION_ERROR: 400,
  CONFLICT: 409,
  DB_ERROR: 500,
};

export function httpStatusForCode(code: AppErrorCode): number {
  return HTTP_STATUS[code];
}
