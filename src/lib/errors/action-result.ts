import { ZodError } from 'zod';
import { logger } from '@/src/lib/logging/logger';
import { AppError, type AppErrorCode } from './app-error';

/**
 * Action result type shared by server actions and route handlers
 */
export type ActionResult<T> =
  | { ok: true; data: T }
  | {
      ok: false;
      error: {
        code: AppErrorCode;
        message: string;
      };
    };

export type ActionFailure = Extract<ActionResult<never>, { ok: false }>;

export function actionOk<T>(data: T): ActionResult<T> {
  return { ok: true, data };
}

/**
 * Map a thrown value to a failed ActionResult.
 *
 * AppError keeps its code and safe message, zod errors become
 * VALIDATION_ERROR with the first issue. Anything else is logged and
 * reported as DB_ERROR with the fallback message.
 */
export function toActionFailure(
  error: unknown,
  fallbackMessage: string,
  event = 'action.failed',
): ActionFailure {
  if (error instanceof AppError) {
    return { ok: false, error: { code: error.code, message: error.safeMessage } };
  }

  if (error instanceof ZodError) {
    const first = error.issues[0];
    return {
      ok: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: first ? first.message : 'Invalid input',
      },
    };
  }

  logger.error(event, error);
  return { ok: false, error: { code: 'DB_ERROR', message: fallbackMessage } };
}
