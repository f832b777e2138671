import type { z } from 'zod';
import { AppError } from './app-error';

/**
 * Parse service input; failures become VALIDATION_ERROR carrying the first
 * issue's message.
 */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const first = result.error.issues[0];
    throw new AppError('VALIDATION_ERROR', first ? first.message : 'Invalid input', {
      path: first ? first.path.join('.') : '',
    });
  }
  return result.data;
}
