import { NextResponse } from 'next/server';
import type { ActionResult } from '@/src/lib/errors/action-result';
import { AppError, httpStatusForCode } from '@/src/lib/errors/app-error';

/**
 * ActionResult as a JSON response; failures carry the status of their code
 */
export function jsonResult<T>(
  result: ActionResult<T>,
  successStatus = 200,
): NextResponse<ActionResult<T>> {
  return NextResponse.json(result, {
    status: result.ok ? successStatus : httpStatusForCode(result.error.code),
  });
}

export async function readJsonBody(request: Request): Promise<unknown> {
  try {
    return await request.json();
  } catch (error) {
    throw new AppError('VALIDATION_ERROR', 'Request body must be valid JSON', error);
  }
}
