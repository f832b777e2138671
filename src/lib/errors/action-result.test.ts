import { describe, it } from 'node:test';
import assert from 'node:assert';
import { z } from 'zod';
import { actionOk, toActionFailure } from './action-result';
import { AppError, httpStatusForCode } from './app-error';
import { parseInput } from './validation';

describe('toActionFailure', () => {
  it('keeps the code and safe message of an AppError', () => {
    assert.deepStrictEqual(
      toActionFailure(new AppError('FORBIDDEN', 'Not authorized to access this bowl'), 'fallback'),
      { ok: false, error: { code: 'FORBIDDEN', message: 'Not authorized to access this bowl' } },
    );
  });

  it('maps a zod error to VALIDATION_ERROR with the first issue', () => {
    const parsed = z.object({ n: z.number().min(1, 'n too small') }).safeParse({ n: 0 });
    assert.strictEqual(parsed.success, false);
    if (parsed.success) return;
    assert.deepStrictEqual(toActionFailure(parsed.error, 'fallback'), {
      ok: false,
      error: { code: 'VALIDATION_ERROR', message: 'n too small' },
    });
  });

  it('hides unexpected errors behind the fallback message', () => {
    assert.deepStrictEqual(toActionFailure(new Error('connection reset'), 'Could not load bowl'), {
      ok: false,
      error: { code: 'DB_ERROR', message: 'Could not load bowl' },
    });
  });
});

describe('actionOk', () => {
  it('wraps the data', () => {
    assert.deepStrictEqual(actionOk({ id: 'b1' }), { ok: true, data: { id: 'b1' } });
  });
});

describe('parseInput', () => {
  it('returns parsed data', () => {
    assert.strictEqual(parseInput(z.string().trim(), '  x  '), 'x');
  });

  it('throws VALIDATION_ERROR with the first issue message', () => {
    assert.throws(
      () => parseInput(z.number().positive('Quantity must be greater than 0'), 0),
      (error: unknown) =>
        error instanceof AppError &&
        error.code === 'VALIDATION_ERROR' &&
        error.safeMessage === 'Quantity must be greater than 0',
    );
  });
});

describe('httpStatusForCode', () => {
  it('maps every code', () => {
    assert.deepStrictEqual(
      (['AUTH_ERROR', 'FORBIDDEN', 'NOT_FOUND', 'VALIDATION_ERROR', 'CONFLICT', 'DB_ERROR'] as const).map(
        httpStatusForCode,
      ),
      [401, 403, 404, 400, 409, 500],
    );
  });
});

describe('AppError', () => {
  it('serializes code, message and details', () => {
    const error = new AppError('NOT_FOUND', 'Bowl not found', { bowlId: 'b1' });
    assert.deepStrictEqual(error.toJSON(), {
      code: 'NOT_FOUND',
      message: 'Bowl not found',
      details: { bowlId: 'b1' },
    });
  });

  it('keeps an Error argument as the cause', () => {
    const cause = new Error('boom');
    const error = new AppError('DB_ERROR', 'Failed', cause);
    assert.strictEqual(error.cause, cause);
    assert.strictEqual(error.details, undefined);
  });
});
