import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  isEntityId,
  removeLineInputSchema,
  upsertLineInputSchema,
} from './bowls.schemas';

describe('bowl request schemas', () => {
  it('accepts any non-empty id and leaves resolution to the service', () => {
    const parsed = upsertLineInputSchema.parse({ ingredientId: 'honey', quantity: 2 });
    assert.deepStrictEqual(parsed, { ingredientId: 'honey', quantity: 2 });
  });

  it('rejects a missing id', () => {
    const result = removeLineInputSchema.safeParse({ bowlId: '  ', ingredientId: 'x' });
    assert.strictEqual(result.success, false);
    assert.strictEqual(result.error?.issues[0].message, 'Id is required');
  });

  it('rejects a zero quantity', () => {
    const result = upsertLineInputSchema.safeParse({ ingredientId: 'x', quantity: 0 });
    assert.strictEqual(result.success, false);
    assert.strictEqual(result.error?.issues[0].message, 'Quantity must be greater than 0');
  });

  it('recognises uuids', () => {
    assert.strictEqual(isEntityId('00000000-0000-4000-8000-000000000000'), true);
    assert.strictEqual(isEntityId('honey'), false);
  });
});
