import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createSessionToken, readSessionToken } from './session';

const SECRET = 'test-secret-0123456789';
const USER_ID = '3f1b6c2e-8a4d-4e1f-9b7a-2c5d8e0f1a3b';

describe('session tokens', () => {
  it('round-trips the user id', () => {
    const token = createSessionToken(USER_ID, SECRET);
    assert.ok(token.startsWith(`${USER_ID}.`));
    assert.strictEqual(readSessionToken(token, SECRET), USER_ID);
  });

  it('rejects a token signed with another secret', () => {
    const token = createSessionToken(USER_ID, 'other-secret-0123456789');
    assert.strictEqual(readSessionToken(token, SECRET), null);
  });

  it('rejects a token whose user id was swapped', () => {
    const token = createSessionToken(USER_ID, SECRET);
    const signature = token.slice(token.lastIndexOf('.') + 1);
    assert.strictEqual(readSessionToken(`someone-else.${signature}`, SECRET), null);
  });

  it('rejects missing and malformed tokens', () => {
    assert.strictEqual(readSessionToken(undefined, SECRET), null);
    assert.strictEqual(readSessionToken(null, SECRET), null);
    assert.strictEqual(readSessionToken('', SECRET), null);
    assert.strictEqual(readSessionToken('no-separator', SECRET), null);
    assert.strictEqual(readSessionToken('.signature', SECRET), null);
    assert.strictEqual(readSessionToken(`${USER_ID}.`, SECRET), null);
  });
});
