import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { AppError } from '@/src/lib/errors/app-error';
import { MemoryBowlBuilderStore } from '@/src/lib/store/memoryStore';
import type { UserRecord } from '@/src/lib/store/store.types';
import { authenticate, authorizeBowl, requireUser } from './access';
import { createSessionToken } from './session';

const SECRET = 'test-secret-0123456789';

const hasCode = (code: string) => (error: unknown) =>
  error instanceof AppError && error.code === code;

describe('access', () => {
  let store: MemoryBowlBuilderStore;
  let alice: UserRecord;
  let bob: UserRecord;

  beforeEach(async () => {
    store = new MemoryBowlBuilderStore();
    alice = await store.insertUser({ username: 'alice', passwordHash: 'h', name: 'Alice' });
    bob = await store.insertUser({ username: 'bob', passwordHash: 'h', name: 'Bob' });
  });

  it('authenticates a valid session token', async () => {
    const user = await authenticate(store, createSessionToken(alice.id, SECRET), SECRET);
    assert.strictEqual(user?.username, 'alice');
  });

  it('returns null for a forged token or a vanished user', async () => {
    assert.strictEqual(
      await authenticate(store, createSessionToken(alice.id, 'wrong-secret-000000'), SECRET),
      null,
    );
    assert.strictEqual(
      await authenticate(store, createSessionToken('ghost', SECRET), SECRET),
      null,
    );
  });

  it('requireUser throws AUTH_ERROR for anonymous callers', () => {
    assert.throws(() => requireUser(null), hasCode('AUTH_ERROR'));
    assert.strictEqual(requireUser(alice).id, alice.id);
  });

  it('authorizes the owner', async () => {
    const bowl = await store.insertBowl({ userId: alice.id, name: 'Mine', saved: false });
    const authorized = await authorizeBowl(store, bowl.id, alice.id);
    assert.strictEqual(authorized.id, bowl.id);
  });

  it('forbids another user and reports unknown bowls as NOT_FOUND', async () => {
    const bowl = await store.insertBowl({ userId: alice.id, name: 'Mine', saved: false });
    await assert.rejects(authorizeBowl(store, bowl.id, bob.id), hasCode('FORBIDDEN'));
    await assert.rejects(authorizeBowl(store, 'missing', alice.id), hasCode('NOT_FOUND'));
  });
});
