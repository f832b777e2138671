import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { AppError } from '@/src/lib/errors/app-error';
import { MemoryBowlBuilderStore } from '@/src/lib/store/memoryStore';
import { UsersService, toPublicUser } from './users.service';

const failsWith = (code: string, message: string) => (error: unknown) =>
  error instanceof AppError && error.code === code && error.safeMessage === message;

describe('UsersService', () => {
  let store: MemoryBowlBuilderStore;
  let service: UsersService;

  beforeEach(() => {
    store = new MemoryBowlBuilderStore();
    service = new UsersService(store);
  });

  describe('registerUser', () => {
    it('stores the sha256 hash and defaults the name to the username', async () => {
      const user = await service.registerUser({ username: 'alice_1', password: 'test-pass!' });

      assert.strictEqual(user.name, 'alice_1');
      assert.strictEqual(
        user.passwordHash,
        '638e3db2bf90fcf266037c43cdc1dee1bab383cc8a56ea294f632989ec53e1ae',
      );
      assert.deepStrictEqual(toPublicUser(user), {
        id: user.id,
        username: 'alice_1',
        name: 'alice_1',
      });
    });

    it('keeps a trimmed display name', async () => {
      const user = await service.registerUser({
        name: '  Alice  ',
        username: 'alice',
        password: 'test-pass!',
      });
      assert.strictEqual(user.name, 'Alice');
    });

    it('rejects a taken username', async () => {
      await service.registerUser({ username: 'alice', password: 'test-pass!' });
      await assert.rejects(
        service.registerUser({ username: 'alice', password: 'other-pass!' }),
        failsWith('CONFLICT', 'Username already exists'),
      );
    });

    it('validates username and password', async () => {
      await assert.rejects(
        service.registerUser({ username: 'al', password: 'test-pass!' }),
        failsWith('VALIDATION_ERROR', 'Username must be at least 3 characters'),
      );
      await assert.rejects(
        service.registerUser({ username: 'al ice', password: 'test-pass!' }),
        failsWith('VALIDATION_ERROR', 'Username may only contain letters, digits and underscores'),
      );
      await assert.rejects(
        service.registerUser({ username: 'alice', password: 'a!' }),
        failsWith('VALIDATION_ERROR', 'Password must be at least 6 characters long'),
      );
      await assert.rejects(
        service.registerUser({ username: 'alice', password: 'testpass' }),
        failsWith('VALIDATION_ERROR', 'Password must contain at least one special character'),
      );
      assert.strictEqual(await store.findUserByUsername('alice'), null);
    });
  });

  describe('verifyCredentials', () => {
    beforeEach(async () => {
      await service.registerUser({ username: 'alice', password: 'test-pass!' });
    });

    it('returns the user for the right password', async () => {
      const user = await service.verifyCredentials({ username: 'alice', password: 'test-pass!' });
      assert.strictEqual(user.username, 'alice');
    });

    it('gives the same error for a wrong password and an unknown user', async () => {
      await assert.rejects(
        service.verifyCredentials({ username: 'alice', password: 'wrong-pass!' }),
        failsWith('AUTH_ERROR', 'Invalid username or password'),
      );
      await assert.rejects(
        service.verifyCredentials({ username: 'nobody', password: 'test-pass!' }),
        failsWith('AUTH_ERROR', 'Invalid username or password'),
      );
    });

    it('requires both fields', async () => {
      await assert.rejects(
        service.verifyCredentials({ username: '', password: 'x' }),
        failsWith('VALIDATION_ERROR', 'Username and password are required'),
      );
    });
  });
});
