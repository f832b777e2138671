import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseEnv } from './env';

const SECRET = 'test-secret-0123456789';

describe('parseEnv', () => {
  it('accepts a memory store without Supabase credentials', () => {
    const env = parseEnv({ BOWL_STORE_DRIVER: 'memory', SESSION_SECRET: SECRET });
    assert.strictEqual(env.BOWL_STORE_DRIVER, 'memory');
    assert.strictEqual(env.SESSION_COOKIE_SECURE, false);
  });

  it('defaults to the supabase driver and requires its credentials', () => {
    assert.throws(
      () => parseEnv({ SESSION_SECRET: SECRET }),
      {
        message:
          'Invalid server configuration: NEXT_PUBLIC_SUPABASE_URL must be set for the supabase store; ' +
          'SUPABASE_SERVICE_ROLE_KEY must be set for the supabase store',
      },
    );
  });

  it('parses a full supabase configuration', () => {
    const env = parseEnv({
      NEXT_PUBLIC_SUPABASE_URL: 'http://localhost:54321',
      SUPABASE_SERVICE_ROLE_KEY: 'test-service-key',
      SESSION_SECRET: SECRET,
      SESSION_COOKIE_SECURE: 'true',
    });
    assert.strictEqual(env.BOWL_STORE_DRIVER, 'supabase');
    assert.strictEqual(env.SESSION_COOKIE_SECURE, true);
  });

  it('treats empty strings as unset', () => {
    assert.throws(
      () => parseEnv({ BOWL_STORE_DRIVER: 'memory', SESSION_SECRET: '' }),
      { message: 'Invalid server configuration: SESSION_SECRET must be set' },
    );
  });

  it('rejects a short session secret', () => {
    assert.throws(
      () => parseEnv({ BOWL_STORE_DRIVER: 'memory', SESSION_SECRET: 'short' }),
      { message: 'Invalid server configuration: SESSION_SECRET must be at least 16 characters' },
    );
  });
});
