/**
 * en.json smoke test: every key the sign-in and registration screens read
 * resolves to a non-empty string.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import messages from '@/messages/en.json';

const AUTH_SCREEN_KEYS = {
  metadata: ['appName', 'loginTitle', 'registerTitle'],
  common: ['error'],
  auth: [
    'loginHeading',
    'loginSubheading',
    'registerHeading',
    'registerSubheading',
    'name',
    'nameHint',
    'username',
    'password',
    'passwordHint',
    'signIn',
    'signingIn',
    'register',
    'registering',
    'noAccount',
    'registerLink',
    'haveAccount',
    'loginLink',
  ],
} as const;

describe('en messages', () => {
  for (const [namespace, keys] of Object.entries(AUTH_SCREEN_KEYS)) {
    it(`has the ${namespace} strings used by the auth screens`, () => {
      const section: unknown = Reflect.get(messages, namespace);
      assert.ok(section && typeof section === 'object', `missing ${namespace}`);
      for (const key of keys) {
        const value: unknown = Reflect.get(section, key);
        assert.strictEqual(typeof value, 'string', `${namespace}.${key}`);
        assert.notStrictEqual(value, '', `${namespace}.${key}`);
      }
    });
  }
});
