/**
 * Users Service
 *
 * Registration and credential checks. Usernames are unique; the display
 * name falls back to the username when none is given.
 */

import { hashPassword, verifyPassword } from '@/src/lib/auth/password';
import { AppError } from '@/src/lib/errors/app-error';
import { parseInput } from '@/src/lib/errors/validation';
import { hashUserId, logger } from '@/src/lib/logging/logger';
import type { BowlBuilderStore, UserRecord } from '@/src/lib/store/store.types';
import { credentialsSchema, registerInputSchema } from './users.schemas';

/**
 * User fields that are safe to hand to pages and API clients
 */
export type PublicUser = Pick<UserRecord, 'id' | 'username' | 'name'>;

export function toPublicUser(user: UserRecord): PublicUser {
  return { id: user.id, username: user.username, name: user.name };
}

export class UsersService {
  constructor(private readonly store: BowlBuilderStore) {}

  async registerUser(raw: unknown): Promise<UserRecord> {
    const input = parseInput(registerInputSchema, raw);

    const existing = await this.store.findUserByUsername(input.username);
    if (existing) {
      throw new AppError('CONFLICT', 'Username already exists');
    }

    const user = await this.store.insertUser({
      username: input.username,
      passwordHash: hashPassword(input.password),
      name: input.name ?? input.username,
    });
    logger.info('user.registered', { user: hashUserId(user.id) });
    return user;
  }

  async verifyCredentials(raw: unknown): Promise<UserRecord> {
    const { username, password } = parseInput(credentialsSchema, raw);

    const user = await this.store.findUserByUsername(username);
    if (!user || !verifyPassword(password, user.passwordHash)) {
      throw new AppError('AUTH_ERROR', 'Invalid username or password');
    }
    return user;
  }
}
