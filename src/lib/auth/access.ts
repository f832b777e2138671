/**
 * Access control
 *
 * Resolves the acting user from a session token and enforces bowl
 * ownership. Every bowl-scoped read or write goes through authorizeBowl
 * before touching the store.
 */

import { AppError } from '@/src/lib/errors/app-error';
import type {
  BowlBuilderStore,
  BowlRecord,
  UserRecord,
} from '@/src/lib/store/store.types';
import { readSessionToken } from './session';

/**
 * User for a session token; null means anonymous
 */
export async function authenticate(
  store: BowlBuilderStore,
  sessionToken: string | null | undefined,
  secret: string,
): Promise<UserRecord | null> {
  const userId = readSessionToken(sessionToken, secret);
  if (!userId) return null;
  return store.getUserById(userId);
}

export function requireUser(user: UserRecord | null): UserRecord {
  if (!user) {
    throw new AppError('AUTH_ERROR', 'Not authenticated');
  }
  return user;
}

export async function authorizeBowl(
  store: BowlBuilderStore,
  bowlId: string,
  userId: string,
): Promise<BowlRecord> {
  const bowl = await store.getBowl(bowlId);
  if (!bowl) {
    throw new AppError('NOT_FOUND', 'Bowl not found', { bowlId });
  }
  if (bowl.userId !== userId) {
    throw new AppError('FORBIDDEN', 'Not authorized to access this bowl', {
      bowlId,
    });
  }
  return bowl;
}
