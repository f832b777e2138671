/**
 * Session cookie helpers for pages, server actions and route handlers.
 * The resolved user is passed explicitly into every service call.
 */

import 'server-only';
import { cookies } from 'next/headers';
import { getServerEnv } from '@/src/lib/config/env';
import { getStore } from '@/src/lib/store';
import type { UserRecord } from '@/src/lib/store/store.types';
import { authenticate, requireUser } from './access';
import { SESSION_COOKIE_NAME, createSessionToken } from './session';

export async function getCurrentUser(): Promise<UserRecord | null> {
  const cookieStore = await cookies();
  const token = cookieStore.get(SESSION_COOKIE_NAME)?.value;
  return authenticate(getStore(), token, getServerEnv().SESSION_SECRET);
}

/**
 * Throws AppError AUTH_ERROR when nobody is signed in
 */
export async function requireCurrentUser(): Promise<UserRecord> {
  return requireUser(await getCurrentUser());
}

/**
 * Only callable from server actions and route handlers
 */
export async function startSession(user: UserRecord): Promise<void> {
  const env = getServerEnv();
  const cookieStore = await cookies();
  cookieStore.set(SESSION_COOKIE_NAME, createSessionToken(user.id, env.SESSION_SECRET), {
    httpOnly: true,
    sameSite: 'lax',
    secure: env.SESSION_COOKIE_SECURE,
    path: '/',
  });
}

export async function endSession(): Promise<void> {
  const cookieStore = await cookies();
  cookieStore.delete(SESSION_COOKIE_NAME);
}
