/**
 * Session tokens
 *
 * Format: `<userId>.<signature>`, where the signature is the base64url
 * HMAC-SHA256 of the user id under SESSION_SECRET.
 */

import { createHmac, timingSafeEqual } from 'node:crypto';

export const SESSION_COOKIE_NAME = 'bowl_session';

function sign(userId: string, secret: string): string {
  return createHmac('sha256', secret).update(userId).digest('base64url');
}

export function createSessionToken(userId: string, secret: string): string {
  return `${userId}.${sign(userId, secret)}`;
}

/**
 * User id carried by a token, or null for a missing, malformed or forged one
 */
export function readSessionToken(
  token: string | null | undefined,
  secret: string,
): string | null {
  if (!token) return null;

  const separator = token.lastIndexOf('.');
  if (separator <= 0 || separator === token.length - 1) return null;

  const userId = token.slice(0, separator);
  const signature = Buffer.from(token.slice(separator + 1), 'utf8');
  const expected = Buffer.from(sign(userId, secret), 'utf8');

  if (signature.length !== expected.length) return null;
  return timingSafeEqual(signature, expected) ? userId : null;
}
