import { createHash, timingSafeEqual } from 'node:crypto';

/**
 * Unsalted SHA-256 hex digest.
 *
 * Kept so existing password hashes keep verifying. Not a password KDF.
 */
export function hashPassword(password: string): string {
  return createHash('sha256').update(password, 'utf8').digest('hex');
}

export function verifyPassword(password: string, passwordHash: string): boolean {
  const candidate = Buffer.from(hashPassword(password), 'utf8');
  const stored = Buffer.from(passwordHash, 'utf8');
  return candidate.length === stored.length && timingSafeEqual(candidate, stored);
}
