import { NextResponse } from 'next/server';
import { SESSION_COOKIE_NAME } from '@/src/lib/auth/session';

/**
 * Clears a session cookie whose user no longer exists, then sends the
 * browser to /login
 */
export function GET(request: Request) {
  const response = NextResponse.redirect(new URL('/login', request.url));
  response.cookies.delete(SESSION_COOKIE_NAME);
  return response;
}
