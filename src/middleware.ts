import type { NextRequest } from 'next/server';
import { NextResponse } from 'next/server';
import { getServerEnv } from '@/src/lib/config/env';
import { SESSION_COOKIE_NAME, readSessionToken } from '@/src/lib/auth/session';

const publicRoutes = ['/login', '/register'];

/**
 * Page routing by session signature. Whether the user still exists is
 * checked later by getCurrentUser.
 */
export function middleware(request: NextRequest) {
  const { pathname } = request.nextUrl;

  // The JSON API answers 401 itself
  if (pathname.startsWith('/api')) {
    return NextResponse.next();
  }

  const userId = readSessionToken(
    request.cookies.get(SESSION_COOKIE_NAME)?.value,
    getServerEnv().SESSION_SECRET,
  );
  const isPublicRoute = publicRoutes.some((route) =>
    pathname.startsWith(route),
  );

  if (!userId && !isPublicRoute && pathname !== '/') {
    const redirectUrl = new URL('/login', request.url);
    redirectUrl.searchParams.set('redirect', pathname);
    return NextResponse.redirect(redirectUrl);
  }

  if (userId && isPublicRoute) {
    return NextResponse.redirect(new URL('/bowl', request.url));
  }

  return NextResponse.next();
}

export const config = {
  runtime: 'nodejs',
  matcher: [
    '/((?!_next/static|_next/image|favicon.ico|.*\\.(?:svg|png|jpg|jpeg|gif|webp)$).*)',
  ],
};
