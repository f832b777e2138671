'use client';

import clsx from 'clsx';
import { usePathname } from 'next/navigation';
import { useTranslations } from 'next-intl';
import { ArrowRightStartOnRectangleIcon } from '@heroicons/react/20/solid';
import { Button } from '@/components/catalyst/button';
import { Link } from '@/components/catalyst/link';
import { signOut } from '@/src/app/(auth)/actions';
import { ToastProvider } from './ToastContext';

const navItems = [
  { href: '/bowl', labelKey: 'bowl' },
  { href: '/bowls', labelKey: 'bowls' },
] as const;

export function ApplicationLayout({
  userName,
  children,
}: {
  userName: string;
  children: React.ReactNode;
}) {
  const pathname = usePathname();
  const t = useTranslations();

  return (
    <ToastProvider dismissLabel={t('common.dismiss')}>
      <div className="min-h-screen bg-background">
        <header className="border-b border-border bg-card">
          <div className="mx-auto flex h-16 max-w-6xl items-center justify-between gap-4 px-4 md:px-6">
            <div className="flex items-center gap-6">
              <Link href="/bowl" className="text-lg font-semibold text-primary">
                {t('metadata.appName')}
              </Link>
              <nav className="flex items-center gap-1">
                {navItems.map((item) => (
                  <Link
                    key={item.href}
                    href={item.href}
                    className={clsx(
                      'rounded-md px-3 py-2 text-sm font-medium',
                      pathname === item.href
                        ? 'bg-muted text-foreground'
                        : 'text-muted-foreground hover:text-foreground',
                    )}
                  >
                    {t(`nav.${item.labelKey}`)}
                  </Link>
                ))}
              </nav>
            </div>
            <div className="flex items-center gap-3">
              <span className="hidden text-sm text-muted-foreground sm:inline">
                {t('nav.greeting', { name: userName })}
              </span>
              <form action={signOut}>
                <Button type="submit" plain>
                  <ArrowRightStartOnRectangleIcon data-slot="icon" />
                  {t('auth.signOut')}
                </Button>
              </form>
            </div>
          </div>
        </header>
        <main className="mx-auto max-w-6xl px-4 py-8 md:px-6">{children}</main>
      </div>
    </ToastProvider>
  );
}
