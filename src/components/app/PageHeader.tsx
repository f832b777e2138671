import type React from 'react';

type PageHeaderProps = {
  title: React.ReactNode;
  subtitle?: React.ReactNode;
};

/**
 * Page title with an optional muted line underneath
 */
export function PageHeader({ title, subtitle }: PageHeaderProps) {
  return (
    <header className="mb-6 min-w-0">
      <h1 className="text-2xl font-semibold tracking-tight text-foreground sm:text-3xl">
        {title}
      </h1>
      {subtitle ? (
        <p className="mt-2 text-sm text-muted-foreground">{subtitle}</p>
      ) : null}
    </header>
  );
}
