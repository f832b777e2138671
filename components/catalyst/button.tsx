import * as Headless from '@headlessui/react';
import clsx from 'clsx';
import type React from 'react';
import { Link } from './link';

const styles = {
  base: [
    // Layout
    'relative isolate inline-flex items-center justify-center gap-x-2 rounded-lg border text-base/6 font-semibold',
    // Sizing
    'px-3.5 py-2.5 sm:px-3 sm:py-1.5 sm:text-sm/6',
    // Focus
    'focus:outline-hidden data-focus:outline-2 data-focus:outline-offset-2 data-focus:outline-blue-500',
    // Disabled
    'data-disabled:opacity-50',
    // Icon
    '*:data-[slot=icon]:-mx-0.5 *:data-[slot=icon]:my-0.5 *:data-[slot=icon]:size-5 *:data-[slot=icon]:shrink-0 sm:*:data-[slot=icon]:my-1 sm:*:data-[slot=icon]:size-4',
  ],
  solid: 'border-transparent shadow-sm',
  outline:
    'border-zinc-950/10 text-zinc-950 data-active:bg-zinc-950/2.5 data-hover:bg-zinc-950/2.5 dark:border-white/15 dark:text-white',
  plain:
    'border-transparent text-zinc-950 data-active:bg-zinc-950/5 data-hover:bg-zinc-950/5 dark:text-white dark:data-hover:bg-white/10',
  colors: {
    primary: 'bg-blue-600 text-white data-hover:bg-blue-500',
    zinc: 'bg-zinc-900 text-white data-hover:bg-zinc-800 dark:bg-zinc-600',
    red: 'bg-red-600 text-white data-hover:bg-red-500',
  },
};

type ButtonProps = (
  | { color?: keyof typeof styles.colors; outline?: never; plain?: never }
  | { color?: never; outline: true; plain?: never }
  | { color?: never; outline?: never; plain: true }
) & { className?: string; children: React.ReactNode } & (
    | Omit<Headless.ButtonProps, 'as' | 'className'>
    | Omit<React.ComponentPropsWithoutRef<typeof Link>, 'className'>
  );

export function Button({
  color,
  outline,
  plain,
  className,
  children,
  ...props
}: ButtonProps) {
  const classes = clsx(
    className,
    styles.base,
    outline
      ? styles.outline
      : plain
        ? styles.plain
        : clsx(styles.solid, styles.colors[color ?? 'primary']),
  );

  return 'href' in props ? (
    <Link {...props} className={classes}>
      {children}
    </Link>
  ) : (
    <Headless.Button {...props} className={clsx(classes, 'cursor-default')}>
      {children}
    </Headless.Button>
  );
}
