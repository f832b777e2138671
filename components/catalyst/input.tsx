import * as Headless from '@headlessui/react';
import clsx from 'clsx';
import React, { forwardRef } from 'react';

export const Input = forwardRef(function Input(
  {
    className,
    ...props
  }: {
    className?: string;
    type?: 'number' | 'password' | 'text';
  } & Omit<Headless.InputProps, 'as' | 'className'>,
  ref: React.ForwardedRef<HTMLInputElement>,
) {
  return (
    <span
      data-slot="control"
      className={clsx([
        className,
        'relative block w-full',
        // Focus ring on the wrapper so it sits outside the border
        'after:pointer-events-none after:absolute after:inset-0 after:rounded-lg after:ring-transparent after:ring-inset sm:focus-within:after:ring-2 sm:focus-within:after:ring-blue-500',
        'has-data-disabled:cursor-not-allowed has-data-disabled:opacity-50',
      ])}
    >
      <Headless.Input
        ref={ref}
        {...props}
        className={clsx([
          'relative block h-10 w-full appearance-none rounded-lg px-3 py-2 text-base/6 sm:text-sm/6',
          'text-foreground placeholder:text-muted-foreground',
          'border border-border data-hover:border-border/80',
          'bg-transparent dark:bg-input',
          'focus:outline-hidden',
          // Hide number spinners; quantities are typed
          '[appearance:textfield] [&::-webkit-inner-spin-button]:appearance-none [&::-webkit-outer-spin-button]:appearance-none',
          'data-invalid:border-red-500/80 dark:data-invalid:border-red-500/60',
          'data-disabled:border-border/50 data-disabled:bg-muted/30',
        ])}
      />
    </span>
  );
});
