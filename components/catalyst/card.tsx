import clsx from 'clsx';
import type React from 'react';

/**
 * Content surface for the bowl builder, saved bowl list and forms.
 */
export function Card({
  className,
  ...props
}: React.ComponentPropsWithoutRef<'section'>) {
  return (
    <section
      {...props}
      className={clsx(
        className,
        'flex flex-col rounded-lg bg-card text-card-foreground shadow-sm',
        'outline outline-1 -outline-offset-1 outline-border/50',
      )}
    />
  );
}

export function CardHeader({
  className,
  ...props
}: React.ComponentPropsWithoutRef<'div'>) {
  return <div {...props} className={clsx(className, 'px-6 pt-6 pb-4')} />;
}

export function CardBody({
  className,
  ...props
}: React.ComponentPropsWithoutRef<'div'>) {
  return <div {...props} className={clsx(className, 'flex-1 px-6 py-6')} />;
}
