'use client';

import * as Headless from '@headlessui/react';
import { Button } from './button';

type ConfirmDialogProps = {
  open: boolean;
  onClose: () => void;
  onConfirm: () => void;
  title: string;
  description: string;
  /** Shown inside the dialog when the confirmed action failed */
  error?: string | null;
  confirmLabel: string;
  cancelLabel: string;
  isLoading?: boolean;
};

export function ConfirmDialog({
  open,
  onClose,
  onConfirm,
  title,
  description,
  error,
  confirmLabel,
  cancelLabel,
  isLoading = false,
}: ConfirmDialogProps) {
  return (
    <Headless.Dialog open={open} onClose={onClose} className="relative z-50">
      <Headless.DialogBackdrop className="fixed inset-0 bg-zinc-950/25 dark:bg-zinc-950/50" />
      <div className="fixed inset-0 flex items-center justify-center p-4">
        <Headless.DialogPanel className="w-full max-w-md rounded-2xl bg-card p-6 shadow-lg">
          <Headless.DialogTitle className="text-lg font-semibold text-foreground">
            {title}
          </Headless.DialogTitle>
          <Headless.Description className="mt-2 text-sm text-muted-foreground">
            {description}
          </Headless.Description>
          {error && (
            <div className="mt-4 rounded-lg bg-red-50 p-3 text-sm text-red-600 dark:bg-red-900/20 dark:text-red-400">
              {error}
            </div>
          )}
          <div className="mt-6 flex justify-end gap-3">
            <Button outline onClick={onClose} disabled={isLoading}>
              {cancelLabel}
            </Button>
            <Button color="red" onClick={onConfirm} disabled={isLoading}>
              {confirmLabel}
            </Button>
          </div>
        </Headless.DialogPanel>
      </div>
    </Headless.Dialog>
  );
}
