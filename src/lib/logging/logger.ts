/**
 * Structured logging
 *
 * JSON lines through console. Debug events only when BOWL_DEBUG_LOG is set.
 * User ids are hashed before they reach a log line.
 */

import { createHash } from 'node:crypto';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const DEBUG_LOG =
  process.env.BOWL_DEBUG_LOG === 'true' || process.env.BOWL_DEBUG_LOG === '1';

export function hashUserId(userId: string): string {
  return createHash('sha256').update(userId).digest('hex').slice(0, 8);
}

function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}

function emit(
  level: LogLevel,
  event: string,
  payload: Record<string, unknown>,
): void {
  const line = JSON.stringify({
    ts: new Date().toISOString(),
    level,
    event,
    ...payload,
  });
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export const logger = {
  debug(event: string, payload: Record<string, unknown> = {}): void {
    if (DEBUG_LOG) emit('debug', event, payload);
  },
  info(event: string, payload: Record<string, unknown> = {}): void {
    emit('info', event, payload);
  },
  warn(event: string, payload: Record<string, unknown> = {}): void {
    emit('warn', event, payload);
  },
  error(
    event: string,
    error: unknown,
    payload: Record<string, unknown> = {},
  ): void {
    emit('error', event, { ...payload, error: serializeError(error) });
  },
};
