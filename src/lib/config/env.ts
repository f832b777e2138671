/**
 * Server configuration
 *
 * Parses process.env once with zod. Supabase credentials are only required
 * when the Supabase store driver is selected.
 */

import { z } from 'zod';

const flagSchema = z
  .string()
  .optional()
  .transform((value) => value === 'true' || value === '1');

export const envSchema = z
  .object({
    BOWL_STORE_DRIVER: z.enum(['supabase', 'memory']).default('supabase'),
    NEXT_PUBLIC_SUPABASE_URL: z.string().url().optional(),
    SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
    SESSION_SECRET: z
      .string({ required_error: 'SESSION_SECRET must be set' })
      .min(16, 'SESSION_SECRET must be at least 16 characters'),
    SESSION_COOKIE_SECURE: flagSchema,
  })
  .superRefine((env, ctx) => {
    if (env.BOWL_STORE_DRIVER !== 'supabase') return;
    if (!env.NEXT_PUBLIC_SUPABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['NEXT_PUBLIC_SUPABASE_URL'],
        message: 'NEXT_PUBLIC_SUPABASE_URL must be set for the supabase store',
      });
    }
    if (!env.SUPABASE_SERVICE_ROLE_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_SERVICE_ROLE_KEY'],
        message: 'SUPABASE_SERVICE_ROLE_KEY must be set for the supabase store',
      });
    }
  });

export type ServerEnv = z.infer<typeof envSchema>;

/**
 * Parse a raw environment. Throws one Error listing every problem.
 */
export function parseEnv(source: Record<string, string | undefined>): ServerEnv {
  // Empty strings from .env files count as unset
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== ''),
  );
  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => issue.message);
    throw new Error(`Invalid server configuration: ${problems.join('; ')}`);
  }
  return result.data;
}

let cached: ServerEnv | null = null;

export function getServerEnv(): ServerEnv {
  if (!cached) {
    cached = parseEnv(process.env);
  }
  return cached;
}
