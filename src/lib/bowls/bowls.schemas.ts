/**
 * Bowl Schemas
 *
 * Zod validation for bowl and bowl-line input.
 */

import { z } from 'zod';

export const DEFAULT_BOWL_NAME = 'My Bowl';

export const entityIdSchema = z.string().uuid('Invalid id');

/**
 * An id as it arrives from a form or request body. Only presence is checked
 * here; an id that matches no row is NOT_FOUND when it is resolved.
 */
export const entityRefSchema = z.string().trim().min(1, 'Id is required');

export function isEntityId(value: string): boolean {
  return entityIdSchema.safeParse(value).success;
}

export const bowlNameSchema = z
  .string()
  .trim()
  .min(1, 'Bowl name cannot be empty')
  .max(100, 'Bowl name must be at most 100 characters');

export const quantitySchema = z
  .number({ invalid_type_error: 'Quantity must be a number' })
  .finite('Quantity must be a finite number')
  .positive('Quantity must be greater than 0');

export const upsertLineInputSchema = z.object({
  bowlId: entityRefSchema.nullable().optional(),
  ingredientId: entityRefSchema,
  quantity: quantitySchema,
});

export type UpsertLineInput = z.infer<typeof upsertLineInputSchema>;

export const removeLineInputSchema = z.object({
  bowlId: entityRefSchema,
  ingredientId: entityRefSchema,
});

export const createBowlInputSchema = z.object({
  name: bowlNameSchema,
});

export const renameBowlInputSchema = z.object({
  bowlId: entityRefSchema,
  name: bowlNameSchema,
});
