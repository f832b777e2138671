import { z } from 'zod';
import { entityRefSchema } from '@/src/lib/bowls/bowls.schemas';

function nutrient(label: string) {
  return z
    .number({ invalid_type_error: `${label} must be a number` })
    .finite(`${label} must be a finite number`)
    .min(0, `${label} must be 0 or more`);
}

export const nutritionValuesSchema = z.object({
  calories: nutrient('Calories'),
  protein: nutrient('Protein'),
  fiber: nutrient('Fiber'),
  sugar: nutrient('Sugar'),
});

export const upsertOverrideInputSchema = nutritionValuesSchema.extend({
  ingredientId: entityRefSchema,
});

export type UpsertOverrideInput = z.infer<typeof upsertOverrideInputSchema>;
