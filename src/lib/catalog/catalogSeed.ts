/**
 * Canonical ingredient catalog (data/ingredients.json)
 */

import { z } from 'zod';
import seedData from '@/data/ingredients.json';
import type { NewIngredient } from '@/src/lib/store/store.types';

const nutrientSchema = z.number().min(0);

export const ingredientSeedSchema = z.object({
  name: z.string().trim().min(1),
  calories: nutrientSchema,
  protein: nutrientSchema,
  fiber: nutrientSchema,
  sugar: nutrientSchema,
  icon_filename: z.string().nullable(),
  bowl_image_filename: z.string().nullable(),
  is_drizzle: z.boolean(),
});

export type IngredientSeedRow = z.infer<typeof ingredientSeedSchema>;

export function loadIngredientSeedRows(): IngredientSeedRow[] {
  return z.array(ingredientSeedSchema).parse(seedData);
}

export function seedRowToIngredient(row: IngredientSeedRow): NewIngredient {
  return {
    name: row.name,
    nutrition: {
      calories: row.calories,
      protein: row.protein,
      fiber: row.fiber,
      sugar: row.sugar,
    },
    iconFilename: row.icon_filename,
    bowlImageFilename: row.bowl_image_filename,
    isDrizzle: row.is_drizzle,
  };
}

export function loadCanonicalCatalog(): NewIngredient[] {
  return loadIngredientSeedRows().map(seedRowToIngredient);
}
