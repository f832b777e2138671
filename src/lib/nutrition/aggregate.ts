/**
 * Bowl nutrition aggregation
 *
 * Per line: the user's override for the ingredient if one exists, otherwise
 * the catalog default, multiplied by the line quantity. Totals are summed at
 * full precision; only the reported figures are rounded to 2 decimals.
 * Lines whose ingredient has left the catalog are skipped.
 */

import { AppError } from '@/src/lib/errors/app-error';
import type {
  BowlBuilderStore,
  BowlLineRecord,
  IngredientRecord,
  NutritionOverrideRecord,
  NutritionValues,
} from '@/src/lib/store/store.types';
import { classifyBowl, type BowlTags } from './tags';
import { resolveUnitLabel } from './units';

export type BowlNutritionLine = NutritionValues & {
  ingredientId: string;
  name: string;
  quantity: number;
  unit: string;
  iconFilename: string | null;
  bowlImageFilename: string | null;
  isDrizzle: boolean;
};

export type BowlNutrition = {
  bowlId: string;
  lines: BowlNutritionLine[];
  totals: NutritionValues;
  tags: BowlTags;
};

const ZERO: NutritionValues = { calories: 0, protein: 0, fiber: 0, sugar: 0 };

/**
 * Two decimal places, rounding the exact binary value; a true tie goes to
 * the even hundredth, so 0.125 becomes 0.12 and 0.375 becomes 0.38.
 */
export function roundTo2(value: number): number {
  // Only odd multiples of 1/8 sit exactly halfway between two hundredths
  if (Number.isInteger(value * 8) && !Number.isInteger(value * 100)) {
    const lower = Math.floor(value * 100);
    return (lower % 2 === 0 ? lower : lower + 1) / 100;
  }
  return Number(value.toFixed(2));
}

function scale(values: NutritionValues, quantity: number): NutritionValues {
  return {
    calories: values.calories * quantity,
    protein: values.protein * quantity,
    fiber: values.fiber * quantity,
    sugar: values.sugar * quantity,
  };
}

function add(a: NutritionValues, b: NutritionValues): NutritionValues {
  return {
    calories: a.calories + b.calories,
    protein: a.protein + b.protein,
    fiber: a.fiber + b.fiber,
    sugar: a.sugar + b.sugar,
  };
}

function rounded(values: NutritionValues): NutritionValues {
  return {
    calories: roundTo2(values.calories),
    protein: roundTo2(values.protein),
    fiber: roundTo2(values.fiber),
    sugar: roundTo2(values.sugar),
  };
}

/**
 * Pure aggregation over already-loaded rows
 */
export function summarizeBowl(
  bowlId: string,
  lines: readonly BowlLineRecord[],
  catalog: ReadonlyMap<string, IngredientRecord>,
  overrides: ReadonlyMap<string, NutritionOverrideRecord>,
): BowlNutrition {
  let totals = ZERO;
  const reported: BowlNutritionLine[] = [];

  for (const line of lines) {
    const ingredient = catalog.get(line.ingredientId);
    if (!ingredient) continue;

    const perUnit =
      overrides.get(line.ingredientId)?.nutrition ?? ingredient.nutrition;
    const lineValues = scale(perUnit, line.quantity);
    totals = add(totals, lineValues);

    reported.push({
      ingredientId: ingredient.id,
      name: ingredient.name,
      quantity: line.quantity,
      unit: resolveUnitLabel(ingredient.name, line.quantity),
      ...rounded(lineValues),
      iconFilename: ingredient.iconFilename,
      bowlImageFilename: ingredient.bowlImageFilename,
      isDrizzle: ingredient.isDrizzle,
    });
  }

  return {
    bowlId,
    lines: reported,
    totals: rounded(totals),
    tags: classifyBowl(totals),
  };
}

/**
 * Load a bowl's lines, the catalog and the user's overrides, then aggregate.
 * Callers authorize the bowl first; this only checks that it exists.
 */
export async function aggregateBowlNutrition(
  store: BowlBuilderStore,
  bowlId: string,
  userId: string,
): Promise<BowlNutrition> {
  const bowl = await store.getBowl(bowlId);
  if (!bowl) {
    throw new AppError('NOT_FOUND', 'Bowl not found', { bowlId });
  }

  const [lines, ingredients, overrides] = await Promise.all([
    store.listLines(bowlId),
    store.listIngredients(),
    store.listOverrides(userId),
  ]);

  return summarizeBowl(
    bowlId,
    lines,
    new Map(ingredients.map((ingredient) => [ingredient.id, ingredient])),
    new Map(overrides.map((override) => [override.ingredientId, override])),
  );
}
