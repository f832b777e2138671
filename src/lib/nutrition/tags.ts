import type { NutritionValues } from '@/src/lib/store/store.types';

export type ProteinTag = 'High Protein' | 'Moderate Protein' | 'Low Protein';
export type FiberTag = 'High Fiber' | 'Moderate Fiber' | 'Low Fiber';
export type SugarTag = 'High Sugar' | 'Moderate Sugar' | 'Low Sugar';

export type BowlTags = [ProteinTag, FiberTag, SugarTag];

type Tiers<T extends string> = {
  high: { min: number; tag: T };
  moderate: { min: number; tag: T };
  low: T;
};

// Lower bounds are inclusive
const PROTEIN_TIERS: Tiers<ProteinTag> = {
  high: { min: 20, tag: 'High Protein' },
  moderate: { min: 10, tag: 'Moderate Protein' },
  low: 'Low Protein',
};

const FIBER_TIERS: Tiers<FiberTag> = {
  high: { min: 6, tag: 'High Fiber' },
  moderate: { min: 3, tag: 'Moderate Fiber' },
  low: 'Low Fiber',
};

const SUGAR_TIERS: Tiers<SugarTag> = {
  high: { min: 20, tag: 'High Sugar' },
  moderate: { min: 10, tag: 'Moderate Sugar' },
  low: 'Low Sugar',
};

function classify<T extends string>(value: number, tiers: Tiers<T>): T {
  if (value >= tiers.high.min) return tiers.high.tag;
  if (value >= tiers.moderate.min) return tiers.moderate.tag;
  return tiers.low;
}

/**
 * Protein, fiber and sugar level of a bowl, in that order.
 * Calories are not tagged.
 */
export function classifyBowl(totals: NutritionValues): BowlTags {
  return [
    classify(totals.protein, PROTEIN_TIERS),
    classify(totals.fiber, FIBER_TIERS),
    classify(totals.sugar, SUGAR_TIERS),
  ];
}
