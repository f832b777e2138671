/**
 * Display unit labels for bowl lines.
 *
 * The catalog stores nutrition per serving without a unit column, so the
 * label is derived from the ingredient name. Rules are checked in order,
 * case-insensitively; the first match wins. "Strawberry Yogurt" must hit
 * the yogurt rule before the strawberry rule.
 */

type UnitRule = {
  matches: (name: string) => boolean;
  singular: string;
  plural: string;
};

const UNIT_RULES: readonly UnitRule[] = [
  { matches: (n) => n.includes('yogurt'), singular: 'cup', plural: 'cups' },
  { matches: (n) => n.includes('honey'), singular: 'tbsp', plural: 'tbsp' },
  { matches: (n) => n.includes('peanut'), singular: 'tbsp', plural: 'tbsp' },
  { matches: (n) => n.includes('nuts'), singular: 'cup', plural: 'cups' },
  {
    matches: (n) => n.includes('strawberry') && !n.includes('yogurt'),
    singular: 'strawberry',
    plural: 'strawberries',
  },
  { matches: (n) => n.includes('blueberr'), singular: 'cup', plural: 'cups' },
  {
    matches: (n) => n.includes('banana'),
    singular: 'medium banana',
    plural: 'medium bananas',
  },
];

/**
 * Unit label for a quantity of an ingredient; '' when no rule matches.
 * Singular only for a quantity of exactly 1.
 */
export function resolveUnitLabel(ingredientName: string, quantity: number): string {
  const name = ingredientName.toLowerCase();
  const rule = UNIT_RULES.find((candidate) => candidate.matches(name));
  if (!rule) return '';
  return quantity === 1 ? rule.singular : rule.plural;
}
