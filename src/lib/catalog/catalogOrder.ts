/**
 * Display order of the ingredient picker.
 */
export const INGREDIENT_DISPLAY_ORDER: readonly string[] = [
  'Greek Yogurt',
  'Plain Yogurt',
  'Strawberry Yogurt',
  'Banana',
  'Blueberries',
  'Strawberry',
  'Nuts',
  'Peanut Butter',
  'Honey',
];

const orderIndex = new Map(
  INGREDIENT_DISPLAY_ORDER.map((name, index) => [name, index]),
);

/**
 * Sort by display order; names not in the list go last and keep their
 * catalog order. Does not mutate the input.
 */
export function sortByDisplayOrder<T extends { name: string }>(
  ingredients: readonly T[],
): T[] {
  const rank = (ingredient: T) =>
    orderIndex.get(ingredient.name) ?? INGREDIENT_DISPLAY_ORDER.length;
  return [...ingredients].sort((a, b) => rank(a) - rank(b));
}
