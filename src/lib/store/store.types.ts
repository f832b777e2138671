/**
 * Bowl Builder Store
 *
 * Persistence contract for users, the ingredient catalog, per-user nutrition
 * overrides, bowls and bowl lines. Implementations enforce the uniqueness
 * invariants (username, override per user+ingredient, line per
 * bowl+ingredient, one unsaved bowl per user) and cascade line deletes.
 */

/**
 * Per-unit nutrition values (kcal, grams)
 */
export type NutritionValues = {
  calories: number;
  protein: number;
  fiber: number;
  sugar: number;
};

export type UserRecord = {
  id: string;
  username: string;
  passwordHash: string;
  name: string;
  createdAt: string;
};

export type NewUser = {
  username: string;
  passwordHash: string;
  name: string;
};

export type IngredientRecord = {
  id: string;
  name: string;
  nutrition: NutritionValues;
  iconFilename: string | null;
  bowlImageFilename: string | null;
  /** Rendered as a drizzle over the bowl; no effect on nutrition */
  isDrizzle: boolean;
};

export type NewIngredient = Omit<IngredientRecord, 'id'> & { id?: string };

export type NutritionOverrideRecord = {
  userId: string;
  ingredientId: string;
  nutrition: NutritionValues;
};

export type BowlRecord = {
  id: string;
  name: string;
  userId: string;
  saved: boolean;
  createdAt: string;
};

export type NewBowl = {
  userId: string;
  name: string;
  saved: boolean;
};

export type BowlPatch = {
  name?: string;
  saved?: boolean;
};

export type BowlLineRecord = {
  bowlId: string;
  ingredientId: string;
  quantity: number;
};

export interface BowlBuilderStore {
  // Users
  getUserById(userId: string): Promise<UserRecord | null>;
  findUserByUsername(username: string): Promise<UserRecord | null>;
  /** Throws AppError CONFLICT when the username is taken */
  insertUser(input: NewUser): Promise<UserRecord>;

  // Catalog
  listIngredients(): Promise<IngredientRecord[]>;
  getIngredient(ingredientId: string): Promise<IngredientRecord | null>;

  // Overrides
  findOverride(
    userId: string,
    ingredientId: string,
  ): Promise<NutritionOverrideRecord | null>;
  listOverrides(userId: string): Promise<NutritionOverrideRecord[]>;
  upsertOverride(
    userId: string,
    ingredientId: string,
    nutrition: NutritionValues,
  ): Promise<NutritionOverrideRecord>;

  // Bowls
  getBowl(bowlId: string): Promise<BowlRecord | null>;
  findWorkingBowl(userId: string): Promise<BowlRecord | null>;
  listSavedBowls(userId: string): Promise<BowlRecord[]>;
  /** Throws AppError CONFLICT when an unsaved bowl already exists for the user */
  insertBowl(input: NewBowl): Promise<BowlRecord>;
  /** Throws AppError NOT_FOUND when the bowl does not exist */
  updateBowl(bowlId: string, patch: BowlPatch): Promise<BowlRecord>;
  /** Removes the bowl and all of its lines */
  deleteBowl(bowlId: string): Promise<void>;

  // Lines, in insertion order
  listLines(bowlId: string): Promise<BowlLineRecord[]>;
  upsertLine(
    bowlId: string,
    ingredientId: string,
    quantity: number,
  ): Promise<BowlLineRecord>;
  /** Returns false when no such line existed */
  deleteLine(bowlId: string, ingredientId: string): Promise<boolean>;
}
