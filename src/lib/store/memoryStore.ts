/**
 * In-memory Bowl Builder Store
 *
 * Process-local implementation used by unit tests and by local development
 * (BOWL_STORE_DRIVER=memory). Enforces the same uniqueness constraints and
 * cascades as the database schema.
 */

import { randomUUID } from 'node:crypto';
import { AppError } from '@/src/lib/errors/app-error';
import type {
  BowlBuilderStore,
  BowlLineRecord,
  BowlPatch,
  BowlRecord,
  IngredientRecord,
  NewBowl,
  NewIngredient,
  NewUser,
  NutritionOverrideRecord,
  NutritionValues,
  UserRecord,
} from './store.types';

function overrideKey(userId: string, ingredientId: string): string {
  return `${userId}:${ingredientId}`;
}

export class MemoryBowlBuilderStore implements BowlBuilderStore {
  private readonly users = new Map<string, UserRecord>();
  private readonly ingredients = new Map<string, IngredientRecord>();
  private readonly overrides = new Map<string, NutritionOverrideRecord>();
  private readonly bowls = new Map<string, BowlRecord>();
  /** bowlId -> ingredientId -> line; Map keeps insertion order */
  private readonly lines = new Map<string, Map<string, BowlLineRecord>>();
  private clock = 0;

  constructor(catalog: NewIngredient[] = []) {
    for (const ingredient of catalog) {
      this.addIngredient(ingredient);
    }
  }

  /**
   * Catalog administration (tests and seeding only)
   */
  addIngredient(input: NewIngredient): IngredientRecord {
    const record: IngredientRecord = {
      ...input,
      id: input.id ?? randomUUID(),
      nutrition: { ...input.nutrition },
    };
    this.ingredients.set(record.id, record);
    return { ...record, nutrition: { ...record.nutrition } };
  }

  removeIngredient(ingredientId: string): void {
    this.ingredients.delete(ingredientId);
  }

  private timestamp(): string {
    // Monotonic so records created in one tick still order deterministically
    this.clock += 1;
    return new Date(Date.UTC(2026, 0, 1) + this.clock).toISOString();
  }

  async getUserById(userId: string): Promise<UserRecord | null> {
    const user = this.users.get(userId);
    return user ? { ...user } : null;
  }

  // Uniqueness checks stay synchronous so check and insert cannot interleave
  private userByUsername(username: string): UserRecord | undefined {
    for (const user of this.users.values()) {
      if (user.username === username) return user;
    }
    return undefined;
  }

  private workingBowlOf(userId: string): BowlRecord | undefined {
    for (const bowl of this.bowls.values()) {
      if (bowl.userId === userId && !bowl.saved) return bowl;
    }
    return undefined;
  }

  async findUserByUsername(username: string): Promise<UserRecord | null> {
    const user = this.userByUsername(username);
    return user ? { ...user } : null;
  }

  async insertUser(input: NewUser): Promise<UserRecord> {
    if (this.userByUsername(input.username)) {
      throw new AppError('CONFLICT', 'Username already exists');
    }
    const user: UserRecord = {
      id: randomUUID(),
      ...input,
      createdAt: this.timestamp(),
    };
    this.users.set(user.id, user);
    return { ...user };
  }

  async listIngredients(): Promise<IngredientRecord[]> {
    return [...this.ingredients.values()].map((ingredient) => ({
      ...ingredient,
      nutrition: { ...ingredient.nutrition },
    }));
  }

  async getIngredient(ingredientId: string): Promise<IngredientRecord | null> {
    const ingredient = this.ingredients.get(ingredientId);
    return ingredient
      ? { ...ingredient, nutrition: { ...ingredient.nutrition } }
      : null;
  }

  async findOverride(
    userId: string,
    ingredientId: string,
  ): Promise<NutritionOverrideRecord | null> {
    const override = this.overrides.get(overrideKey(userId, ingredientId));
    return override ? { ...override, nutrition: { ...override.nutrition } } : null;
  }

  async listOverrides(userId: string): Promise<NutritionOverrideRecord[]> {
    return [...this.overrides.values()]
      .filter((override) => override.userId === userId)
      .map((override) => ({ ...override, nutrition: { ...override.nutrition } }));
  }

  async upsertOverride(
    userId: string,
    ingredientId: string,
    nutrition: NutritionValues,
  ): Promise<NutritionOverrideRecord> {
    const record: NutritionOverrideRecord = {
      userId,
      ingredientId,
      nutrition: { ...nutrition },
    };
    this.overrides.set(overrideKey(userId, ingredientId), record);
    return { ...record, nutrition: { ...nutrition } };
  }

  async getBowl(bowlId: string): Promise<BowlRecord | null> {
    const bowl = this.bowls.get(bowlId);
    return bowl ? { ...bowl } : null;
  }

  async findWorkingBowl(userId: string): Promise<BowlRecord | null> {
    const bowl = this.workingBowlOf(userId);
    return bowl ? { ...bowl } : null;
  }

  async listSavedBowls(userId: string): Promise<BowlRecord[]> {
    return [...this.bowls.values()]
      .filter((bowl) => bowl.userId === userId && bowl.saved)
      .map((bowl) => ({ ...bowl }));
  }

  async insertBowl(input: NewBowl): Promise<BowlRecord> {
    if (!input.saved && this.workingBowlOf(input.userId)) {
      throw new AppError('CONFLICT', 'An unsaved bowl already exists');
    }
    const bowl: BowlRecord = {
      id: randomUUID(),
      ...input,
      createdAt: this.timestamp(),
    };
    this.bowls.set(bowl.id, bowl);
    this.lines.set(bowl.id, new Map());
    return { ...bowl };
  }

  async updateBowl(bowlId: string, patch: BowlPatch): Promise<BowlRecord> {
    const bowl = this.bowls.get(bowlId);
    if (!bowl) {
      throw new AppError('NOT_FOUND', 'Bowl not found');
    }
    if (patch.saved === false && bowl.saved && this.workingBowlOf(bowl.userId)) {
      throw new AppError('CONFLICT', 'An unsaved bowl already exists');
    }
    const updated: BowlRecord = {
      ...bowl,
      ...(patch.name !== undefined && { name: patch.name }),
      ...(patch.saved !== undefined && { saved: patch.saved }),
    };
    this.bowls.set(bowlId, updated);
    return { ...updated };
  }

  async deleteBowl(bowlId: string): Promise<void> {
    this.lines.delete(bowlId);
    this.bowls.delete(bowlId);
  }

  async listLines(bowlId: string): Promise<BowlLineRecord[]> {
    const bowlLines = this.lines.get(bowlId);
    return bowlLines ? [...bowlLines.values()].map((line) => ({ ...line })) : [];
  }

  async upsertLine(
    bowlId: string,
    ingredientId: string,
    quantity: number,
  ): Promise<BowlLineRecord> {
    const bowlLines = this.lines.get(bowlId);
    if (!bowlLines) {
      // Foreign key on bowl_lines.bowl_id
      throw new AppError('NOT_FOUND', 'Bowl not found');
    }
    const existing = bowlLines.get(ingredientId);
    if (existing) {
      existing.quantity = quantity;
      return { ...existing };
    }
    const line: BowlLineRecord = { bowlId, ingredientId, quantity };
    bowlLines.set(ingredientId, line);
    return { ...line };
  }

  async deleteLine(bowlId: string, ingredientId: string): Promise<boolean> {
    return this.lines.get(bowlId)?.delete(ingredientId) ?? false;
  }

  /**
   * Total line rows across all bowls (orphan checks in tests)
   */
  countLines(): number {
    let count = 0;
    for (const bowlLines of this.lines.values()) count += bowlLines.size;
    return count;
  }
}
