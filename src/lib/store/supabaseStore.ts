/**
 * Supabase Bowl Builder Store
 *
 * Postgres-backed store (see supabase/migrations). Uniqueness and cascades
 * live in the schema; unique violations surface as CONFLICT.
 */

import 'server-only';
import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { AppError } from '@/src/lib/errors/app-error';
import { logger } from '@/src/lib/logging/logger';
import type {
  BowlBuilderStore,
  BowlLineRecord,
  BowlPatch,
  BowlRecord,
  IngredientRecord,
  NewBowl,
  NewUser,
  NutritionOverrideRecord,
  NutritionValues,
  UserRecord,
} from './store.types';

const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';

type PostgrestFailure = {
  code?: string;
  message: string;
  details?: string | null;
  hint?: string | null;
};

const userRowSchema = z.object({
  id: z.string(),
  username: z.string(),
  password_hash: z.string(),
  name: z.string(),
  created_at: z.string(),
});

const ingredientRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  calories: z.coerce.number(),
  protein: z.coerce.number(),
  fiber: z.coerce.number(),
  sugar: z.coerce.number(),
  icon_filename: z.string().nullable(),
  bowl_image_filename: z.string().nullable(),
  is_drizzle: z.boolean(),
});

const overrideRowSchema = z.object({
  user_id: z.string(),
  ingredient_id: z.string(),
  calories: z.coerce.number(),
  protein: z.coerce.number(),
  fiber: z.coerce.number(),
  sugar: z.coerce.number(),
});

const bowlRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  user_id: z.string(),
  saved: z.boolean(),
  created_at: z.string(),
});

const lineRowSchema = z.object({
  bowl_id: z.string(),
  ingredient_id: z.string(),
  quantity: z.coerce.number(),
});

function toUser(row: unknown): UserRecord {
  const r = userRowSchema.parse(row);
  return {
    id: r.id,
    username: r.username,
    passwordHash: r.password_hash,
    name: r.name,
    createdAt: r.created_at,
  };
}

function toIngredient(row: unknown): IngredientRecord {
  const r = ingredientRowSchema.parse(row);
  return {
    id: r.id,
    name: r.name,
    nutrition: {
      calories: r.calories,
      protein: r.protein,
      fiber: r.fiber,
      sugar: r.sugar,
    },
    iconFilename: r.icon_filename,
    bowlImageFilename: r.bowl_image_filename,
    isDrizzle: r.is_drizzle,
  };
}

function toOverride(row: unknown): NutritionOverrideRecord {
  const r = overrideRowSchema.parse(row);
  return {
    userId: r.user_id,
    ingredientId: r.ingredient_id,
    nutrition: {
      calories: r.calories,
      protein: r.protein,
      fiber: r.fiber,
      sugar: r.sugar,
    },
  };
}

function toBowl(row: unknown): BowlRecord {
  const r = bowlRowSchema.parse(row);
  return {
    id: r.id,
    name: r.name,
    userId: r.user_id,
    saved: r.saved,
    createdAt: r.created_at,
  };
}

function toLine(row: unknown): BowlLineRecord {
  const r = lineRowSchema.parse(row);
  return {
    bowlId: r.bowl_id,
    ingredientId: r.ingredient_id,
    quantity: r.quantity,
  };
}

function dbError(operation: string, error: PostgrestFailure): AppError {
  logger.error('store.query_failed', new Error(error.message), {
    operation,
    code: error.code,
    details: error.details,
    hint: error.hint,
  });
  return new AppError('DB_ERROR', `Failed to ${operation}`, {
    code: error.code,
  });
}

export class SupabaseBowlBuilderStore implements BowlBuilderStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async getUserById(userId: string): Promise<UserRecord | null> {
    const { data, error } = await this.supabase
      .from('app_users')
      .select('*')
      .eq('id', userId)
      .maybeSingle();
    if (error) throw dbError('load user', error);
    return data ? toUser(data) : null;
  }

  async findUserByUsername(username: string): Promise<UserRecord | null> {
    const { data, error } = await this.supabase
      .from('app_users')
      .select('*')
      .eq('username', username)
      .maybeSingle();
    if (error) throw dbError('load user', error);
    return data ? toUser(data) : null;
  }

  async insertUser(input: NewUser): Promise<UserRecord> {
    const { data, error } = await this.supabase
      .from('app_users')
      .insert({
        username: input.username,
        password_hash: input.passwordHash,
        name: input.name,
      })
      .select()
      .single();
    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        throw new AppError('CONFLICT', 'Username already exists');
      }
      throw dbError('create user', error);
    }
    return toUser(data);
  }

  async listIngredients(): Promise<IngredientRecord[]> {
    const { data, error } = await this.supabase
      .from('ingredients')
      .select('*')
      .order('created_at', { ascending: true });
    if (error) throw dbError('load ingredients', error);
    return (data ?? []).map(toIngredient);
  }

  async getIngredient(ingredientId: string): Promise<IngredientRecord | null> {
    const { data, error } = await this.supabase
      .from('ingredients')
      .select('*')
      .eq('id', ingredientId)
      .maybeSingle();
    if (error) throw dbError('load ingredient', error);
    return data ? toIngredient(data) : null;
  }

  async findOverride(
    userId: string,
    ingredientId: string,
  ): Promise<NutritionOverrideRecord | null> {
    const { data, error } = await this.supabase
      .from('user_ingredient_nutrition')
      .select('user_id, ingredient_id, calories, protein, fiber, sugar')
      .eq('user_id', userId)
      .eq('ingredient_id', ingredientId)
      .maybeSingle();
    if (error) throw dbError('load nutrition override', error);
    return data ? toOverride(data) : null;
  }

  async listOverrides(userId: string): Promise<NutritionOverrideRecord[]> {
    const { data, error } = await this.supabase
      .from('user_ingredient_nutrition')
      .select('user_id, ingredient_id, calories, protein, fiber, sugar')
      .eq('user_id', userId);
    if (error) throw dbError('load nutrition overrides', error);
    return (data ?? []).map(toOverride);
  }

  async upsertOverride(
    userId: string,
    ingredientId: string,
    nutrition: NutritionValues,
  ): Promise<NutritionOverrideRecord> {
    const { data, error } = await this.supabase
      .from('user_ingredient_nutrition')
      .upsert(
        {
          user_id: userId,
          ingredient_id: ingredientId,
          ...nutrition,
          updated_at: new Date().toISOString(),
        },
        { onConflict: 'user_id,ingredient_id' },
      )
      .select('user_id, ingredient_id, calories, protein, fiber, sugar')
      .single();
    if (error) throw dbError('save nutrition override', error);
    return toOverride(data);
  }

  async getBowl(bowlId: string): Promise<BowlRecord | null> {
    const { data, error } = await this.supabase
      .from('bowls')
      .select('*')
      .eq('id', bowlId)
      .maybeSingle();
    if (error) throw dbError('load bowl', error);
    return data ? toBowl(data) : null;
  }

  async findWorkingBowl(userId: string): Promise<BowlRecord | null> {
    const { data, error } = await this.supabase
      .from('bowls')
      .select('*')
      .eq('user_id', userId)
      .eq('saved', false)
      .maybeSingle();
    if (error) throw dbError('load working bowl', error);
    return data ? toBowl(data) : null;
  }

  async listSavedBowls(userId: string): Promise<BowlRecord[]> {
    const { data, error } = await this.supabase
      .from('bowls')
      .select('*')
      .eq('user_id', userId)
      .eq('saved', true)
      .order('created_at', { ascending: true });
    if (error) throw dbError('load saved bowls', error);
    return (data ?? []).map(toBowl);
  }

  async insertBowl(input: NewBowl): Promise<BowlRecord> {
    // Plain insert: the one-working-bowl index is partial, so upsert
    // onConflict cannot target it
    const { data, error } = await this.supabase
      .from('bowls')
      .insert({ user_id: input.userId, name: input.name, saved: input.saved })
      .select()
      .single();
    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        throw new AppError('CONFLICT', 'An unsaved bowl already exists');
      }
      throw dbError('create bowl', error);
    }
    return toBowl(data);
  }

  async updateBowl(bowlId: string, patch: BowlPatch): Promise<BowlRecord> {
    const { data, error } = await this.supabase
      .from('bowls')
      .update(patch)
      .eq('id', bowlId)
      .select()
      .maybeSingle();
    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        throw new AppError('CONFLICT', 'An unsaved bowl already exists');
      }
      throw dbError('update bowl', error);
    }
    if (!data) {
      throw new AppError('NOT_FOUND', 'Bowl not found', { bowlId });
    }
    return toBowl(data);
  }

  async deleteBowl(bowlId: string): Promise<void> {
    // bowl_lines.bowl_id is ON DELETE CASCADE
    const { error } = await this.supabase.from('bowls').delete().eq('id', bowlId);
    if (error) throw dbError('delete bowl', error);
  }

  async listLines(bowlId: string): Promise<BowlLineRecord[]> {
    const { data, error } = await this.supabase
      .from('bowl_lines')
      .select('bowl_id, ingredient_id, quantity')
      .eq('bowl_id', bowlId)
      .order('created_at', { ascending: true });
    if (error) throw dbError('load bowl lines', error);
    return (data ?? []).map(toLine);
  }

  async upsertLine(
    bowlId: string,
    ingredientId: string,
    quantity: number,
  ): Promise<BowlLineRecord> {
    // created_at is left out so an update keeps the line's position
    const { data, error } = await this.supabase
      .from('bowl_lines')
      .upsert(
        { bowl_id: bowlId, ingredient_id: ingredientId, quantity },
        { onConflict: 'bowl_id,ingredient_id' },
      )
      .select('bowl_id, ingredient_id, quantity')
      .single();
    if (error) {
      if (error.code === FOREIGN_KEY_VIOLATION) {
        throw new AppError('NOT_FOUND', 'Bowl not found', { bowlId });
      }
      throw dbError('save bowl line', error);
    }
    return toLine(data);
  }

  async deleteLine(bowlId: string, ingredientId: string): Promise<boolean> {
    const { data, error } = await this.supabase
      .from('bowl_lines')
      .delete()
      .eq('bowl_id', bowlId)
      .eq('ingredient_id', ingredientId)
      .select('bowl_id');
    if (error) throw dbError('delete bowl line', error);
    return (data ?? []).length > 0;
  }
}
