/**
 * Bowls Service
 *
 * Bowl lifecycle and line mutations. Each user has at most one unsaved
 * "working" bowl, created lazily on first use; saving it frees the slot for
 * the next one. Every bowl-scoped method authorizes before it reads or writes.
 */

import { authorizeBowl } from '@/src/lib/auth/access';
import { AppError, isAppError } from '@/src/lib/errors/app-error';
import { parseInput } from '@/src/lib/errors/validation';
import { hashUserId, logger } from '@/src/lib/logging/logger';
import {
  aggregateBowlNutrition,
  type BowlNutrition,
} from '@/src/lib/nutrition/aggregate';
import type {
  BowlBuilderStore,
  BowlLineRecord,
  BowlRecord,
} from '@/src/lib/store/store.types';
import {
  DEFAULT_BOWL_NAME,
  bowlNameSchema,
  isEntityId,
  quantitySchema,
} from './bowls.schemas';

export type BowlView = {
  bowl: BowlRecord;
  nutrition: BowlNutrition;
};

export class BowlsService {
  constructor(private readonly store: BowlBuilderStore) {}

  /**
   * Ownership check: NOT_FOUND for an id that matches no bowl (malformed ids
   * included), FORBIDDEN for someone else's bowl
   */
  async authorizeBowl(bowlId: string, userId: string): Promise<BowlRecord> {
    if (!isEntityId(bowlId)) {
      throw new AppError('NOT_FOUND', 'Bowl not found', { bowlId });
    }
    return authorizeBowl(this.store, bowlId, userId);
  }

  async getBowl(bowlId: string, userId: string): Promise<BowlRecord> {
    return this.authorizeBowl(bowlId, userId);
  }

  /**
   * The user's unsaved bowl, if any. Never creates one.
   */
  async findWorkingBowl(userId: string): Promise<BowlRecord | null> {
    return this.store.findWorkingBowl(userId);
  }

  async getOrCreateWorkingBowl(userId: string): Promise<BowlRecord> {
    const existing = await this.store.findWorkingBowl(userId);
    if (existing) return existing;

    try {
      const bowl = await this.store.insertBowl({
        userId,
        name: DEFAULT_BOWL_NAME,
        saved: false,
      });
      logger.info('bowl.working_created', {
        user: hashUserId(userId),
        bowlId: bowl.id,
      });
      return bowl;
    } catch (error) {
      // A concurrent request created it first; the unique index picked the winner
      if (isAppError(error) && error.code === 'CONFLICT') {
        const winner = await this.store.findWorkingBowl(userId);
        if (winner) return winner;
      }
      throw error;
    }
  }

  async resetWorkingBowl(userId: string): Promise<void> {
    const working = await this.store.findWorkingBowl(userId);
    if (!working) return;

    await this.store.deleteBowl(working.id);
    logger.info('bowl.working_reset', {
      user: hashUserId(userId),
      bowlId: working.id,
    });
  }

  /**
   * Create a named bowl. It becomes the user's working bowl, so a second
   * unsaved bowl is rejected.
   */
  async createBowl(userId: string, name: string): Promise<BowlRecord> {
    const cleaned = parseInput(bowlNameSchema, name);
    const existing = await this.store.findWorkingBowl(userId);
    if (existing) {
      throw new AppError(
        'CONFLICT',
        'Save or reset your current bowl before starting a new one',
        { bowlId: existing.id },
      );
    }
    return this.store.insertBowl({ userId, name: cleaned, saved: false });
  }

  async renameBowl(
    bowlId: string,
    userId: string,
    name: string,
  ): Promise<BowlRecord> {
    const cleaned = parseInput(bowlNameSchema, name);
    const bowl = await this.authorizeBowl(bowlId, userId);
    return this.store.updateBowl(bowl.id, { name: cleaned });
  }

  /**
   * Mark a bowl saved. Saving a saved bowl changes nothing.
   */
  async saveBowl(bowlId: string, userId: string): Promise<BowlRecord> {
    const bowl = await this.authorizeBowl(bowlId, userId);
    if (bowl.saved) return bowl;

    const saved = await this.store.updateBowl(bowl.id, { saved: true });
    logger.info('bowl.saved', { user: hashUserId(userId), bowlId: bowl.id });
    return saved;
  }

  async deleteBowl(bowlId: string, userId: string): Promise<void> {
    const bowl = await this.authorizeBowl(bowlId, userId);
    await this.store.deleteBowl(bowl.id);
    logger.info('bowl.deleted', { user: hashUserId(userId), bowlId: bowl.id });
  }

  async listSavedBowls(userId: string): Promise<BowlRecord[]> {
    return this.store.listSavedBowls(userId);
  }

  /**
   * Add an ingredient or change its quantity. A null bowl id targets the
   * working bowl, creating it if needed.
   */
  async upsertLine(
    bowlId: string | null,
    userId: string,
    ingredientId: string,
    quantity: number,
  ): Promise<{ bowl: BowlRecord; line: BowlLineRecord }> {
    const validQuantity = parseInput(quantitySchema, quantity);

    const bowl =
      bowlId === null
        ? await this.getOrCreateWorkingBowl(userId)
        : await this.authorizeBowl(bowlId, userId);

    const ingredient = isEntityId(ingredientId)
      ? await this.store.getIngredient(ingredientId)
      : null;
    if (!ingredient) {
      throw new AppError('NOT_FOUND', 'Ingredient not found', { ingredientId });
    }

    const line = await this.store.upsertLine(
      bowl.id,
      ingredient.id,
      validQuantity,
    );
    logger.debug('bowl.line_upserted', {
      bowlId: bowl.id,
      ingredientId: ingredient.id,
      quantity: validQuantity,
    });
    return { bowl, line };
  }

  async removeLine(
    bowlId: string,
    userId: string,
    ingredientId: string,
  ): Promise<BowlRecord> {
    const bowl = await this.authorizeBowl(bowlId, userId);
    const removed =
      isEntityId(ingredientId) &&
      (await this.store.deleteLine(bowl.id, ingredientId));
    if (!removed) {
      throw new AppError('NOT_FOUND', 'Ingredient not found in bowl', {
        bowlId: bowl.id,
        ingredientId,
      });
    }
    return bowl;
  }

  /**
   * Nutrition for a bowl the user owns
   */
  async getNutrition(bowlId: string, userId: string): Promise<BowlNutrition> {
    const bowl = await this.authorizeBowl(bowlId, userId);
    return aggregateBowlNutrition(this.store, bowl.id, userId);
  }

  async getBowlView(bowlId: string, userId: string): Promise<BowlView> {
    const bowl = await this.authorizeBowl(bowlId, userId);
    const nutrition = await aggregateBowlNutrition(this.store, bowl.id, userId);
    return { bowl, nutrition };
  }
}
