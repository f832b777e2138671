/**
 * Nutrition Overrides Service
 *
 * Per-user replacement values for an ingredient's default nutrition. Values
 * are per unit, like the catalog defaults. Always keyed by the acting user.
 */

import { CatalogService } from '@/src/lib/catalog/catalog.service';
import { parseInput } from '@/src/lib/errors/validation';
import { hashUserId, logger } from '@/src/lib/logging/logger';
import type {
  BowlBuilderStore,
  IngredientRecord,
  NutritionOverrideRecord,
  NutritionValues,
} from '@/src/lib/store/store.types';
import { nutritionValuesSchema } from './overrides.schemas';

export type EffectiveNutrition = {
  ingredient: IngredientRecord;
  nutrition: NutritionValues;
  isOverride: boolean;
};

export class OverridesService {
  private readonly catalog: CatalogService;

  constructor(private readonly store: BowlBuilderStore) {
    this.catalog = new CatalogService(store);
  }

  async upsertOverride(
    userId: string,
    ingredientId: string,
    nutrients: NutritionValues,
  ): Promise<NutritionOverrideRecord> {
    const values = parseInput(nutritionValuesSchema, nutrients);
    const ingredient = await this.catalog.getIngredientOrThrow(ingredientId);

    const override = await this.store.upsertOverride(
      userId,
      ingredient.id,
      values,
    );
    logger.info('override.upserted', {
      user: hashUserId(userId),
      ingredientId: ingredient.id,
    });
    return override;
  }

  /**
   * What the user currently sees for an ingredient
   */
  async getEffectiveNutrition(
    userId: string,
    ingredientId: string,
  ): Promise<EffectiveNutrition> {
    const ingredient = await this.catalog.getIngredientOrThrow(ingredientId);
    const override = await this.store.findOverride(userId, ingredient.id);
    return {
      ingredient,
      nutrition: override ? override.nutrition : ingredient.nutrition,
      isOverride: override !== null,
    };
  }

  /**
   * Catalog in picker order with each ingredient's effective values
   */
  async listEffectiveCatalog(userId: string): Promise<EffectiveNutrition[]> {
    const [ingredients, overrides] = await Promise.all([
      this.catalog.listCatalog(),
      this.store.listOverrides(userId),
    ]);
    const byIngredient = new Map(
      overrides.map((override) => [override.ingredientId, override.nutrition]),
    );
    return ingredients.map((ingredient) => {
      const override = byIngredient.get(ingredient.id);
      return {
        ingredient,
        nutrition: override ?? ingredient.nutrition,
        isOverride: override !== undefined,
      };
    });
  }
}
