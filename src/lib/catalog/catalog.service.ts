/**
 * Catalog Service
 *
 * Read-only access to the ingredient catalog.
 */

import { isEntityId } from '@/src/lib/bowls/bowls.schemas';
import { AppError } from '@/src/lib/errors/app-error';
import type {
  BowlBuilderStore,
  IngredientRecord,
} from '@/src/lib/store/store.types';
import { sortByDisplayOrder } from './catalogOrder';

export class CatalogService {
  constructor(private readonly store: BowlBuilderStore) {}

  /**
   * All ingredients in picker order
   */
  async listCatalog(): Promise<IngredientRecord[]> {
    const ingredients = await this.store.listIngredients();
    return sortByDisplayOrder(ingredients);
  }

  /**
   * An id that is not a uuid cannot match and never reaches the store
   */
  async getIngredientOrThrow(ingredientId: string): Promise<IngredientRecord> {
    const ingredient = isEntityId(ingredientId)
      ? await this.store.getIngredient(ingredientId)
      : null;
    if (!ingredient) {
      throw new AppError('NOT_FOUND', 'Ingredient not found', { ingredientId });
    }
    return ingredient;
  }
}
