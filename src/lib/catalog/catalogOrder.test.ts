import { describe, it } from 'node:test';
import assert from 'node:assert';
import { CatalogService } from './catalog.service';
import { INGREDIENT_DISPLAY_ORDER, sortByDisplayOrder } from './catalogOrder';
import { loadCanonicalCatalog } from './catalogSeed';
import { AppError } from '@/src/lib/errors/app-error';
import { MemoryBowlBuilderStore } from '@/src/lib/store/memoryStore';

describe('sortByDisplayOrder', () => {
  it('orders known names by the picker order', () => {
    const sorted = sortByDisplayOrder([
      { name: 'Honey' },
      { name: 'Banana' },
      { name: 'Greek Yogurt' },
    ]);
    assert.deepStrictEqual(
      sorted.map((item) => item.name),
      ['Greek Yogurt', 'Banana', 'Honey'],
    );
  });

  it('puts unknown names last in their original order', () => {
    const input = [
      { name: 'Chia Seeds' },
      { name: 'Nuts' },
      { name: 'Granola' },
      { name: 'Plain Yogurt' },
    ];
    const sorted = sortByDisplayOrder(input);
    assert.deepStrictEqual(
      sorted.map((item) => item.name),
      ['Plain Yogurt', 'Nuts', 'Chia Seeds', 'Granola'],
    );
    assert.strictEqual(input[0].name, 'Chia Seeds');
  });
});

describe('CatalogService', () => {
  it('lists the seeded catalog in display order', async () => {
    const service = new CatalogService(
      new MemoryBowlBuilderStore(loadCanonicalCatalog()),
    );
    const catalog = await service.listCatalog();
    assert.deepStrictEqual(
      catalog.map((ingredient) => ingredient.name),
      [...INGREDIENT_DISPLAY_ORDER],
    );
  });

  it('throws NOT_FOUND for an unknown ingredient', async () => {
    const service = new CatalogService(new MemoryBowlBuilderStore());
    await assert.rejects(
      service.getIngredientOrThrow('missing'),
      (error: unknown) => error instanceof AppError && error.code === 'NOT_FOUND',
    );
  });
});
