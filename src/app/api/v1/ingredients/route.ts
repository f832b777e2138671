/**
 * @route GET /api/v1/ingredients
 */

import { jsonResult } from '../_lib/json';
import { runAuthenticated } from '@/src/app/(app)/actions/authenticated-action';
import { OverridesService } from '@/src/lib/overrides/overrides.service';
import { getStore } from '@/src/lib/store';

export const dynamic = 'force-dynamic';

/**
 * Catalog in display order with the caller's effective nutrition
 */
export async function GET() {
  return jsonResult(
    await runAuthenticated('api.ingredients_failed', 'Could not load ingredients', (user) =>
      new OverridesService(getStore()).listEffectiveCatalog(user.id),
    ),
  );
}
