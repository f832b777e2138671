/**
 * @route GET /api/v1/bowls   saved bowls
 * @route POST /api/v1/bowls  create the working bowl
 */

import { readJsonBody, jsonResult } from '../_lib/json';
import { runAuthenticated } from '@/src/app/(app)/actions/authenticated-action';
import { createBowlInputSchema } from '@/src/lib/bowls/bowls.schemas';
import { BowlsService } from '@/src/lib/bowls/bowls.service';
import { parseInput } from '@/src/lib/errors/validation';
import { getStore } from '@/src/lib/store';

export const dynamic = 'force-dynamic';

export async function GET() {
  return jsonResult(
    await runAuthenticated('api.bowls_list_failed', 'Could not load bowls', (user) =>
      new BowlsService(getStore()).listSavedBowls(user.id),
    ),
  );
}

/**
 * 409 while the caller still has an unsaved bowl
 */
export async function POST(request: Request) {
  return jsonResult(
    await runAuthenticated('api.bowl_create_failed', 'Could not create bowl', async (user) => {
      const { name } = parseInput(createBowlInputSchema, await readJsonBody(request));
      const service = new BowlsService(getStore());
      const bowl = await service.createBowl(user.id, name);
      return service.getBowlView(bowl.id, user.id);
    }),
    201,
  );
}
