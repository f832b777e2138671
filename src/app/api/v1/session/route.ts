/**
 * @route POST /api/v1/session   sign in
 * @route DELETE /api/v1/session sign out
 */

import { readJsonBody, jsonResult } from '../_lib/json';
import { endSession, startSession } from '@/src/lib/auth/currentUser.server';
import { actionOk, toActionFailure } from '@/src/lib/errors/action-result';
import { getStore } from '@/src/lib/store';
import { UsersService, toPublicUser } from '@/src/lib/users/users.service';

export const dynamic = 'force-dynamic';

export async function POST(request: Request) {
  try {
    const user = await new UsersService(getStore()).verifyCredentials(
      await readJsonBody(request),
    );
    await startSession(user);
    return jsonResult(actionOk(toPublicUser(user)));
  } catch (error) {
    return jsonResult(
      toActionFailure(error, 'Sign-in failed', 'api.sign_in_failed'),
    );
  }
}

export async function DELETE() {
  await endSession();
  return jsonResult(actionOk(null));
}
