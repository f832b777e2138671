/**
 * @route POST /api/v1/register
 */

import { readJsonBody, jsonResult } from '../_lib/json';
import { startSession } from '@/src/lib/auth/currentUser.server';
import { actionOk, toActionFailure } from '@/src/lib/errors/action-result';
import { getStore } from '@/src/lib/store';
import { UsersService, toPublicUser } from '@/src/lib/users/users.service';

export const dynamic = 'force-dynamic';

/**
 * Create an account and start a session for it
 */
export async function POST(request: Request) {
  try {
    const user = await new UsersService(getStore()).registerUser(
      await readJsonBody(request),
    );
    await startSession(user);
    return jsonResult(actionOk(toPublicUser(user)), 201);
  } catch (error) {
    return jsonResult(
      toActionFailure(error, 'Registration failed', 'api.register_failed'),
    );
  }
}
