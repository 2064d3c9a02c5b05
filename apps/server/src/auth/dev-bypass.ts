import { ForbiddenError } from '../utils/errors.js';
import type { AuthStore, UserProfile, UserRecord } from './session.js';

export type AuthMode = 'session' | 'dev-bypass';

/**
 * Dev bypass login: upserts a user by email and creates a session.
 * Only works when AUTH_MODE=dev-bypass.
 */
export async function devBypassLogin(
  store: AuthStore,
  authMode: AuthMode,
  profile: UserProfile,
): Promise<{ token: string; user: UserRecord }> {
  if (authMode !== 'dev-bypass') {
    throw new ForbiddenError('dev bypass login is not enabled');
  }

  const user = await store.upsertUser(profile);
  const token = await store.createSession(user.id);

  return { token, user };
}
