import type { FastifyRequest, FastifyReply } from 'fastify';
import { hasRole, type UserRole } from '@regadmin/shared';
import { UnauthorizedError, ForbiddenError } from '../utils/errors.js';
import type { AuthStore, UserRecord } from './session.js';

export const COOKIE_NAME = 'regadmin_session';

declare module 'fastify' {
  interface FastifyInstance {
    authStore: AuthStore;
  }

  interface FastifyRequest {
    user: UserRecord;
  }
}

/**
 * Fastify preHandler hook that validates the session cookie
 * and attaches the authenticated user to the request.
 */
export async function requireAuth(request: FastifyRequest, _reply: FastifyReply): Promise<void> {
  const token = request.cookies[COOKIE_NAME];

  if (!token) {
    throw new UnauthorizedError('no session cookie');
  }

  const user = await request.server.authStore.validateSession(token);

  if (!user) {
    throw new UnauthorizedError('invalid or expired session');
  }

  request.user = user;
}

/**
 * Returns a preHandler that checks the user has at least the required role.
 * Must run after requireAuth.
 */
export function requireRole(role: UserRole) {
  return async (request: FastifyRequest, _reply: FastifyReply): Promise<void> => {
    if (!request.user) {
      throw new UnauthorizedError();
    }

    if (!hasRole(request.user.role, role)) {
      throw new ForbiddenError(`requires ${role} role`);
    }
  };
}
