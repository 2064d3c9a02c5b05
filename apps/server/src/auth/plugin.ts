import type { FastifyInstance } from 'fastify';
import { devBypassLoginSchema, type User } from '@regadmin/shared';
import { env } from '../config/env.js';
import { parseInput } from '../utils/validation.js';
import { devBypassLogin, type AuthMode } from './dev-bypass.js';
import { COOKIE_NAME, requireAuth } from './guards.js';
import { SESSION_EXPIRY_DAYS, type UserRecord } from './session.js';

const COOKIE_MAX_AGE_SECONDS = SESSION_EXPIRY_DAYS * 24 * 60 * 60;

export interface AuthPluginOptions {
  authMode: AuthMode;
}

function buildCookieOptions() {
  return {
    path: '/' as const,
    httpOnly: true,
    secure: env.COOKIE_SECURE ? env.COOKIE_SECURE === 'true' : env.NODE_ENV === 'production',
    sameSite: 'lax' as const,
    maxAge: COOKIE_MAX_AGE_SECONDS,
  };
}

function toUserResponse(user: UserRecord): User {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    role: user.role,
    createdAt: user.createdAt.toISOString(),
    updatedAt: user.updatedAt.toISOString(),
  };
}

export async function authPlugin(app: FastifyInstance, opts: AuthPluginOptions) {
  /**
   * POST /auth/dev-login
   * Local development only: sign in as any user without an identity provider.
   */
  app.post('/auth/dev-login', async (request, reply) => {
    const profile = parseInput(devBypassLoginSchema, request.body ?? {});
    const { token, user } = await devBypassLogin(app.authStore, opts.authMode, profile);
    reply.setCookie(COOKIE_NAME, token, buildCookieOptions());

    request.log.info({ userId: user.id }, 'User logged in via dev bypass');

    return reply.send({ user: toUserResponse(user) });
  });

  /**
   * GET /auth/me
   * Returns the currently authenticated user.
   */
  app.get('/auth/me', { preHandler: [requireAuth] }, async (request, reply) => {
    return reply.send({ user: toUserResponse(request.user) });
  });

  /**
   * POST /auth/logout
   * Destroys the session and clears the cookie.
   */
  app.post('/auth/logout', async (request, reply) => {
    const token = request.cookies[COOKIE_NAME];

    if (token) {
      await app.authStore.deleteSession(token);
    }

    reply.clearCookie(COOKIE_NAME, { path: '/' });

    return reply.send({ success: true });
  });
}
