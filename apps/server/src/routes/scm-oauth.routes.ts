import type { FastifyInstance } from 'fastify';
import {
  oauthCallbackQuerySchema,
  providerIdParamsSchema,
  savePatSchema,
  type AuthorizeResponse,
  type MessageResponse,
  type TokenRefreshResponse,
} from '@regadmin/shared';
import { requireAuth } from '../auth/guards.js';
import type { ScmCredentialService } from '../services/scm-credential.service.js';
import { toTokenStatusResponse } from '../services/scm-serializers.js';
import { parseInput } from '../utils/validation.js';
import { requestContext } from './request-context.js';

export interface ScmOAuthRoutesOptions {
  credentials: ScmCredentialService;
}

export async function scmOAuthRoutes(app: FastifyInstance, opts: ScmOAuthRoutesOptions) {
  const { credentials } = opts;

  const authenticated = { preHandler: [requireAuth] };

  /**
   * GET /api/v1/scm-providers/:id/oauth/authorize
   * Start connecting the current user. PAT-based providers answer with
   * instructions instead of an authorization URL.
   */
  app.get('/api/v1/scm-providers/:id/oauth/authorize', authenticated, async (request, reply) => {
    const { id } = parseInput(providerIdParamsSchema, request.params);
    const result = await credentials.authorize(id, request.user.id, requestContext(reply));

    const body: AuthorizeResponse =
      result.method === 'pat'
        ? { auth_method: 'pat', message: result.message }
        : { authorization_url: result.authorizationUrl, state: result.state };
    return reply.send(body);
  });

  /**
   * GET /api/v1/scm-providers/:id/oauth/callback
   * Browser redirect target of the provider's consent screen. Unauthenticated:
   * the user is identified by the state parameter.
   */
  app.get('/api/v1/scm-providers/:id/oauth/callback', async (request, reply) => {
    const { id } = parseInput(providerIdParamsSchema, request.params);
    const { code, state } = parseInput(oauthCallbackQuerySchema, request.query);

    const redirectUrl = await credentials.completeCallback(id, code, state, requestContext(reply));
    return reply.redirect(redirectUrl);
  });

  app.delete('/api/v1/scm-providers/:id/oauth/token', authenticated, async (request, reply) => {
    const { id } = parseInput(providerIdParamsSchema, request.params);
    await credentials.revoke(id, request.user.id, requestContext(reply));

    const body: MessageResponse = { message: 'OAuth token revoked' };
    return reply.send(body);
  });

  app.post('/api/v1/scm-providers/:id/oauth/refresh', authenticated, async (request, reply) => {
    const { id } = parseInput(providerIdParamsSchema, request.params);
    const { expiresAt } = await credentials.refresh(id, request.user.id, requestContext(reply));

    const body: TokenRefreshResponse = {
      message: 'token refreshed',
      expires_at: expiresAt ? expiresAt.toISOString() : null,
    };
    return reply.send(body);
  });

  /**
   * POST /api/v1/scm-providers/:id/token
   * Save a Personal Access Token for a PAT-based provider.
   */
  app.post('/api/v1/scm-providers/:id/token', authenticated, async (request, reply) => {
    const { id } = parseInput(providerIdParamsSchema, request.params);
    const { access_token } = parseInput(savePatSchema, request.body ?? {});
    await credentials.savePat(id, request.user.id, access_token, requestContext(reply));

    const body: MessageResponse = { message: 'Personal Access Token saved successfully' };
    return reply.send(body);
  });

  app.get('/api/v1/scm-providers/:id/oauth/token', authenticated, async (request, reply) => {
    const { id } = parseInput(providerIdParamsSchema, request.params);
    const status = await credentials.status(id, request.user.id, requestContext(reply));
    return reply.send(toTokenStatusResponse(status));
  });
}
