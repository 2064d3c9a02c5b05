import type { FastifyInstance } from 'fastify';
import {
  createScmProviderSchema,
  listScmProvidersQuerySchema,
  providerIdParamsSchema,
  updateScmProviderSchema,
} from '@regadmin/shared';
import { requireAuth, requireRole } from '../auth/guards.js';
import type { ScmProviderService } from '../services/scm-provider.service.js';
import { toProviderResponse } from '../services/scm-serializers.js';
import { parseInput } from '../utils/validation.js';
import { requestContext } from './request-context.js';

export interface ScmProviderRoutesOptions {
  providers: ScmProviderService;
}

export async function scmProviderRoutes(app: FastifyInstance, opts: ScmProviderRoutesOptions) {
  const { providers } = opts;

  app.addHook('preHandler', requireAuth);

  const adminOnly = { preHandler: [requireRole('admin')] };

  /**
   * POST /api/v1/scm-providers
   * Register an SCM provider. PAT-based providers need base_url only. (admin only)
   */
  app.post('/api/v1/scm-providers', adminOnly, async (request, reply) => {
    const input = parseInput(createScmProviderSchema, request.body ?? {});
    const provider = await providers.create(input, requestContext(reply));
    return reply.status(201).send(toProviderResponse(provider));
  });

  /**
   * GET /api/v1/scm-providers
   * List providers, optionally only those of one organization.
   */
  app.get('/api/v1/scm-providers', async (request, reply) => {
    const { organization_id } = parseInput(listScmProvidersQuerySchema, request.query);
    const list = await providers.list(organization_id, requestContext(reply));
    return reply.send(list.map(toProviderResponse));
  });

  app.get('/api/v1/scm-providers/:id', async (request, reply) => {
    const { id } = parseInput(providerIdParamsSchema, request.params);
    const provider = await providers.get(id, requestContext(reply));
    return reply.send(toProviderResponse(provider));
  });

  /**
   * PUT /api/v1/scm-providers/:id
   * Partial update. A new client_secret is re-encrypted. (admin only)
   */
  app.put('/api/v1/scm-providers/:id', adminOnly, async (request, reply) => {
    const { id } = parseInput(providerIdParamsSchema, request.params);
    const input = parseInput(updateScmProviderSchema, request.body ?? {});
    const provider = await providers.update(id, input, requestContext(reply));
    return reply.send(toProviderResponse(provider));
  });

  app.delete('/api/v1/scm-providers/:id', adminOnly, async (request, reply) => {
    const { id } = parseInput(providerIdParamsSchema, request.params);
    await providers.delete(id, requestContext(reply));
    return reply.send({ message: 'provider deleted' });
  });
}
