import type { FastifyInstance } from 'fastify';
import { providerIdParamsSchema, repositoryParamsSchema, repositorySearchQuerySchema } from '@regadmin/shared';
import { requireAuth } from '../auth/guards.js';
import type { ScmBrowserService } from '../services/scm-browser.service.js';
import { toBranchResponse, toRepositoryResponse, toTagResponse } from '../services/scm-serializers.js';
import { parseInput } from '../utils/validation.js';
import { requestContext } from './request-context.js';

export interface ScmRepositoryRoutesOptions {
  browser: ScmBrowserService;
}

export async function scmRepositoryRoutes(app: FastifyInstance, opts: ScmRepositoryRoutesOptions) {
  const { browser } = opts;

  app.addHook('preHandler', requireAuth);

  /**
   * GET /api/v1/scm-providers/:id/repositories?search=
   * Repositories visible to the current user's credential.
   */
  app.get('/api/v1/scm-providers/:id/repositories', async (request, reply) => {
    const { id } = parseInput(providerIdParamsSchema, request.params);
    const { search } = parseInput(repositorySearchQuerySchema, request.query);

    const repositories = await browser.listRepositories(id, request.user.id, search, requestContext(reply));
    return reply.send({ repositories: repositories.map(toRepositoryResponse) });
  });

  app.get('/api/v1/scm-providers/:id/repositories/:owner/:repo/tags', async (request, reply) => {
    const { id, owner, repo } = parseInput(repositoryParamsSchema, request.params);

    const tags = await browser.listTags(id, request.user.id, owner, repo, requestContext(reply));
    return reply.send({ tags: tags.map(toTagResponse) });
  });

  app.get('/api/v1/scm-providers/:id/repositories/:owner/:repo/branches', async (request, reply) => {
    const { id, owner, repo } = parseInput(repositoryParamsSchema, request.params);

    const branches = await browser.listBranches(id, request.user.id, owner, repo, requestContext(reply));
    return reply.send({ branches: branches.map(toBranchResponse) });
  });
}
