import type { ScmUserTokenRecord } from '../db/scm-store.js';
import { isAuthFailure } from '../scm/errors.js';
import {
  DEFAULT_PAGINATION,
  type CallContext,
  type Connector,
  type GitBranch,
  type GitTag,
  type SourceRepository,
} from '../scm/types.js';
import { AppError, NotFoundError, UnauthorizedError, UpstreamAuthError, UpstreamError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import {
  createConnector,
  decryptCredential,
  type DecryptedCredential,
  type ScmServiceDependencies,
} from './scm-credentials.js';
import { RenewedTokenNotSavedError, needsProactiveRenewal, renewAndPersist } from './scm-renewal.js';

type ProviderCall<T> = (connector: Connector, credential: DecryptedCredential) => Promise<T>;

/**
 * Read-only browsing of a user's repositories, tags and branches.
 *
 * Every call goes through {@link ScmBrowserService.withCredential}, which
 * renews a credential that is about to expire and retries once after the
 * provider rejects it.
 */
export class ScmBrowserService {
  constructor(private readonly deps: ScmServiceDependencies) {}

  async listRepositories(
    providerId: string,
    userId: string,
    search: string | undefined,
    ctx?: CallContext,
  ): Promise<SourceRepository[]> {
    const result = await this.withCredential(providerId, userId, 'failed to list repositories', ctx, (connector, credential) =>
      search
        ? connector.searchRepositories(credential, search, DEFAULT_PAGINATION, ctx)
        : connector.fetchRepositories(credential, DEFAULT_PAGINATION, ctx),
    );
    return result.repositories;
  }

  listTags(providerId: string, userId: string, owner: string, repo: string, ctx?: CallContext): Promise<GitTag[]> {
    return this.withCredential(providerId, userId, 'failed to list tags', ctx, (connector, credential) =>
      connector.fetchTags(credential, owner, repo, DEFAULT_PAGINATION, ctx),
    );
  }

  listBranches(
    providerId: string,
    userId: string,
    owner: string,
    repo: string,
    ctx?: CallContext,
  ): Promise<GitBranch[]> {
    return this.withCredential(providerId, userId, 'failed to list branches', ctx, (connector, credential) =>
      connector.fetchBranches(credential, owner, repo, DEFAULT_PAGINATION, ctx),
    );
  }

  private async withCredential<T>(
    providerId: string,
    userId: string,
    action: string,
    ctx: CallContext | undefined,
    call: ProviderCall<T>,
  ): Promise<T> {
    const provider = await this.deps.store.getProvider(providerId, ctx);
    if (!provider) {
      throw new NotFoundError('provider');
    }

    const record = await this.deps.store.getUserToken(userId, providerId, ctx);
    if (!record) {
      throw new UnauthorizedError('not connected to this provider');
    }

    const connector = createConnector(this.deps, provider);
    const credential = decryptCredential(this.deps.cipher, record);

    let renewalFailed = false;
    if (needsProactiveRenewal(credential, this.deps.config.refreshWindowMs)) {
      renewalFailed = !(await this.tryRenew(connector, record, credential, ctx, 'proactive'));
    }

    try {
      return await call(connector, credential);
    } catch (err) {
      if (!isAuthFailure(err) || !credential.refreshToken || renewalFailed) {
        throw translateProviderError(action, err);
      }

      logger.info({ providerId, userId, status: err.statusCode }, 'SCM provider rejected credential; renewing');
      if (!(await this.tryRenew(connector, record, credential, ctx, 'reactive'))) {
        throw translateProviderError(action, err);
      }
    }

    try {
      return await call(connector, credential);
    } catch (err) {
      throw translateProviderError(action, err);
    }
  }

  private async tryRenew(
    connector: Connector,
    record: ScmUserTokenRecord,
    credential: DecryptedCredential,
    ctx: CallContext | undefined,
    trigger: 'proactive' | 'reactive',
  ): Promise<boolean> {
    try {
      await renewAndPersist(this.deps, connector, record, credential, ctx);
      return true;
    } catch (err) {
      if (err instanceof RenewedTokenNotSavedError) {
        return true;
      }
      logger.warn(
        {
          providerId: record.scmProviderId,
          userId: record.userId,
          trigger,
          err: err instanceof Error ? err.message : String(err),
        },
        'SCM credential renewal failed',
      );
      return false;
    }
  }
}

export function translateProviderError(action: string, err: unknown): AppError {
  if (isAuthFailure(err)) {
    return new UpstreamAuthError();
  }
  if (err instanceof AppError) {
    return err;
  }
  return new UpstreamError(action, err);
}
