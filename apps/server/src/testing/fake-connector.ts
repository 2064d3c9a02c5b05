import type { ScmProviderType } from '@regadmin/shared';
import { ConnectorRegistry } from '../scm/registry.js';
import type {
  CallContext,
  Connector,
  ConnectorSettings,
  GitBranch,
  GitTag,
  OAuthToken,
  Pagination,
  RepositoryList,
  SourceRepository,
} from '../scm/types.js';

type ReadMethod = 'fetchRepositories' | 'searchRepositories' | 'fetchTags' | 'fetchBranches';

/**
 * Scriptable connector. Reads fail with queued errors first, then succeed
 * with the configured data.
 */
export class FakeConnector implements Connector {
  readonly providerType: ScmProviderType;
  settings: ConnectorSettings | null = null;

  readonly calls = {
    completeAuthorization: 0,
    renewToken: 0,
    fetchRepositories: 0,
    searchRepositories: 0,
    fetchTags: 0,
    fetchBranches: 0,
  };
  /** Access token presented on every read, in call order. */
  readonly presentedTokens: string[] = [];
  readonly renewedWith: string[] = [];
  lastSearchTerm: string | null = null;
  lastSignal: AbortSignal | undefined;

  exchange: (code: string) => Promise<OAuthToken> = async () => ({
    accessToken: 'exchanged-access',
    refreshToken: 'exchanged-refresh',
    tokenType: 'bearer',
    expiresAt: new Date('2030-01-01T00:00:00.000Z'),
    scopes: ['repo', 'read:org'],
  });

  renew: (refreshToken: string) => Promise<OAuthToken> = async () => ({
    accessToken: 'renewed-access',
    tokenType: 'bearer',
    expiresAt: new Date('2030-01-01T00:00:00.000Z'),
    scopes: [],
  });

  readonly readFailures: unknown[] = [];

  repositories: SourceRepository[] = [];
  tags: GitTag[] = [];
  branches: GitBranch[] = [];

  constructor(providerType: ScmProviderType = 'github') {
    this.providerType = providerType;
  }

  authorizationEndpoint(state: string, scopes: string[]): string {
    const params = new URLSearchParams({
      client_id: this.settings?.clientId ?? '',
      redirect_uri: this.settings?.callbackUrl ?? '',
      state,
    });
    if (scopes.length > 0) {
      params.set('scope', scopes.join(' '));
    }
    return `https://scm.example.test/oauth/authorize?${params.toString()}`;
  }

  completeAuthorization(code: string, ctx?: CallContext): Promise<OAuthToken> {
    this.calls.completeAuthorization++;
    this.lastSignal = ctx?.signal;
    return this.exchange(code);
  }

  renewToken(refreshToken: string, ctx?: CallContext): Promise<OAuthToken> {
    this.calls.renewToken++;
    this.renewedWith.push(refreshToken);
    this.lastSignal = ctx?.signal;
    return this.renew(refreshToken);
  }

  async fetchRepositories(token: OAuthToken, _pagination: Pagination, ctx?: CallContext): Promise<RepositoryList> {
    this.read('fetchRepositories', token, ctx);
    return this.repositoryList(this.repositories);
  }

  async searchRepositories(
    token: OAuthToken,
    searchTerm: string,
    _pagination: Pagination,
    ctx?: CallContext,
  ): Promise<RepositoryList> {
    this.read('searchRepositories', token, ctx);
    this.lastSearchTerm = searchTerm;
    return this.repositoryList(this.repositories.filter((r) => r.name.includes(searchTerm)));
  }

  async fetchTags(
    token: OAuthToken,
    _owner: string,
    _repo: string,
    _pagination: Pagination,
    ctx?: CallContext,
  ): Promise<GitTag[]> {
    this.read('fetchTags', token, ctx);
    return this.tags;
  }

  async fetchBranches(
    token: OAuthToken,
    _owner: string,
    _repo: string,
    _pagination: Pagination,
    ctx?: CallContext,
  ): Promise<GitBranch[]> {
    this.read('fetchBranches', token, ctx);
    return this.branches;
  }

  private read(method: ReadMethod, token: OAuthToken, ctx?: CallContext): void {
    this.calls[method]++;
    this.presentedTokens.push(token.accessToken);
    this.lastSignal = ctx?.signal;

    if (this.readFailures.length > 0) {
      throw this.readFailures.shift();
    }
  }

  private repositoryList(repositories: SourceRepository[]): RepositoryList {
    return { repositories, totalCount: repositories.length, hasMore: false, nextPage: null };
  }
}

/** Registry that hands out the given connector for each listed provider type. */
export function registryFor(connector: FakeConnector, ...types: ScmProviderType[]): ConnectorRegistry {
  const registry = new ConnectorRegistry();
  for (const type of types.length > 0 ? types : [connector.providerType]) {
    registry.register(type, (settings) => {
      connector.settings = settings;
      return connector;
    });
  }
  return registry;
}
