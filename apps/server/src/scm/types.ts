/**
 * Connector contract shared by every SCM provider implementation.
 *
 * A connector speaks one vendor's OAuth and REST dialect. The registry selects
 * the implementation from the provider type stored with the provider config.
 */

import type { ScmProviderType } from '@regadmin/shared';

/** Cancellation handle for a single inbound request. */
export interface CallContext {
  signal?: AbortSignal;
}

export interface OAuthToken {
  accessToken: string;
  /** Empty or absent when the provider issues no refresh token. */
  refreshToken?: string;
  tokenType: string;
  /** Null when the credential never expires. */
  expiresAt: Date | null;
  scopes: string[];
}

export interface Pagination {
  page: number;
  perPage: number;
}

export const DEFAULT_PAGINATION: Readonly<Pagination> = { page: 1, perPage: 30 };

export interface SourceRepository {
  id: string;
  owner: string;
  name: string;
  fullName: string;
  description: string;
  htmlUrl: string;
  cloneUrl: string;
  defaultBranch: string;
  isPrivate: boolean;
}

export interface RepositoryList {
  repositories: SourceRepository[];
  totalCount: number;
  hasMore: boolean;
  nextPage: number | null;
}

export interface GitTag {
  name: string;
  commitSha: string;
  message?: string;
  tagger?: string;
  createdAt?: Date;
}

export interface GitBranch {
  name: string;
  commitSha: string;
  isProtected: boolean;
  isDefault: boolean;
}

export interface ConnectorSettings {
  providerType: ScmProviderType;
  /** Required for self-hosted instances; empty for the vendor's cloud. */
  baseUrl: string;
  clientId: string;
  clientSecret: string;
  callbackUrl: string;
  /** Multi-tenant identity platforms (Azure DevOps with Entra ID). */
  tenantId: string;
}

export interface Connector {
  readonly providerType: ScmProviderType;

  authorizationEndpoint(state: string, scopes: string[]): string;
  completeAuthorization(code: string, ctx?: CallContext): Promise<OAuthToken>;
  renewToken(refreshToken: string, ctx?: CallContext): Promise<OAuthToken>;

  fetchRepositories(token: OAuthToken, pagination: Pagination, ctx?: CallContext): Promise<RepositoryList>;
  searchRepositories(
    token: OAuthToken,
    searchTerm: string,
    pagination: Pagination,
    ctx?: CallContext,
  ): Promise<RepositoryList>;
  fetchTags(
    token: OAuthToken,
    owner: string,
    repo: string,
    pagination: Pagination,
    ctx?: CallContext,
  ): Promise<GitTag[]>;
  fetchBranches(
    token: OAuthToken,
    owner: string,
    repo: string,
    pagination: Pagination,
    ctx?: CallContext,
  ): Promise<GitBranch[]>;
}

export type ConnectorBuilder = (settings: ConnectorSettings) => Connector;
