import type {
  GitBranchResponse,
  GitTagResponse,
  ScmProviderResponse,
  ScmRepositoryResponse,
  TokenStatusResponse,
} from '@regadmin/shared';
import type { ScmProviderRecord } from '../db/scm-store.js';
import type { GitBranch, GitTag, SourceRepository } from '../scm/types.js';
import type { ConnectionStatus } from './scm-credential.service.js';

function toIso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

/** Secrets (client secret, webhook secret) are never serialized. */
export function toProviderResponse(provider: ScmProviderRecord): ScmProviderResponse {
  return {
    id: provider.id,
    organization_id: provider.organizationId,
    provider_type: provider.providerType,
    name: provider.name,
    base_url: provider.baseUrl,
    tenant_id: provider.tenantId,
    client_id: provider.clientId,
    is_active: provider.isActive,
    created_at: provider.createdAt.toISOString(),
    updated_at: provider.updatedAt.toISOString(),
  };
}

export function toTokenStatusResponse(status: ConnectionStatus): TokenStatusResponse {
  if (!status.connected) {
    return { connected: false, connected_at: null, expires_at: null };
  }
  return {
    connected: true,
    connected_at: status.connectedAt.toISOString(),
    expires_at: toIso(status.expiresAt),
    token_type: status.tokenType,
  };
}

export function toRepositoryResponse(repo: SourceRepository): ScmRepositoryResponse {
  return {
    id: repo.id,
    name: repo.name,
    full_name: repo.fullName,
    owner: repo.owner,
    description: repo.description,
    default_branch: repo.defaultBranch,
    clone_url: repo.cloneUrl,
    html_url: repo.htmlUrl,
    private: repo.isPrivate,
  };
}

export function toTagResponse(tag: GitTag): GitTagResponse {
  const response: GitTagResponse = { tag_name: tag.name, target_commit: tag.commitSha };
  if (tag.message) response.annotation_msg = tag.message;
  if (tag.tagger) response.tagger_name = tag.tagger;
  if (tag.createdAt) response.tagged_at = tag.createdAt.toISOString();
  return response;
}

export function toBranchResponse(branch: GitBranch): GitBranchResponse {
  return {
    branch_name: branch.name,
    head_commit: branch.commitSha,
    is_protected: branch.isProtected,
    is_main_branch: branch.isDefault,
  };
}
