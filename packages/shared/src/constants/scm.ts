import type { ScmProviderType } from '../types/scm.js';

export const SCM_PROVIDER_TYPES = [
  'github',
  'gitlab',
  'azuredevops',
  'bitbucket_cloud',
  'bitbucket_dc',
] as const satisfies readonly ScmProviderType[];

export const SCM_PROVIDER_LABELS: Record<ScmProviderType, string> = {
  github: 'GitHub',
  gitlab: 'GitLab',
  azuredevops: 'Azure DevOps',
  bitbucket_cloud: 'Bitbucket Cloud',
  bitbucket_dc: 'Bitbucket Data Center',
};

const PAT_BASED_PROVIDERS: ReadonlySet<ScmProviderType> = new Set<ScmProviderType>(['bitbucket_dc']);

/**
 * PAT-based providers authenticate with a user-supplied Personal Access Token
 * and have no OAuth client of their own.
 */
export function isPatBased(providerType: ScmProviderType): boolean {
  return PAT_BASED_PROVIDERS.has(providerType);
}

export function isScmProviderType(value: string): value is ScmProviderType {
  return (SCM_PROVIDER_TYPES as readonly string[]).includes(value);
}

// Stored in place of OAuth client credentials for PAT-based providers.
export const PAT_CLIENT_ID = 'pat-auth';
export const PAT_CLIENT_SECRET = 'not-applicable';

export const PAT_TOKEN_TYPE = 'pat';
export const PAT_SCOPES = 'repo';
