export type ScmProviderType = 'github' | 'gitlab' | 'azuredevops' | 'bitbucket_cloud' | 'bitbucket_dc';

/** Public view of a configured SCM provider. Secrets are never included. */
export interface ScmProviderResponse {
  id: string;
  organization_id: string | null;
  provider_type: ScmProviderType;
  name: string;
  base_url: string | null;
  tenant_id: string | null;
  client_id: string;
  is_active: boolean;
  created_at: string;
  updated_at: string;
}

export type AuthorizeResponse =
  | { authorization_url: string; state: string }
  | { auth_method: 'pat'; message: string };

export interface TokenRefreshResponse {
  message: string;
  expires_at: string | null;
}

export interface TokenStatusResponse {
  connected: boolean;
  connected_at: string | null;
  expires_at: string | null;
  token_type?: string;
}

export interface ScmRepositoryResponse {
  id: string;
  name: string;
  full_name: string;
  owner: string;
  description: string;
  default_branch: string;
  clone_url: string;
  html_url: string;
  private: boolean;
}

export interface GitTagResponse {
  tag_name: string;
  target_commit: string;
  annotation_msg?: string;
  tagger_name?: string;
  tagged_at?: string;
}

export interface GitBranchResponse {
  branch_name: string;
  head_commit: string;
  is_protected: boolean;
  is_main_branch: boolean;
}
