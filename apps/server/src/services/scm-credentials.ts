import { AppError, EncryptionError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { ConnectorConfigError } from '../scm/errors.js';
import type { ConnectorRegistry } from '../scm/registry.js';
import type { Connector, OAuthToken } from '../scm/types.js';
import type { ScmProviderRecord, ScmStore, ScmUserTokenRecord } from '../db/scm-store.js';
import type { CredentialCipher } from './encryption.service.js';
import type { RenewalGate } from './scm-renewal.js';

export interface ScmConfig {
  /** Public base URL of this server, used to build OAuth callback URLs. */
  serverBaseUrl: string;
  /** Frontend base URL for browser redirects. */
  appUrl: string;
  /** Renew a credential this long before it expires. */
  refreshWindowMs: number;
}

export interface ScmServiceDependencies {
  store: ScmStore;
  cipher: CredentialCipher;
  connectors: ConnectorRegistry;
  config: ScmConfig;
  renewals: RenewalGate;
}

/** A user's credential with its secrets opened. Lives for one request only. */
export type DecryptedCredential = OAuthToken;

/**
 * The callback URL must be identical at authorize and callback time or the
 * provider rejects the code exchange.
 */
export function oauthCallbackUrl(serverBaseUrl: string, providerId: string): string {
  return `${serverBaseUrl.replace(/\/+$/, '')}/api/v1/scm-providers/${providerId}/oauth/callback`;
}

export function sealSecret(cipher: CredentialCipher, plaintext: string, label: string): string {
  try {
    return cipher.seal(plaintext);
  } catch (err) {
    logger.error({ err: err instanceof Error ? err.message : String(err) }, `Failed to encrypt ${label}`);
    throw new EncryptionError(`failed to encrypt ${label}`);
  }
}

export function openSecret(cipher: CredentialCipher, ciphertext: string, label: string): string {
  try {
    return cipher.open(ciphertext);
  } catch (err) {
    logger.error({ err: err instanceof Error ? err.message : String(err) }, `Failed to decrypt ${label}`);
    throw new EncryptionError(`failed to decrypt ${label}`);
  }
}

export function joinScopes(scopes: readonly string[]): string | null {
  return scopes.length > 0 ? scopes.join(',') : null;
}

export function parseScopes(scopes: string | null): string[] {
  if (!scopes) return [];
  return scopes
    .split(',')
    .map((scope) => scope.trim())
    .filter((scope) => scope.length > 0);
}

/**
 * Open the client secret and build the connector for a stored provider.
 */
export function createConnector(deps: ScmServiceDependencies, provider: ScmProviderRecord): Connector {
  const clientSecret = openSecret(deps.cipher, provider.clientSecretEncrypted, 'client secret');

  try {
    return deps.connectors.build({
      providerType: provider.providerType,
      baseUrl: provider.baseUrl ?? '',
      clientId: provider.clientId,
      clientSecret,
      callbackUrl: oauthCallbackUrl(deps.config.serverBaseUrl, provider.id),
      tenantId: provider.tenantId ?? '',
    });
  } catch (err) {
    if (err instanceof ConnectorConfigError) {
      logger.error({ providerId: provider.id, err: err.message }, 'Failed to create SCM connector');
      throw new AppError(500, `failed to create connector: ${err.message}`);
    }
    throw err;
  }
}

export function decryptCredential(cipher: CredentialCipher, record: ScmUserTokenRecord): DecryptedCredential {
  const credential: DecryptedCredential = {
    accessToken: openSecret(cipher, record.accessTokenEncrypted, 'access token'),
    tokenType: record.tokenType,
    expiresAt: record.expiresAt,
    scopes: parseScopes(record.scopes),
  };

  if (record.refreshTokenEncrypted) {
    credential.refreshToken = openSecret(cipher, record.refreshTokenEncrypted, 'refresh token');
  }

  return credential;
}
