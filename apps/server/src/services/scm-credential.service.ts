import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { isPatBased, PAT_SCOPES, PAT_TOKEN_TYPE } from '@regadmin/shared';
import type { ScmProviderRecord, ScmUserTokenRecord } from '../db/scm-store.js';
import type { CallContext, OAuthToken } from '../scm/types.js';
import { AppError, BadRequestError, NotFoundError, UpstreamError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import {
  createConnector,
  decryptCredential,
  joinScopes,
  openSecret,
  sealSecret,
  type ScmServiceDependencies,
} from './scm-credentials.js';
import { renewAndPersist } from './scm-renewal.js';

export const PAT_GUIDANCE =
  'This provider requires a Personal Access Token. Use POST /api/v1/scm-providers/:id/token to save your PAT.';

export type AuthorizationResult =
  | { method: 'oauth'; authorizationUrl: string; state: string }
  | { method: 'pat'; message: string };

export type ConnectionStatus =
  | { connected: false }
  | { connected: true; connectedAt: Date; expiresAt: Date | null; tokenType: string };

type CredentialFields = Pick<
  ScmUserTokenRecord,
  'accessTokenEncrypted' | 'refreshTokenEncrypted' | 'tokenType' | 'expiresAt' | 'scopes'
>;

const userIdSchema = z.string().uuid();

/** The OAuth state value ties a callback back to the user who started the flow. */
export function buildOAuthState(userId: string, providerId: string): string {
  return `${userId}:${providerId}`;
}

export function parseOAuthState(state: string): { userId: string; providerId: string } {
  const parts = state.split(':');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new BadRequestError('invalid state parameter');
  }

  const [userId, providerId] = parts;
  if (!userIdSchema.safeParse(userId).success) {
    throw new BadRequestError('invalid user ID in state');
  }

  return { userId, providerId };
}

/**
 * Connect, disconnect and inspect a user's credential for an SCM provider.
 */
export class ScmCredentialService {
  constructor(private readonly deps: ScmServiceDependencies) {}

  async authorize(providerId: string, userId: string, ctx?: CallContext): Promise<AuthorizationResult> {
    const provider = await this.requireProvider(providerId, ctx);

    if (isPatBased(provider.providerType)) {
      return { method: 'pat', message: PAT_GUIDANCE };
    }

    const connector = createConnector(this.deps, provider);
    const state = buildOAuthState(userId, provider.id);

    return {
      method: 'oauth',
      authorizationUrl: connector.authorizationEndpoint(state, []),
      state,
    };
  }

  /**
   * Complete the code exchange and store the credential for the user named in
   * the state. Returns the frontend URL to redirect the browser to.
   */
  async completeCallback(
    providerId: string,
    code: string | undefined,
    state: string | undefined,
    ctx?: CallContext,
  ): Promise<string> {
    if (!code) {
      throw new BadRequestError('missing authorization code');
    }
    const { userId } = parseOAuthState(state ?? '');

    const provider = await this.requireProvider(providerId, ctx);
    const connector = createConnector(this.deps, provider);

    let token: OAuthToken;
    try {
      token = await connector.completeAuthorization(code, ctx);
    } catch (err) {
      logger.warn(
        { providerId, userId, err: err instanceof Error ? err.message : String(err) },
        'OAuth code exchange failed',
      );
      throw new UpstreamError('OAuth flow failed', err);
    }

    await this.saveCredential(
      userId,
      provider.id,
      {
        accessTokenEncrypted: sealSecret(this.deps.cipher, token.accessToken, 'access token'),
        refreshTokenEncrypted: token.refreshToken
          ? sealSecret(this.deps.cipher, token.refreshToken, 'refresh token')
          : null,
        tokenType: token.tokenType || 'bearer',
        expiresAt: token.expiresAt,
        scopes: joinScopes(token.scopes),
      },
      ctx,
    );

    logger.info({ providerId, userId }, 'Connected SCM provider via OAuth');

    return `${this.deps.config.appUrl.replace(/\/+$/, '')}/admin/scm-providers/${provider.id}/connected`;
  }

  async revoke(providerId: string, userId: string, ctx?: CallContext): Promise<void> {
    await this.deps.store.deleteUserToken(userId, providerId, ctx);
    logger.info({ providerId, userId }, 'Revoked SCM credential');
  }

  /**
   * Renew the user's credential now. Failures are reported as-is; there is no
   * retry.
   */
  async refresh(providerId: string, userId: string, ctx?: CallContext): Promise<{ expiresAt: Date | null }> {
    const record = await this.deps.store.getUserToken(userId, providerId, ctx);
    if (!record) {
      throw new NotFoundError('OAuth token');
    }

    const provider = await this.requireProvider(providerId, ctx);

    const refreshToken = record.refreshTokenEncrypted
      ? openSecret(this.deps.cipher, record.refreshTokenEncrypted, 'refresh token')
      : '';
    if (!refreshToken) {
      throw new BadRequestError('no refresh token is available for this connection');
    }

    const connector = createConnector(this.deps, provider);
    const credential = decryptCredential(this.deps.cipher, record);

    try {
      await renewAndPersist(this.deps, connector, record, credential, ctx);
    } catch (err) {
      if (err instanceof AppError) {
        throw err;
      }
      throw new UpstreamError('token refresh failed', err);
    }

    return { expiresAt: credential.expiresAt };
  }

  async savePat(providerId: string, userId: string, accessToken: string, ctx?: CallContext): Promise<void> {
    if (!accessToken) {
      throw new BadRequestError('access_token is required');
    }

    const provider = await this.requireProvider(providerId, ctx);
    if (!isPatBased(provider.providerType)) {
      throw new BadRequestError('this provider uses OAuth, not Personal Access Tokens');
    }

    await this.saveCredential(
      userId,
      provider.id,
      {
        accessTokenEncrypted: sealSecret(this.deps.cipher, accessToken, 'access token'),
        refreshTokenEncrypted: null,
        tokenType: PAT_TOKEN_TYPE,
        expiresAt: null,
        scopes: PAT_SCOPES,
      },
      ctx,
    );

    logger.info({ providerId, userId }, 'Saved Personal Access Token');
  }

  async status(providerId: string, userId: string, ctx?: CallContext): Promise<ConnectionStatus> {
    const record = await this.deps.store.getUserToken(userId, providerId, ctx);
    if (!record) {
      return { connected: false };
    }

    return {
      connected: true,
      connectedAt: record.updatedAt,
      expiresAt: record.expiresAt,
      tokenType: record.tokenType,
    };
  }

  private async requireProvider(providerId: string, ctx?: CallContext): Promise<ScmProviderRecord> {
    const provider = await this.deps.store.getProvider(providerId, ctx);
    if (!provider) {
      throw new NotFoundError('provider');
    }
    return provider;
  }

  /** One row per (user, provider): reconnecting overwrites the old credential. */
  private async saveCredential(
    userId: string,
    providerId: string,
    fields: CredentialFields,
    ctx?: CallContext,
  ): Promise<void> {
    const existing = await this.deps.store.getUserToken(userId, providerId, ctx);
    const now = new Date();

    await this.deps.store.saveUserToken(
      {
        id: existing?.id ?? randomUUID(),
        userId,
        scmProviderId: providerId,
        ...fields,
        createdAt: existing?.createdAt ?? now,
        updatedAt: now,
      },
      ctx,
    );
  }
}
