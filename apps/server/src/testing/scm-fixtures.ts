import { PAT_CLIENT_ID, PAT_CLIENT_SECRET, type ScmProviderType } from '@regadmin/shared';
import type { ScmProviderRecord, ScmUserTokenRecord } from '../db/scm-store.js';
import { TokenCipher } from '../services/encryption.service.js';
import type { ScmConfig, ScmServiceDependencies } from '../services/scm-credentials.js';
import { RenewalGate } from '../services/scm-renewal.js';
import { FakeConnector, registryFor } from './fake-connector.js';
import { InMemoryScmStore } from './in-memory-scm-store.js';

export const TEST_KEY = Buffer.alloc(32, 7);
export const USER_ID = '11111111-1111-4111-8111-111111111111';
export const OAUTH_PROVIDER_ID = '22222222-2222-4222-8222-222222222222';
export const PAT_PROVIDER_ID = '33333333-3333-4333-8333-333333333333';

export const TEST_SCM_CONFIG: ScmConfig = {
  serverBaseUrl: 'https://api.registry.test',
  appUrl: 'https://app.registry.test',
  refreshWindowMs: 60_000,
};

export interface CredentialSeed {
  accessToken?: string;
  refreshToken?: string | null;
  expiresAt?: Date | null;
  tokenType?: string;
  scopes?: string | null;
  userId?: string;
  providerId?: string;
  savedAt?: Date;
}

/**
 * Wires the SCM services to in-memory collaborators and a fake connector.
 */
export class ScmHarness {
  readonly store = new InMemoryScmStore();
  readonly cipher = new TokenCipher(TEST_KEY);
  readonly connector = new FakeConnector('github');
  readonly deps: ScmServiceDependencies;

  constructor(config: Partial<ScmConfig> = {}) {
    this.deps = {
      store: this.store,
      cipher: this.cipher,
      connectors: registryFor(this.connector, 'github', 'bitbucket_dc'),
      config: { ...TEST_SCM_CONFIG, ...config },
      renewals: new RenewalGate(),
    };
  }

  addOAuthProvider(id: string = OAUTH_PROVIDER_ID, providerType: ScmProviderType = 'github'): ScmProviderRecord {
    return this.addProvider({
      id,
      providerType,
      name: 'GitHub',
      baseUrl: null,
      clientId: 'client-123',
      clientSecretEncrypted: this.cipher.seal('test-secret'),
    });
  }

  addPatProvider(id: string = PAT_PROVIDER_ID): ScmProviderRecord {
    return this.addProvider({
      id,
      providerType: 'bitbucket_dc',
      name: 'Bitbucket DC',
      baseUrl: 'https://bitbucket.example.test',
      clientId: PAT_CLIENT_ID,
      clientSecretEncrypted: this.cipher.seal(PAT_CLIENT_SECRET),
    });
  }

  /** Store a credential directly, bypassing the service under test. */
  addCredential(seed: CredentialSeed = {}): ScmUserTokenRecord {
    const savedAt = seed.savedAt ?? new Date();
    const refreshToken = seed.refreshToken === undefined ? 'stored-refresh' : seed.refreshToken;
    const record: ScmUserTokenRecord = {
      id: '44444444-4444-4444-8444-444444444444',
      userId: seed.userId ?? USER_ID,
      scmProviderId: seed.providerId ?? OAUTH_PROVIDER_ID,
      accessTokenEncrypted: this.cipher.seal(seed.accessToken ?? 'stored-access'),
      refreshTokenEncrypted: refreshToken ? this.cipher.seal(refreshToken) : null,
      tokenType: seed.tokenType ?? 'bearer',
      expiresAt: seed.expiresAt === undefined ? new Date(Date.now() + 60 * 60 * 1000) : seed.expiresAt,
      scopes: seed.scopes === undefined ? 'repo' : seed.scopes,
      createdAt: savedAt,
      updatedAt: savedAt,
    };
    this.store.tokens.set(`${record.userId}:${record.scmProviderId}`, { ...record });
    return record;
  }

  /** Decrypted view of what is stored for the user and provider. */
  async storedCredential(userId: string = USER_ID, providerId: string = OAUTH_PROVIDER_ID) {
    const record = await this.store.getUserToken(userId, providerId);
    if (!record) {
      return null;
    }
    return {
      record,
      accessToken: this.cipher.open(record.accessTokenEncrypted),
      refreshToken: record.refreshTokenEncrypted ? this.cipher.open(record.refreshTokenEncrypted) : null,
    };
  }

  private addProvider(
    fields: Pick<ScmProviderRecord, 'id' | 'providerType' | 'name' | 'baseUrl' | 'clientId' | 'clientSecretEncrypted'>,
  ): ScmProviderRecord {
    const now = new Date();
    const record: ScmProviderRecord = {
      organizationId: null,
      tenantId: null,
      webhookSecret: null,
      isActive: true,
      createdAt: now,
      updatedAt: now,
      ...fields,
    };
    this.store.providers.set(record.id, { ...record });
    return record;
  }
}
