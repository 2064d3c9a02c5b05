import { randomUUID } from 'node:crypto';
import {
  isPatBased,
  PAT_CLIENT_ID,
  PAT_CLIENT_SECRET,
  SCM_PROVIDER_LABELS,
  type CreateScmProviderInput,
  type UpdateScmProviderInput,
} from '@regadmin/shared';
import type { ScmProviderRecord, ScmStore } from '../db/scm-store.js';
import type { CallContext } from '../scm/types.js';
import { BadRequestError, NotFoundError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { CredentialCipher } from './encryption.service.js';
import { sealSecret } from './scm-credentials.js';

/**
 * Admin management of SCM provider configurations.
 */
export class ScmProviderService {
  constructor(
    private readonly store: ScmStore,
    private readonly cipher: CredentialCipher,
  ) {}

  async create(input: CreateScmProviderInput, ctx?: CallContext): Promise<ScmProviderRecord> {
    let clientId = input.client_id ?? '';
    let clientSecret = input.client_secret ?? '';

    if (isPatBased(input.provider_type)) {
      // PAT-based providers have no OAuth client; the columns hold placeholders
      if (!input.base_url) {
        throw new BadRequestError(`base_url is required for ${SCM_PROVIDER_LABELS[input.provider_type]}`);
      }
      clientId = clientId || PAT_CLIENT_ID;
      clientSecret = clientSecret || PAT_CLIENT_SECRET;
    } else {
      if (!clientId) {
        throw new BadRequestError('client_id is required for OAuth providers');
      }
      if (!clientSecret) {
        throw new BadRequestError('client_secret is required for OAuth providers');
      }
    }

    const now = new Date();
    const record: ScmProviderRecord = {
      id: randomUUID(),
      organizationId: input.organization_id ?? null,
      providerType: input.provider_type,
      name: input.name,
      baseUrl: input.base_url ?? null,
      tenantId: input.tenant_id ?? null,
      clientId,
      clientSecretEncrypted: sealSecret(this.cipher, clientSecret, 'client secret'),
      webhookSecret: input.webhook_secret ?? null,
      isActive: true,
      createdAt: now,
      updatedAt: now,
    };

    await this.store.createProvider(record, ctx);
    logger.info({ providerId: record.id, providerType: record.providerType }, 'Created SCM provider');

    return record;
  }

  list(organizationId: string | undefined, ctx?: CallContext): Promise<ScmProviderRecord[]> {
    return this.store.listProviders(organizationId ?? null, ctx);
  }

  async get(id: string, ctx?: CallContext): Promise<ScmProviderRecord> {
    const provider = await this.store.getProvider(id, ctx);
    if (!provider) {
      throw new NotFoundError('provider');
    }
    return provider;
  }

  async update(id: string, input: UpdateScmProviderInput, ctx?: CallContext): Promise<ScmProviderRecord> {
    const provider = await this.get(id, ctx);

    const baseUrl = input.base_url === undefined ? provider.baseUrl : input.base_url;
    if (isPatBased(provider.providerType) && !baseUrl) {
      throw new BadRequestError(`base_url is required for ${SCM_PROVIDER_LABELS[provider.providerType]}`);
    }

    if (input.name !== undefined) provider.name = input.name;
    if (input.base_url !== undefined) provider.baseUrl = input.base_url;
    if (input.tenant_id !== undefined) provider.tenantId = input.tenant_id;
    if (input.client_id !== undefined) provider.clientId = input.client_id;
    if (input.client_secret !== undefined) {
      provider.clientSecretEncrypted = sealSecret(this.cipher, input.client_secret, 'client secret');
    }
    if (input.webhook_secret !== undefined) provider.webhookSecret = input.webhook_secret;
    if (input.is_active !== undefined) provider.isActive = input.is_active;

    provider.updatedAt = new Date();

    await this.store.updateProvider(provider, ctx);
    logger.info({ providerId: provider.id }, 'Updated SCM provider');

    return provider;
  }

  async delete(id: string, ctx?: CallContext): Promise<void> {
    await this.store.deleteProvider(id, ctx);
    logger.info({ providerId: id }, 'Deleted SCM provider');
  }
}
