import { and, desc, eq } from 'drizzle-orm';
import type { Database } from './client.js';
import { scmOAuthTokens, scmProviders } from './schema/index.js';
import type { CallContext } from '../scm/types.js';

export type ScmProviderRecord = typeof scmProviders.$inferSelect;
export type ScmUserTokenRecord = typeof scmOAuthTokens.$inferSelect;

/**
 * Persistence for SCM provider configs and per-user SCM credentials.
 * Secret columns hold ciphertext only.
 */
export interface ScmStore {
  getProvider(id: string, ctx?: CallContext): Promise<ScmProviderRecord | null>;
  /** A null organization lists every provider, newest first. */
  listProviders(organizationId: string | null, ctx?: CallContext): Promise<ScmProviderRecord[]>;
  createProvider(record: ScmProviderRecord, ctx?: CallContext): Promise<void>;
  updateProvider(record: ScmProviderRecord, ctx?: CallContext): Promise<void>;
  deleteProvider(id: string, ctx?: CallContext): Promise<void>;

  getUserToken(userId: string, providerId: string, ctx?: CallContext): Promise<ScmUserTokenRecord | null>;
  /** Insert, or overwrite the mutable fields of the row for the same (user, provider). */
  saveUserToken(record: ScmUserTokenRecord, ctx?: CallContext): Promise<void>;
  /** Deleting a missing row is not an error. */
  deleteUserToken(userId: string, providerId: string, ctx?: CallContext): Promise<void>;
}

export class DrizzleScmStore implements ScmStore {
  constructor(private readonly db: Database) {}

  async getProvider(id: string, ctx?: CallContext): Promise<ScmProviderRecord | null> {
    ctx?.signal?.throwIfAborted();

    const result = await this.db
      .select()
      .from(scmProviders)
      .where(eq(scmProviders.id, id))
      .limit(1);

    return result.length > 0 ? result[0] : null;
  }

  async listProviders(organizationId: string | null, ctx?: CallContext): Promise<ScmProviderRecord[]> {
    ctx?.signal?.throwIfAborted();

    const query = this.db.select().from(scmProviders);
    if (organizationId === null) {
      return query.orderBy(desc(scmProviders.createdAt));
    }

    return query
      .where(eq(scmProviders.organizationId, organizationId))
      .orderBy(desc(scmProviders.createdAt));
  }

  async createProvider(record: ScmProviderRecord, ctx?: CallContext): Promise<void> {
    ctx?.signal?.throwIfAborted();
    await this.db.insert(scmProviders).values(record);
  }

  async updateProvider(record: ScmProviderRecord, ctx?: CallContext): Promise<void> {
    ctx?.signal?.throwIfAborted();

    const { id, createdAt: _createdAt, ...fields } = record;
    await this.db.update(scmProviders).set(fields).where(eq(scmProviders.id, id));
  }

  async deleteProvider(id: string, ctx?: CallContext): Promise<void> {
    ctx?.signal?.throwIfAborted();
    await this.db.delete(scmProviders).where(eq(scmProviders.id, id));
  }

  async getUserToken(userId: string, providerId: string, ctx?: CallContext): Promise<ScmUserTokenRecord | null> {
    ctx?.signal?.throwIfAborted();

    const result = await this.db
      .select()
      .from(scmOAuthTokens)
      .where(and(eq(scmOAuthTokens.userId, userId), eq(scmOAuthTokens.scmProviderId, providerId)))
      .limit(1);

    return result.length > 0 ? result[0] : null;
  }

  async saveUserToken(record: ScmUserTokenRecord, ctx?: CallContext): Promise<void> {
    ctx?.signal?.throwIfAborted();

    await this.db
      .insert(scmOAuthTokens)
      .values(record)
      .onConflictDoUpdate({
        target: [scmOAuthTokens.userId, scmOAuthTokens.scmProviderId],
        set: {
          accessTokenEncrypted: record.accessTokenEncrypted,
          refreshTokenEncrypted: record.refreshTokenEncrypted,
          tokenType: record.tokenType,
          expiresAt: record.expiresAt,
          scopes: record.scopes,
          updatedAt: record.updatedAt,
        },
      });
  }

  async deleteUserToken(userId: string, providerId: string, ctx?: CallContext): Promise<void> {
    ctx?.signal?.throwIfAborted();

    await this.db
      .delete(scmOAuthTokens)
      .where(and(eq(scmOAuthTokens.userId, userId), eq(scmOAuthTokens.scmProviderId, providerId)));
  }
}
