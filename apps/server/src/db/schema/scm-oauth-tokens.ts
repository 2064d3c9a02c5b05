import { pgTable, uuid, varchar, text, timestamp, index, unique } from 'drizzle-orm/pg-core';
import { users } from './users.js';
import { scmProviders } from './scm-providers.js';

/**
 * Per-user SCM credentials, one row per (user, provider).
 * Scopes are kept as a single comma-joined string.
 */
export const scmOAuthTokens = pgTable(
  'scm_oauth_tokens',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    scmProviderId: uuid('scm_provider_id')
      .notNull()
      .references(() => scmProviders.id, { onDelete: 'cascade' }),
    accessTokenEncrypted: text('access_token_encrypted').notNull(),
    refreshTokenEncrypted: text('refresh_token_encrypted'),
    tokenType: varchar('token_type', { length: 50 }).notNull().default('bearer'),
    expiresAt: timestamp('expires_at', { withTimezone: true }),
    scopes: text('scopes'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    userProviderUnique: unique('scm_oauth_tokens_user_provider_unique').on(table.userId, table.scmProviderId),
    userIdx: index('idx_scm_oauth_tokens_user').on(table.userId),
    providerIdx: index('idx_scm_oauth_tokens_provider').on(table.scmProviderId),
  }),
);
