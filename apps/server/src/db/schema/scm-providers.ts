import { pgTable, uuid, varchar, text, boolean, timestamp, index, unique } from 'drizzle-orm/pg-core';
import type { ScmProviderType } from '@regadmin/shared';

/**
 * One row per configured SCM integration. A null organization means the
 * provider is available to every organization.
 *
 * PAT-based providers carry sentinel client credentials so OAuth and PAT
 * providers share this table.
 */
export const scmProviders = pgTable(
  'scm_providers',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    organizationId: uuid('organization_id'),
    providerType: varchar('provider_type', { length: 50 }).$type<ScmProviderType>().notNull(),
    name: varchar('name', { length: 255 }).notNull(),
    baseUrl: varchar('base_url', { length: 512 }),
    tenantId: varchar('tenant_id', { length: 255 }),
    clientId: varchar('client_id', { length: 255 }).notNull(),
    clientSecretEncrypted: text('client_secret_encrypted').notNull(),
    webhookSecret: varchar('webhook_secret', { length: 255 }),
    isActive: boolean('is_active').default(true).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    orgTypeNameUnique: unique('scm_providers_org_type_name_unique').on(
      table.organizationId,
      table.providerType,
      table.name,
    ),
    orgIdx: index('idx_scm_providers_org').on(table.organizationId),
    typeIdx: index('idx_scm_providers_type').on(table.providerType),
  }),
);
