import { z } from 'zod';
import { SCM_PROVIDER_TYPES } from '../constants/scm.js';

export const scmProviderTypeSchema = z.enum(SCM_PROVIDER_TYPES, {
  errorMap: () => ({ message: 'invalid provider type' }),
});

export const providerIdParamsSchema = z.object({
  id: z.string().uuid({ message: 'invalid provider ID' }),
});

export const repositoryParamsSchema = providerIdParamsSchema.extend({
  owner: z.string().min(1, { message: 'owner and repo are required' }),
  repo: z.string().min(1, { message: 'owner and repo are required' }),
});

export const createScmProviderSchema = z.object({
  organization_id: z.string().uuid({ message: 'invalid organization_id' }).nullable().optional(),
  provider_type: scmProviderTypeSchema,
  name: z.string().min(1, { message: 'name is required' }),
  base_url: z.string().url({ message: 'base_url must be a valid URL' }).nullable().optional(),
  tenant_id: z.string().nullable().optional(),
  client_id: z.string().optional(),
  client_secret: z.string().optional(),
  webhook_secret: z.string().nullable().optional(),
});

export const updateScmProviderSchema = z.object({
  name: z.string().min(1).optional(),
  base_url: z.string().url({ message: 'base_url must be a valid URL' }).nullable().optional(),
  tenant_id: z.string().nullable().optional(),
  client_id: z.string().min(1).optional(),
  client_secret: z.string().min(1).optional(),
  webhook_secret: z.string().nullable().optional(),
  is_active: z.boolean().optional(),
});

export const listScmProvidersQuerySchema = z.object({
  organization_id: z.string().uuid({ message: 'invalid organization_id' }).optional(),
});

export const savePatSchema = z.object({
  access_token: z.string({ required_error: 'access_token is required' }).min(1, {
    message: 'access_token is required',
  }),
});

export const oauthCallbackQuerySchema = z.object({
  code: z.string().optional(),
  state: z.string().optional(),
});

export const repositorySearchQuerySchema = z.object({
  search: z.string().optional(),
});

export type CreateScmProviderInput = z.infer<typeof createScmProviderSchema>;
export type UpdateScmProviderInput = z.infer<typeof updateScmProviderSchema>;
export type SavePatInput = z.infer<typeof savePatSchema>;
