import Fastify from 'fastify';
import cors from '@fastify/cors';
import cookie from '@fastify/cookie';
import rateLimit from '@fastify/rate-limit';
import type { ApiError } from '@regadmin/shared';
import { env } from './config/env.js';
import { logger } from './utils/logger.js';
import { AppError } from './utils/errors.js';
import { db } from './db/client.js';
import { DrizzleScmStore, type ScmStore } from './db/scm-store.js';
import { authPlugin } from './auth/plugin.js';
import type { AuthMode } from './auth/dev-bypass.js';
import { DrizzleAuthStore, type AuthStore } from './auth/session.js';
import { ConnectorRegistry } from './scm/registry.js';
import { TokenCipher, type CredentialCipher } from './services/encryption.service.js';
import type { ScmConfig } from './services/scm-credentials.js';
import { RenewalGate } from './services/scm-renewal.js';
import { ScmCredentialService } from './services/scm-credential.service.js';
import { ScmBrowserService } from './services/scm-browser.service.js';
import { ScmProviderService } from './services/scm-provider.service.js';
import { scmProviderRoutes } from './routes/scm-providers.routes.js';
import { scmOAuthRoutes } from './routes/scm-oauth.routes.js';
import { scmRepositoryRoutes } from './routes/scm-repositories.routes.js';

export interface AppDependencies {
  scmStore: ScmStore;
  authStore: AuthStore;
  cipher: CredentialCipher;
  /** Deployments register one connector per supported provider type. */
  connectors: ConnectorRegistry;
  scmConfig: ScmConfig;
  authMode: AuthMode;
}

function defaultDependencies(): AppDependencies {
  return {
    scmStore: new DrizzleScmStore(db),
    authStore: new DrizzleAuthStore(db),
    cipher: TokenCipher.fromHex(env.ENCRYPTION_KEY),
    connectors: new ConnectorRegistry(),
    scmConfig: {
      serverBaseUrl: env.API_URL,
      appUrl: env.APP_URL,
      refreshWindowMs: env.SCM_TOKEN_REFRESH_WINDOW_SECONDS * 1000,
    },
    authMode: env.AUTH_MODE,
  };
}

export async function buildApp(overrides: Partial<AppDependencies> = {}) {
  const deps: AppDependencies = { ...defaultDependencies(), ...overrides };

  const app = Fastify({
    loggerInstance: logger,
  });

  app.decorate('authStore', deps.authStore);

  await app.register(cors, {
    origin: env.APP_URL,
    credentials: true,
  });

  await app.register(cookie, {
    secret: env.SESSION_SECRET,
  });

  // Rate limiting
  await app.register(rateLimit, {
    max: 100,
    timeWindow: '1 minute',
    keyGenerator: (request) => request.ip,
  });

  // Security headers
  app.addHook('onSend', async (_request, reply) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
    reply.header('X-XSS-Protection', '1; mode=block');
    if (env.NODE_ENV === 'production') {
      reply.header('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
    }
  });

  // Global error handler
  app.setErrorHandler((error: Error & { validation?: unknown; statusCode?: number }, request, reply) => {
    if (error instanceof AppError) {
      return reply.status(error.statusCode).send({
        statusCode: error.statusCode,
        error: error.name,
        message: error.message,
      } satisfies ApiError);
    }

    // Fastify validation errors
    if (error.validation) {
      return reply.status(400).send({
        statusCode: 400,
        error: 'ValidationError',
        message: error.message,
      } satisfies ApiError);
    }

    // Rate limit errors
    if (error.statusCode === 429) {
      return reply.status(429).send({
        statusCode: 429,
        error: 'TooManyRequests',
        message: 'Rate limit exceeded',
      } satisfies ApiError);
    }

    request.log.error(error);
    return reply.status(500).send({
      statusCode: 500,
      error: 'InternalServerError',
      message: env.NODE_ENV === 'production' ? 'Internal server error' : error.message,
    } satisfies ApiError);
  });

  app.setNotFoundHandler(async (_request, reply) => {
    return reply.status(404).send({
      statusCode: 404,
      error: 'NotFound',
      message: 'Route not found',
    } satisfies ApiError);
  });

  // Health check
  app.get('/health', async () => ({ status: 'ok', timestamp: new Date().toISOString() }));

  const scmDeps = {
    store: deps.scmStore,
    cipher: deps.cipher,
    connectors: deps.connectors,
    config: deps.scmConfig,
    renewals: new RenewalGate(),
  };

  // Auth routes
  await app.register(authPlugin, { authMode: deps.authMode });

  // API routes
  await app.register(scmProviderRoutes, { providers: new ScmProviderService(deps.scmStore, deps.cipher) });
  await app.register(scmOAuthRoutes, { credentials: new ScmCredentialService(scmDeps) });
  await app.register(scmRepositoryRoutes, { browser: new ScmBrowserService(scmDeps) });

  return app;
}
