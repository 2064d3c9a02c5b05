import { afterEach, describe, expect, it } from 'vitest';
import type { UserRole } from '@regadmin/shared';
import { buildApp } from './app.js';
import { COOKIE_NAME } from './auth/guards.js';
import type { AuthMode } from './auth/dev-bypass.js';
import { InMemoryAuthStore } from './testing/in-memory-auth-store.js';
import { OAUTH_PROVIDER_ID, PAT_PROVIDER_ID, ScmHarness } from './testing/scm-fixtures.js';
import { ScmApiError } from './scm/errors.js';
import { RECONNECT_MESSAGE } from './utils/errors.js';

let app: Awaited<ReturnType<typeof buildApp>> | null = null;

afterEach(async () => {
  await app?.close();
  app = null;
});

async function setup(options: { role?: UserRole; authMode?: AuthMode } = {}) {
  const harness = new ScmHarness();
  const authStore = new InMemoryAuthStore();
  const user = await authStore.upsertUser({
    email: 'someone@example.test',
    name: 'Someone',
    role: options.role ?? 'admin',
  });
  const sessionToken = await authStore.createSession(user.id);

  app = await buildApp({
    scmStore: harness.store,
    authStore,
    cipher: harness.cipher,
    connectors: harness.deps.connectors,
    scmConfig: harness.deps.config,
    authMode: options.authMode ?? 'session',
  });

  return { app, harness, authStore, user, cookies: { [COOKIE_NAME]: sessionToken } };
}

describe('server', () => {
  it('answers health checks with security headers', async () => {
    const { app } = await setup();

    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json().status).toBe('ok');
    expect(res.headers['x-content-type-options']).toBe('nosniff');
    expect(res.headers['x-frame-options']).toBe('DENY');
  });

  it('returns a JSON 404 for unknown routes', async () => {
    const { app } = await setup();

    const res = await app.inject({ method: 'GET', url: '/api/v1/nothing-here' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ statusCode: 404, error: 'NotFound', message: 'Route not found' });
  });
});

describe('auth', () => {
  it('rejects API calls without a session cookie', async () => {
    const { app } = await setup();

    const res = await app.inject({ method: 'GET', url: '/api/v1/scm-providers' });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ statusCode: 401, error: 'UnauthorizedError', message: 'no session cookie' });
  });

  it('rejects an unknown session token', async () => {
    const { app } = await setup();

    const res = await app.inject({
      method: 'GET',
      url: '/api/v1/scm-providers',
      cookies: { [COOKIE_NAME]: 'not-a-session' },
    });

    expect(res.statusCode).toBe(401);
    expect(res.json().message).toBe('invalid or expired session');
  });

  it('returns the current user', async () => {
    const { app, user, cookies } = await setup();

    const res = await app.inject({ method: 'GET', url: '/auth/me', cookies });

    expect(res.statusCode).toBe(200);
    expect(res.json().user).toMatchObject({ id: user.id, email: 'someone@example.test', role: 'admin' });
  });

  it('ends the session on logout', async () => {
    const { app, authStore, cookies } = await setup();

    const res = await app.inject({ method: 'POST', url: '/auth/logout', cookies });

    expect(res.statusCode).toBe(200);
    expect(authStore.sessions.size).toBe(0);
  });

  it('refuses dev login outside dev-bypass mode', async () => {
    const { app } = await setup();

    const res = await app.inject({
      method: 'POST',
      url: '/auth/dev-login',
      payload: { email: 'dev@example.test', name: 'Dev' },
    });

    expect(res.statusCode).toBe(403);
    expect(res.json().message).toBe('dev bypass login is not enabled');
  });

  it('issues a session cookie in dev-bypass mode', async () => {
    const { app, authStore } = await setup({ authMode: 'dev-bypass' });

    const res = await app.inject({
      method: 'POST',
      url: '/auth/dev-login',
      payload: { email: 'dev@example.test', name: 'Dev' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().user).toMatchObject({ email: 'dev@example.test', role: 'user' });
    expect(res.cookies.find((c) => c.name === COOKIE_NAME)?.httpOnly).toBe(true);
    expect(authStore.sessions.size).toBe(2);
  });
});

describe('/api/v1/scm-providers', () => {
  it('creates a provider without exposing secrets', async () => {
    const { app, cookies } = await setup();

    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/scm-providers',
      cookies,
      payload: {
        provider_type: 'github',
        name: 'GitHub',
        client_id: 'client-123',
        client_secret: 'test-secret',
        webhook_secret: 'hook-secret',
      },
    });

    expect(res.statusCode).toBe(201);
    const body = res.json();
    expect(body).toMatchObject({ provider_type: 'github', name: 'GitHub', client_id: 'client-123', is_active: true });
    expect(body.client_secret).toBeUndefined();
    expect(body.client_secret_encrypted).toBeUndefined();
    expect(body.webhook_secret).toBeUndefined();
  });

  it('rejects an unknown provider type', async () => {
    const { app, cookies } = await setup();

    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/scm-providers',
      cookies,
      payload: { provider_type: 'svn', name: 'SVN', client_id: 'a', client_secret: 'b' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe('invalid provider type');
  });

  it('limits mutations to admins', async () => {
    const { app, cookies } = await setup({ role: 'user' });

    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/scm-providers',
      cookies,
      payload: { provider_type: 'github', name: 'GitHub', client_id: 'a', client_secret: 'b' },
    });

    expect(res.statusCode).toBe(403);
    expect(res.json().message).toBe('requires admin role');
  });

  it('lists, updates and deletes providers', async () => {
    const { app, harness, cookies } = await setup();
    harness.addOAuthProvider();

    const list = await app.inject({ method: 'GET', url: '/api/v1/scm-providers', cookies });
    expect(list.json().map((p: { id: string }) => p.id)).toEqual([OAUTH_PROVIDER_ID]);

    const updated = await app.inject({
      method: 'PUT',
      url: `/api/v1/scm-providers/${OAUTH_PROVIDER_ID}`,
      cookies,
      payload: { name: 'Renamed' },
    });
    expect(updated.json().name).toBe('Renamed');

    const deleted = await app.inject({ method: 'DELETE', url: `/api/v1/scm-providers/${OAUTH_PROVIDER_ID}`, cookies });
    expect(deleted.json()).toEqual({ message: 'provider deleted' });

    const missing = await app.inject({ method: 'GET', url: `/api/v1/scm-providers/${OAUTH_PROVIDER_ID}`, cookies });
    expect(missing.statusCode).toBe(404);
    expect(missing.json().message).toBe('provider not found');
  });

  it('validates path ids', async () => {
    const { app, cookies } = await setup();

    const res = await app.inject({ method: 'GET', url: '/api/v1/scm-providers/not-a-uuid/oauth/token', cookies });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ statusCode: 400, error: 'BadRequestError', message: 'invalid provider ID' });
  });
});

describe('/api/v1/scm-providers/:id/oauth', () => {
  it('starts an OAuth authorization', async () => {
    const { app, harness, user, cookies } = await setup();
    harness.addOAuthProvider();

    const res = await app.inject({ method: 'GET', url: `/api/v1/scm-providers/${OAUTH_PROVIDER_ID}/oauth/authorize`, cookies });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.state).toBe(`${user.id}:${OAUTH_PROVIDER_ID}`);
    expect(new URL(body.authorization_url).searchParams.get('state')).toBe(body.state);
  });

  it('points PAT-based providers at the token endpoint', async () => {
    const { app, harness, cookies } = await setup();
    harness.addPatProvider();

    const res = await app.inject({ method: 'GET', url: `/api/v1/scm-providers/${PAT_PROVIDER_ID}/oauth/authorize`, cookies });

    expect(res.json()).toEqual({
      auth_method: 'pat',
      message: 'This provider requires a Personal Access Token. Use POST /api/v1/scm-providers/:id/token to save your PAT.',
    });
  });

  it('completes the callback without a session and redirects to the app', async () => {
    const { app, harness, user } = await setup();
    harness.addOAuthProvider();

    const res = await app.inject({
      method: 'GET',
      url: `/api/v1/scm-providers/${OAUTH_PROVIDER_ID}/oauth/callback`,
      query: { code: 'auth-code', state: `${user.id}:${OAUTH_PROVIDER_ID}` },
    });

    expect(res.statusCode).toBe(302);
    expect(res.headers.location).toBe(`https://app.registry.test/admin/scm-providers/${OAUTH_PROVIDER_ID}/connected`);
    expect((await harness.storedCredential(user.id, OAUTH_PROVIDER_ID))?.accessToken).toBe('exchanged-access');
  });

  it('rejects a callback without a code', async () => {
    const { app, harness, user } = await setup();
    harness.addOAuthProvider();

    const res = await app.inject({
      method: 'GET',
      url: `/api/v1/scm-providers/${OAUTH_PROVIDER_ID}/oauth/callback`,
      query: { state: `${user.id}:${OAUTH_PROVIDER_ID}` },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe('missing authorization code');
  });

  it('reports status, refreshes and revokes', async () => {
    const { app, harness, user, cookies } = await setup();
    harness.addOAuthProvider();

    const before = await app.inject({ method: 'GET', url: `/api/v1/scm-providers/${OAUTH_PROVIDER_ID}/oauth/token`, cookies });
    expect(before.json()).toEqual({ connected: false, connected_at: null, expires_at: null });

    harness.addCredential({ userId: user.id });

    const refreshed = await app.inject({ method: 'POST', url: `/api/v1/scm-providers/${OAUTH_PROVIDER_ID}/oauth/refresh`, cookies });
    expect(refreshed.json()).toEqual({ message: 'token refreshed', expires_at: '2030-01-01T00:00:00.000Z' });

    const status = await app.inject({ method: 'GET', url: `/api/v1/scm-providers/${OAUTH_PROVIDER_ID}/oauth/token`, cookies });
    expect(status.json()).toMatchObject({ connected: true, expires_at: '2030-01-01T00:00:00.000Z', token_type: 'bearer' });
    expect(status.json().access_token).toBeUndefined();

    const revoked = await app.inject({ method: 'DELETE', url: `/api/v1/scm-providers/${OAUTH_PROVIDER_ID}/oauth/token`, cookies });
    expect(revoked.json()).toEqual({ message: 'OAuth token revoked' });
    expect(await harness.storedCredential(user.id, OAUTH_PROVIDER_ID)).toBeNull();
  });

  it('saves a Personal Access Token', async () => {
    const { app, harness, user, cookies } = await setup();
    harness.addPatProvider();

    const res = await app.inject({
      method: 'POST',
      url: `/api/v1/scm-providers/${PAT_PROVIDER_ID}/token`,
      cookies,
      payload: { access_token: 'pat-value' },
    });

    expect(res.json()).toEqual({ message: 'Personal Access Token saved successfully' });
    expect((await harness.storedCredential(user.id, PAT_PROVIDER_ID))?.record.tokenType).toBe('pat');
  });

  it('requires access_token when saving a PAT', async () => {
    const { app, harness, cookies } = await setup();
    harness.addPatProvider();

    const res = await app.inject({
      method: 'POST',
      url: `/api/v1/scm-providers/${PAT_PROVIDER_ID}/token`,
      cookies,
      payload: {},
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe('access_token is required');
  });
});

describe('/api/v1/scm-providers/:id/repositories', () => {
  it('lists repositories in wire format', async () => {
    const { app, harness, user, cookies } = await setup();
    harness.addOAuthProvider();
    harness.addCredential({ userId: user.id });
    harness.connector.repositories = [
      {
        id: '42',
        owner: 'acme',
        name: 'terraform-aws-vpc',
        fullName: 'acme/terraform-aws-vpc',
        description: 'VPC module',
        htmlUrl: 'https://scm.example.test/acme/terraform-aws-vpc',
        cloneUrl: 'https://scm.example.test/acme/terraform-aws-vpc.git',
        defaultBranch: 'main',
        isPrivate: true,
      },
    ];

    const res = await app.inject({ method: 'GET', url: `/api/v1/scm-providers/${OAUTH_PROVIDER_ID}/repositories`, cookies });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      repositories: [
        {
          id: '42',
          name: 'terraform-aws-vpc',
          full_name: 'acme/terraform-aws-vpc',
          owner: 'acme',
          description: 'VPC module',
          default_branch: 'main',
          clone_url: 'https://scm.example.test/acme/terraform-aws-vpc.git',
          html_url: 'https://scm.example.test/acme/terraform-aws-vpc',
          private: true,
        },
      ],
    });
  });

  it('lists tags and branches', async () => {
    const { app, harness, user, cookies } = await setup();
    harness.addOAuthProvider();
    harness.addCredential({ userId: user.id });
    harness.connector.tags = [
      { name: 'v1.2.0', commitSha: 'abc123', message: 'Release', createdAt: new Date('2024-05-01T10:00:00.000Z') },
    ];
    harness.connector.branches = [{ name: 'main', commitSha: 'def456', isProtected: true, isDefault: true }];

    const tags = await app.inject({
      method: 'GET',
      url: `/api/v1/scm-providers/${OAUTH_PROVIDER_ID}/repositories/acme/terraform-aws-vpc/tags`,
      cookies,
    });
    expect(tags.json()).toEqual({
      tags: [
        { tag_name: 'v1.2.0', target_commit: 'abc123', annotation_msg: 'Release', tagged_at: '2024-05-01T10:00:00.000Z' },
      ],
    });

    const branches = await app.inject({
      method: 'GET',
      url: `/api/v1/scm-providers/${OAUTH_PROVIDER_ID}/repositories/acme/terraform-aws-vpc/branches`,
      cookies,
    });
    expect(branches.json()).toEqual({
      branches: [{ branch_name: 'main', head_commit: 'def456', is_protected: true, is_main_branch: true }],
    });
  });

  it('asks the user to reconnect when the credential stays rejected', async () => {
    const { app, harness, user, cookies } = await setup();
    harness.addOAuthProvider();
    harness.addCredential({ userId: user.id });
    harness.connector.readFailures.push(new ScmApiError(401, 'Bad credentials'), new ScmApiError(401, 'Bad credentials'));

    const res = await app.inject({ method: 'GET', url: `/api/v1/scm-providers/${OAUTH_PROVIDER_ID}/repositories`, cookies });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ statusCode: 401, error: 'UpstreamAuthError', message: RECONNECT_MESSAGE });
    expect(harness.connector.calls.renewToken).toBe(1);
  });

  it('reports a user who has not connected', async () => {
    const { app, harness, cookies } = await setup();
    harness.addOAuthProvider();

    const res = await app.inject({ method: 'GET', url: `/api/v1/scm-providers/${OAUTH_PROVIDER_ID}/repositories`, cookies });

    expect(res.statusCode).toBe(401);
    expect(res.json().message).toBe('not connected to this provider');
  });
});
