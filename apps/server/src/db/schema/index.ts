export * from './users.js';
export * from './sessions.js';
export * from './scm-providers.js';
export * from './scm-oauth-tokens.js';
