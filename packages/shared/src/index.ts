export * from './types/api.js';
export * from './types/auth.js';
export * from './types/scm.js';
export * from './constants/roles.js';
export * from './constants/scm.js';
export * from './validation/auth.js';
export * from './validation/scm.js';
