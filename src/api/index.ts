/**
 * API Layer Exports
 *
 * API layer is thin - delegates to services for all business logic.
 */

export { createApp } from './app.js';
export type { ApiServices, AppOptions } from './app.js';
export { createAuthMiddleware, createPublicMiddleware, toUser } from './middleware/auth.js';
export type { AuthUser, AuthVerifier } from './middleware/auth.js';
export { ERROR_STATUS_MAP, getErrorStatus } from './types.js';
