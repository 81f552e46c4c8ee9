/**
 * Keyward Daemon
 *
 * Authenticator, session policy, access control and the HTTP API.
 *
 * @packageDocumentation
 */

export { CredentialEngine, OPERATOR_IDENTITY } from './engine';
export type { CredentialEngineOptions, LoginResult } from './engine';
export { openEngine } from './bootstrap';
export type { OpenEngineOptions } from './bootstrap';
export { Authenticator, toIdentity } from './auth/authenticator';
export { SessionManager } from './auth/session';
export { capabilities, hasCapability, authorize, isAdmin, canWrite, canRead } from './auth/access';
export { extractToken, registerAuthContext, requireCapability } from './auth/middleware';
export { AccountDisabledError, AccountLockedError, PermissionDeniedError } from './errors';
export { createServer, startServer } from './server';
export type { DaemonServer } from './server';
export { registerRoutes } from './routes/index';
export * from './config/index';
