/**
 * Authentication types
 *
 * Types for credential verification, sessions and capabilities
 */

/** Role assigned to a user record */
export type Role = 'admin' | 'user';

/** Named permission granted wholesale per role */
export type Capability = 'read' | 'write' | 'admin';

/**
 * Authenticated principal produced by a successful login
 */
export interface Identity {
  username: string;
  role: Role;
  /** Display name, falls back to the username when none is stored */
  displayName: string;
}

/**
 * Session info (internal use)
 */
export interface Session {
  /** Session token */
  token: string;
  username: string;
  role: Role;
  displayName: string;
  /** When session was created (ms since epoch) */
  createdAt: number;
  /** Last request made with this session (ms since epoch) */
  lastActivityAt: number;
}

/**
 * Reason a login attempt was rejected
 */
export type AuthFailureCode = 'INVALID_CREDENTIALS' | 'ACCOUNT_DISABLED' | 'ACCOUNT_LOCKED';

export type AuthFailure =
  | { success: false; code: 'INVALID_CREDENTIALS' }
  | { success: false; code: 'ACCOUNT_DISABLED' }
  | { success: false; code: 'ACCOUNT_LOCKED'; remainingMs: number };

/**
 * Outcome of a single credential check
 */
export type AuthResult = { success: true; identity: Identity } | AuthFailure;

/**
 * Auth configuration
 */
export interface AuthConfig {
  /** Idle time after which a session is treated as logged out */
  sessionTimeoutMs: number;
  /** Consecutive failed attempts that trigger a lockout */
  maxFailedAttempts: number;
  /** Lockout duration in milliseconds */
  lockoutDurationMs: number;
}

/**
 * Default auth configuration
 */
export const DEFAULT_AUTH_CONFIG: AuthConfig = {
  sessionTimeoutMs: 60 * 60 * 1000, // 60 minutes
  maxFailedAttempts: 5,
  lockoutDurationMs: 15 * 60 * 1000, // 15 minutes
};

/**
 * Login request
 */
export interface LoginRequest {
  username: string;
  password: string;
}

/**
 * Login response - returns session token on success
 */
export interface LoginResponse {
  success: boolean;
  /** Session token (only on success) */
  token?: string;
  user?: Identity;
  /** Error message (only on failure) */
  error?: string;
  code?: string;
  /** Seconds until a locked account may retry */
  retryAfterSeconds?: number;
}

/**
 * Self-service password change
 */
export interface ChangeOwnPasswordRequest {
  currentPassword: string;
  newPassword: string;
}
