export { UserRepository } from './users.repository';
export { mapUser, lockRemainingMs, toSummary } from './users.model';
export type { StoredCredentials } from './users.model';
export type { LockoutPolicy, FailedAttemptResult } from './users.schema';
