/**
 * Re-export all types
 */

export * from './auth';
export * from './user';
export * from './audit';
export * from './config';
export * from './runtime';
export * from './api';
