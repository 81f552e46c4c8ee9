/**
 * Re-export all schemas
 */

export * from './auth.schema';
export * from './user.schema';
export * from './config.schema';
