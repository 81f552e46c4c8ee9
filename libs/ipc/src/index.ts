/**
 * Keyward IPC Library
 *
 * Shared types, schemas, and constants for communication between
 * the Keyward daemon and its clients (CLI, dashboard).
 *
 * @packageDocumentation
 */

// Types (primary type definitions)
export * from './types/index';

// Schemas
export * from './schemas/index';

// Constants
export * from './constants';
