import type { CredentialEngine } from '../engine';

/**
 * Options passed to every route plugin
 */
export interface RouteOptions {
  engine: CredentialEngine;
}
