/**
 * Access control
 *
 * Role to capability mapping and the single capability gate used by every
 * mutating entry point.
 */

import type { Capability, Identity, Role } from '@keyward/ipc';
import { PermissionDeniedError } from '../errors';

const ROLE_CAPABILITIES: Record<Role, ReadonlySet<Capability>> = {
  user: new Set<Capability>(['read']),
  admin: new Set<Capability>(['read', 'write', 'admin']),
};

/**
 * Capabilities granted to a role. Admin implies read and write.
 */
export function capabilities(role: Role): ReadonlySet<Capability> {
  return ROLE_CAPABILITIES[role];
}

export function hasCapability(identity: Identity | null | undefined, capability: Capability): boolean {
  return identity ? capabilities(identity.role).has(capability) : false;
}

/**
 * Gate an operation on a capability. Returns the identity when allowed.
 */
export function authorize(identity: Identity | null | undefined, capability: Capability): Identity {
  if (!identity || !hasCapability(identity, capability)) {
    throw new PermissionDeniedError(capability, identity?.username);
  }
  return identity;
}

export function isAdmin(identity: Identity | null | undefined): boolean {
  return hasCapability(identity, 'admin');
}

export function canWrite(identity: Identity | null | undefined): boolean {
  return hasCapability(identity, 'write');
}

export function canRead(identity: Identity | null | undefined): boolean {
  return hasCapability(identity, 'read');
}
