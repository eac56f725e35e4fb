/**
 * Identity and Access Types
 *
 * SCOPE: users, roles, the static access policy table, actor context
 */

import type { Intent, SpecialistDomain } from './routing.js';

export const ROLES = [
  'admin',
  'analyst',
  'restaurant_owner',
  'operations',
  'guest',
] as const;

export type Role = (typeof ROLES)[number];

const ROLE_SET: ReadonlySet<string> = new Set(ROLES);

export function isRole(value: string): value is Role {
  return ROLE_SET.has(value);
}

/**
 * User - resolved by the auth collaborator, immutable for the session
 */
export interface User {
  id: string;
  role: Role;
  displayName: string;
}

export type Permission = 'read' | 'write' | 'delete';

export type DataStore = 'documents' | 'graph';

export const WILDCARD = '*';

/**
 * Policy for a single role
 */
export interface RolePolicy {
  readonly intents: readonly (Intent | typeof WILDCARD)[];
  readonly domains: readonly (SpecialistDomain | typeof WILDCARD)[];
  readonly documents: readonly Permission[];
  readonly graph: readonly Permission[];
  readonly memory: readonly Permission[];
  readonly description: string;
}

export type AccessPolicy = Readonly<Record<Role, RolePolicy>>;

/**
 * Outcome of the permission gate
 */
export interface Authorization {
  allowed: boolean;
  effectiveIntent: Intent;
}

/**
 * Actor Context - who is calling the API
 */
export interface ActorContext {
  type: 'user' | 'anonymous';
  user?: User;
  requestId: string;
}
