/**
 * PermissionService
 * Role-based gate in front of dispatch, retrieval and memory access
 *
 * SCOPE: Pure lookups against the static AccessPolicy
 *
 * Owns: No tables (policy is frozen configuration)
 *
 * GUARDRAILS:
 * - Every check is pure and synchronous; callers record denials
 * - Unknown roles resolve to an empty policy (deny everything except
 *   the fallback intent being re-routed by the caller)
 */

import {
  FALLBACK_INTENT,
  WILDCARD,
  type AccessPolicy,
  type Authorization,
  type DataStore,
  type Intent,
  type Permission,
  type RolePolicy,
  type SpecialistDomain,
} from '../types/index.js';

const EMPTY_POLICY: RolePolicy = Object.freeze({
  intents: [],
  domains: [],
  documents: [],
  graph: [],
  memory: [],
  description: 'Unknown role',
});

/**
 * PermissionService interface
 */
export interface PermissionService {
  authorize(role: string, intent: Intent): Authorization;
  canReadStore(role: string, store: DataStore): boolean;
  canAccessDomain(role: string, domain: SpecialistDomain): boolean;
  canUseMemory(role: string, permission: Permission): boolean;
  allowedIntents(role: string): readonly Intent[] | typeof WILDCARD;
  describeRole(role: string): string;
}

export interface PermissionServiceDeps {
  policy: AccessPolicy;
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

export function createPermissionService(
  deps: PermissionServiceDeps
): PermissionService {
  const policies = new Map<string, RolePolicy>(Object.entries(deps.policy));

  function policyFor(role: string): RolePolicy {
    return policies.get(role) ?? EMPTY_POLICY;
  }

  return {
    authorize(role: string, intent: Intent): Authorization {
      const { intents } = policyFor(role);
      if (intents.includes(WILDCARD) || intents.includes(intent)) {
        return { allowed: true, effectiveIntent: intent };
      }
      return { allowed: false, effectiveIntent: FALLBACK_INTENT };
    },

    canReadStore(role: string, store: DataStore): boolean {
      return policyFor(role)[store].includes('read');
    },

    canAccessDomain(role: string, domain: SpecialistDomain): boolean {
      const { domains } = policyFor(role);
      return domains.includes(WILDCARD) || domains.includes(domain);
    },

    canUseMemory(role: string, permission: Permission): boolean {
      return policyFor(role).memory.includes(permission);
    },

    allowedIntents(role: string): readonly Intent[] | typeof WILDCARD {
      const { intents } = policyFor(role);
      if (intents.includes(WILDCARD)) {
        return WILDCARD;
      }
      return intents.filter((intent): intent is Intent => intent !== WILDCARD);
    },

    describeRole(role: string): string {
      return policyFor(role).description;
    },
  };
}
