/**
 * Role access policy
 *
 * Loaded once at startup and frozen. basic_query is listed explicitly for
 * every role so the fallback path always authorizes.
 */

import type { AccessPolicy, RolePolicy } from '../types/index.js';

const READ_ONLY = ['read'] as const;
const FULL = ['read', 'write', 'delete'] as const;

function freezePolicy(policy: RolePolicy): RolePolicy {
  return Object.freeze({
    ...policy,
    intents: Object.freeze([...policy.intents]),
    domains: Object.freeze([...policy.domains]),
    documents: Object.freeze([...policy.documents]),
    graph: Object.freeze([...policy.graph]),
    memory: Object.freeze([...policy.memory]),
  });
}

export const ACCESS_POLICY: AccessPolicy = Object.freeze({
  admin: freezePolicy({
    intents: ['*'],
    domains: ['*'],
    documents: FULL,
    graph: FULL,
    memory: FULL,
    description: 'Full access to every advisor and data store',
  }),
  analyst: freezePolicy({
    intents: [
      'market_analysis',
      'location_recommender',
      'regulatory_advisor',
      'domain_specialist',
      'consumer_survey',
      'demographics',
      'pdf_research',
      'basic_query',
    ],
    domains: ['financial', 'marketing', 'cuisine'],
    documents: READ_ONLY,
    graph: READ_ONLY,
    memory: READ_ONLY,
    description: 'Market research and analysis; read-only data access',
  }),
  restaurant_owner: freezePolicy({
    intents: [
      'location_recommender',
      'regulatory_advisor',
      'domain_specialist',
      'real_estate',
      'basic_query',
    ],
    domains: ['cuisine', 'design', 'staffing'],
    documents: READ_ONLY,
    graph: READ_ONLY,
    memory: READ_ONLY,
    description: 'Location, compliance and operational advice for owners',
  }),
  operations: freezePolicy({
    intents: ['domain_specialist', 'basic_query'],
    domains: ['staffing', 'technology', 'design'],
    documents: READ_ONLY,
    graph: READ_ONLY,
    memory: READ_ONLY,
    description: 'Day-to-day operations specialists',
  }),
  guest: freezePolicy({
    intents: ['basic_query'],
    domains: [],
    documents: READ_ONLY,
    graph: READ_ONLY,
    memory: [],
    description: 'General questions with limited context',
  }),
});
