/**
 * Routing Domain Types
 *
 * SCOPE: intents, specialist domains, routing decisions
 */

// ─────────────────────────────────────────────────────────────
// INTENTS
// ─────────────────────────────────────────────────────────────

/**
 * Intents with a rule-table row, in keyword cascade priority order
 */
export const RULE_INTENTS = [
  'location_recommender',
  'regulatory_advisor',
  'market_analysis',
  'consumer_survey',
  'real_estate',
  'demographics',
  'pdf_research',
  'domain_specialist',
] as const;

export const INTENTS = [...RULE_INTENTS, 'basic_query'] as const;

export type RuleIntent = (typeof RULE_INTENTS)[number];

export type Intent = (typeof INTENTS)[number];

/**
 * Universal fallback - every role may dispatch to it
 */
export const FALLBACK_INTENT = 'basic_query' satisfies Intent;

const INTENT_SET: ReadonlySet<string> = new Set(INTENTS);

export function isIntent(value: string): value is Intent {
  return INTENT_SET.has(value);
}

// ─────────────────────────────────────────────────────────────
// SPECIALIST DOMAINS
// ─────────────────────────────────────────────────────────────

/**
 * Sub-capabilities of the domain_specialist intent, in match priority order
 */
export const SPECIALIST_DOMAINS = [
  'cuisine',
  'financial',
  'staffing',
  'marketing',
  'technology',
  'design',
] as const;

export type SpecialistDomain = (typeof SPECIALIST_DOMAINS)[number];

// ─────────────────────────────────────────────────────────────
// ROUTING DECISION
// ─────────────────────────────────────────────────────────────

/**
 * Extracted parameters, always string-valued
 */
export type RoutingParameters = Readonly<Record<string, string>>;

export type RoutingSource = 'classifier' | 'keyword_fallback';

export interface RoutingDecision {
  readonly intent: Intent;
  readonly parameters: RoutingParameters;
  readonly rationale: string;
  readonly source: RoutingSource;
}

/**
 * One row of the keyword rule table
 */
export interface IntentRule {
  intent: RuleIntent;
  description: string;
  parameters: readonly string[];
  triggers: readonly string[];
  defaults: RoutingParameters;
}
