/**
 * Keyword vocabulary
 *
 * Loads the rule table, gazetteer, preference tables and specialist terms
 * from vocabulary.json and validates them once at module load.
 */

import { z } from 'zod';

import {
  RULE_INTENTS,
  SPECIALIST_DOMAINS,
  type IntentRule,
  type PreferenceKey,
  type SpecialistDomain,
} from '../types/index.js';

import rawVocabulary from './vocabulary.json' with { type: 'json' };

const vocabularySchema = z.object({
  intentRules: z.array(
    z.object({
      intent: z.enum(RULE_INTENTS),
      description: z.string(),
      parameters: z.array(z.string()),
      triggers: z.array(z.string()),
      defaults: z.record(z.string()),
    })
  ),
  cities: z.array(z.string()).min(1),
  preferences: z.object({
    cuisine: z.record(z.string()),
    city: z.record(z.string()),
    budget: z.record(z.string()),
  }),
  specialistDomains: z.object({
    cuisine: z.array(z.string()),
    financial: z.array(z.string()),
    staffing: z.array(z.string()),
    marketing: z.array(z.string()),
    technology: z.array(z.string()),
    design: z.array(z.string()),
  }),
});

const vocabulary = vocabularySchema.parse(rawVocabulary);

/**
 * Ordered rule table. Cascade priority is array order; rules without
 * triggers are only reachable through the classifier.
 */
export const INTENT_RULES: readonly IntentRule[] = Object.freeze(vocabulary.intentRules);

/**
 * Known city names, lowercase, in match priority order
 */
export const CITY_GAZETTEER: readonly string[] = Object.freeze(vocabulary.cities);

export const PREFERENCE_TABLES: Readonly<
  Record<PreferenceKey, ReadonlyArray<readonly [string, string]>>
> = Object.freeze({
  cuisine: Object.entries(vocabulary.preferences.cuisine),
  city: Object.entries(vocabulary.preferences.city),
  budget: Object.entries(vocabulary.preferences.budget),
});

export const SPECIALIST_TERMS: ReadonlyArray<
  readonly [SpecialistDomain, readonly string[]]
> = SPECIALIST_DOMAINS.map(
  (domain) => [domain, vocabulary.specialistDomains[domain]] as const
);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const termPatterns = new Map<string, RegExp>();

/**
 * Term match anchored at a word start; stems such as "advertis" still
 * match longer words, but "hr" does not match inside "through".
 */
export function containsTerm(lowercasedText: string, term: string): boolean {
  let pattern = termPatterns.get(term);
  if (pattern === undefined) {
    pattern = new RegExp(`(^|[^a-z0-9])${escapeRegExp(term.toLowerCase())}`);
    termPatterns.set(term, pattern);
  }
  return pattern.test(lowercasedText);
}

export function titleCase(value: string): string {
  return value
    .split(' ')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}
