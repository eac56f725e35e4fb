/**
 * Configuration exports
 */

export { loadConfig } from './env.js';
export type { AppConfig, Env } from './env.js';
export { ACCESS_POLICY } from './access-policy.js';
export { CONTEXT_PLANS, DEFAULT_CONTEXT_LIMITS } from './context-plans.js';
export {
  INTENT_RULES,
  CITY_GAZETTEER,
  PREFERENCE_TABLES,
  SPECIALIST_TERMS,
  containsTerm,
  titleCase,
} from './vocabulary.js';
