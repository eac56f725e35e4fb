/**
 * Context Domain Types
 *
 * SCOPE: document search, graph records, context plans, context bundles
 */

import type { Intent, RoutingParameters } from './routing.js';

// ─────────────────────────────────────────────────────────────
// DOCUMENT STORE
// ─────────────────────────────────────────────────────────────

/**
 * Category filter applied to both search capabilities
 */
export interface DocumentFilter {
  /** Allowed document categories (metadata type); empty or absent = all */
  types?: readonly string[];
}

export interface SearchDocument {
  text: string;
  metadata: Record<string, unknown>;
}

export interface RankedDocument extends SearchDocument {
  /** Composite key: source identifier + content prefix */
  key: string;
  keywordScore: number;
  semanticScore: number;
  score: number;
}

// ─────────────────────────────────────────────────────────────
// GRAPH STORE
// ─────────────────────────────────────────────────────────────

export interface LocationRecord {
  area: string;
  type: string | null;
  score: number | null;
  footTraffic: number | null;
  competitionScore: number | null;
  growthPotential: number | null;
  rentScore: number | null;
  popularCuisines: string[];
  demographics: string[];
}

export interface RegulationRecord {
  type: string;
  description: string;
  authority: string;
  requirements: string[];
  timeline: string | null;
  cost: string | null;
  renewal: string | null;
}

export interface CuisinePopularityRecord {
  cuisineType: string;
  popularity: number;
}

export interface CityProfileRecord {
  name: string;
  state: string | null;
  population: number | null;
  demographics: string[];
  keyMarkets: string[];
}

export interface RecommendLocationsOptions {
  cuisine?: string;
  demographic?: string;
  minScore?: number;
}

// ─────────────────────────────────────────────────────────────
// CONTEXT PLANS
// ─────────────────────────────────────────────────────────────

/**
 * Graph lookups a plan may request
 */
export type GraphSection =
  | 'location_recommendations'
  | 'regulations'
  | 'market_overview'
  | 'consumer_preferences'
  | 'locality_analysis'
  | 'city_profile'
  | 'research_summary'
  | 'city_summary';

/**
 * Renders one parameter into the derived query; `{value}` is substituted
 */
export interface ParameterTemplate {
  parameter: string;
  template: string;
  /** Only render when the parameter equals this value (case-insensitive) */
  when?: string;
}

/**
 * Per-intent recipe for the derived query and lookups
 */
export interface ContextPlan {
  /** Leading domain phrase */
  phrase: string | null;
  /** Start from the raw user query instead of the phrase */
  useRawQuery: boolean;
  parameters: readonly ParameterTemplate[];
  keywords: string | null;
  filterTypes: readonly string[];
  k: number;
  graph: readonly GraphSection[];
}

export type ContextPlanTable = Readonly<Record<Intent, ContextPlan>>;

export interface ContextLimits {
  maxDocuments: number;
  maxGraphInsights: number;
  cachedDocuments: number;
  cachedGraphInsights: number;
}

// ─────────────────────────────────────────────────────────────
// CONTEXT BUNDLE
// ─────────────────────────────────────────────────────────────

export type ContextSource = 'documents' | 'graph';

export interface ContextBundle {
  readonly documents: readonly string[];
  readonly graphInsights: readonly string[];
  readonly sources: readonly string[];
  /** Sources whose lookup failed or timed out */
  readonly degraded: readonly ContextSource[];
  readonly query: string;
}

export interface BuildContextParams {
  intent: Intent;
  parameters: RoutingParameters;
  role: string;
  userId: string;
  query: string;
}

export const EMPTY_CONTEXT: ContextBundle = {
  documents: [],
  graphInsights: [],
  sources: [],
  degraded: [],
  query: '',
};
