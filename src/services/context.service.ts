/**
 * ContextService
 * Assembles the bounded context bundle handed to intent handlers
 *
 * SCOPE: Per-intent derived queries, permission-gated retrieval,
 *        truncation, and the short-lived insight cache
 *
 * Owns: No tables (reads from other services)
 *
 * Dependencies:
 * - PermissionService (store read flags)
 * - RetrievalService (hybrid document search)
 * - GraphContextService (graph lookups)
 * - MemoryService (insight cache, session scratch)
 *
 * GUARDRAILS:
 * - buildContext() never rejects; a failed source yields []
 * - Store permissions are checked independently
 * - External calls never run under a memory lock
 */

import { createLogger, type Logger } from '../lib/index.js';
import {
  type BuildContextParams,
  type ContextBundle,
  type ContextLimits,
  type ContextPlan,
  type ContextPlanTable,
  type ContextSource,
  type DataStore,
  type GraphSection,
  type JsonValue,
  type RankedDocument,
  type Result,
  type RoutingParameters,
  type DocumentFilter,
} from '../types/index.js';

/**
 * PermissionService dependency interface
 */
export interface ContextServicePermissionDep {
  canReadStore(role: string, store: DataStore): boolean;
}

/**
 * RetrievalService dependency interface
 */
export interface ContextServiceRetrievalDep {
  search(
    query: string,
    filter: DocumentFilter,
    k: number
  ): Promise<Result<{ documents: RankedDocument[] }>>;
}

/**
 * GraphContextService dependency interface
 */
export interface ContextServiceGraphDep {
  collect(
    sections: readonly GraphSection[],
    city: string,
    parameters: RoutingParameters,
    maxInsights?: number
  ): Promise<Result<string[]>>;
}

/**
 * MemoryService dependency interface
 */
export interface ContextServiceMemoryDep {
  setInsight(userId: string, key: string, value: JsonValue): Promise<void>;
  setSessionValue(userId: string, key: string, value: JsonValue): Promise<void>;
}

/**
 * ContextService interface
 */
export interface ContextService {
  buildContext(params: BuildContextParams): Promise<ContextBundle>;
  deriveQuery(plan: ContextPlan, parameters: RoutingParameters, query: string): string;
}

export interface ContextServiceDeps {
  permissionService: ContextServicePermissionDep;
  retrievalService: ContextServiceRetrievalDep;
  graphContextService: ContextServiceGraphDep;
  memoryService: ContextServiceMemoryDep;
  plans: ContextPlanTable;
  limits: ContextLimits;
  now?: () => number;
  logger?: Logger;
}

interface DocumentsOutcome {
  documents: RankedDocument[];
  failed: boolean;
}

interface GraphOutcome {
  insights: string[];
  failed: boolean;
}

export function insightKey(intent: string): string {
  return `route:${intent}`;
}

function present(value: string | undefined): string | null {
  if (value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

function documentSources(documents: readonly RankedDocument[]): string[] {
  const sources = new Set<string>();
  for (const doc of documents) {
    const source = doc.metadata.source;
    if (typeof source === 'string' && source !== '') {
      sources.add(source);
    }
  }
  return [...sources];
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

export function createContextService(deps: ContextServiceDeps): ContextService {
  const {
    permissionService,
    retrievalService,
    graphContextService,
    memoryService,
    plans,
    limits,
  } = deps;
  const now = deps.now ?? Date.now;
  const log = deps.logger ?? createLogger('context');

  function deriveQuery(
    plan: ContextPlan,
    parameters: RoutingParameters,
    query: string
  ): string {
    const parts: string[] = [];

    if (plan.useRawQuery) {
      const raw = query.trim();
      if (raw !== '') {
        parts.push(raw);
      }
    } else if (plan.phrase !== null) {
      parts.push(plan.phrase);
    }

    for (const { parameter, template, when } of plan.parameters) {
      const value = present(parameters[parameter]);
      if (value === null) {
        continue;
      }
      if (when !== undefined && value.toLowerCase() !== when.toLowerCase()) {
        continue;
      }
      parts.push(template.replace('{value}', value));
    }

    if (plan.keywords !== null) {
      parts.push(plan.keywords);
    }

    return parts.join(' ');
  }

  async function fetchDocuments(
    plan: ContextPlan,
    derived: string
  ): Promise<DocumentsOutcome> {
    const filter: DocumentFilter =
      plan.filterTypes.length > 0 ? { types: plan.filterTypes } : {};

    try {
      const result = await retrievalService.search(derived, filter, plan.k);
      if (result.success) {
        return { documents: result.data.documents, failed: false };
      }
      log.warn({ reason: result.error.message }, 'Document retrieval degraded');
    } catch (err) {
      log.warn({ err }, 'Document retrieval threw');
    }
    return { documents: [], failed: true };
  }

  async function fetchGraph(
    plan: ContextPlan,
    city: string,
    parameters: RoutingParameters
  ): Promise<GraphOutcome> {
    try {
      const result = await graphContextService.collect(
        plan.graph,
        city,
        parameters,
        limits.maxGraphInsights
      );
      if (result.success) {
        return { insights: result.data, failed: false };
      }
      log.warn({ reason: result.error.details ?? result.error.message }, 'Graph lookup degraded');
    } catch (err) {
      log.warn({ err }, 'Graph lookup threw');
    }
    return { insights: [], failed: true };
  }

  return {
    deriveQuery,

    async buildContext(params: BuildContextParams): Promise<ContextBundle> {
      const { intent, parameters, role, userId, query } = params;
      const plan = plans[intent];
      const derived = deriveQuery(plan, parameters, query);
      const city = present(parameters.city);

      const canReadDocuments = permissionService.canReadStore(role, 'documents');
      const canReadGraph = permissionService.canReadStore(role, 'graph');

      // Step 1: Both sources in parallel, each independently gated
      const skippedDocuments: DocumentsOutcome = { documents: [], failed: false };
      const skippedGraph: GraphOutcome = { insights: [], failed: false };

      const [docs, graph] = await Promise.all([
        canReadDocuments ? fetchDocuments(plan, derived) : skippedDocuments,
        canReadGraph && city !== null && plan.graph.length > 0
          ? fetchGraph(plan, city, parameters)
          : skippedGraph,
      ]);

      // Step 2: Truncate documents; graph insights arrive already capped
      const documents = docs.documents.slice(0, Math.min(plan.k, limits.maxDocuments));
      const graphInsights = graph.insights;

      const degraded: ContextSource[] = [];
      if (docs.failed) {
        degraded.push('documents');
      }
      if (graph.failed) {
        degraded.push('graph');
      }

      const bundle: ContextBundle = {
        documents: documents.map((doc) => doc.text),
        graphInsights,
        sources: documentSources(documents),
        degraded,
        query: derived,
      };

      // Step 3: Cache a digest for an immediately following related query
      await memoryService.setInsight(userId, insightKey(intent), {
        documents: bundle.documents.slice(0, limits.cachedDocuments),
        graph: graphInsights.slice(0, limits.cachedGraphInsights),
        parameters: { ...parameters },
        cachedAt: new Date(now()).toISOString(),
      });
      await memoryService.setSessionValue(userId, 'lastRoute', intent);
      await memoryService.setSessionValue(userId, 'lastParameters', { ...parameters });

      return bundle;
    },
  };
}
