/**
 * RouterService
 * Maps free-text queries to (intent, parameters, rationale)
 *
 * SCOPE: Model-backed classification with a deterministic keyword cascade
 *
 * Owns: No tables
 *
 * Dependencies:
 * - Classifier (raw model reply, may be noisy)
 * - Rule table and city gazetteer (vocabulary.json)
 *
 * GUARDRAILS:
 * - route() never rejects; every failure path yields a valid decision
 * - One rule table feeds both the classifier prompt and the cascade
 */

import { z } from 'zod';

import { containsTerm, titleCase } from '../config/vocabulary.js';
import { createLogger, withTimeout, type Logger } from '../lib/index.js';
import {
  errorMessage,
  failure,
  FALLBACK_INTENT,
  isIntent,
  success,
  type Classifier,
  type Intent,
  type IntentRule,
  type Result,
  type RoutingDecision,
  type RoutingParameters,
} from '../types/index.js';

/**
 * RouterService interface
 */
export interface RouterService {
  route(query: string): Promise<RoutingDecision>;
  /** Keyword cascade only; exposed for diagnostics and tests */
  matchKeywords(query: string): RoutingDecision;
}

export interface RouterServiceDeps {
  classifier: Classifier;
  rules: readonly IntentRule[];
  gazetteer: readonly string[];
  timeoutMs: number;
  logger?: Logger;
}

// ─────────────────────────────────────────────────────────────
// PAYLOAD EXTRACTION
// ─────────────────────────────────────────────────────────────

const payloadSchema = z
  .object({
    intent: z.string().optional(),
    agent: z.string().optional(),
    parameters: z.record(z.unknown()).nullish(),
    rationale: z.string().optional(),
    reasoning: z.string().optional(),
  })
  .passthrough();

export interface ClassifierPayload {
  intent: Intent;
  parameters: Record<string, string>;
  rationale: string;
}

function coerceParameter(value: unknown): string | null {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? null : trimmed;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (Array.isArray(value)) {
    const parts = value
      .map((item) => coerceParameter(Array.isArray(item) ? null : item))
      .filter((item): item is string => item !== null);
    return parts.length === 0 ? null : parts.join(' ');
  }
  return null;
}

function toPayload(candidate: unknown): ClassifierPayload | null {
  const parsed = payloadSchema.safeParse(candidate);
  if (!parsed.success) {
    return null;
  }

  const intent = (parsed.data.intent ?? parsed.data.agent ?? '').trim();
  if (!isIntent(intent)) {
    return null;
  }

  const parameters: Record<string, string> = {};
  for (const [name, raw] of Object.entries(parsed.data.parameters ?? {})) {
    const value = coerceParameter(raw);
    if (value !== null) {
      parameters[name] = value;
    }
  }

  return {
    intent,
    parameters,
    rationale:
      parsed.data.rationale ?? parsed.data.reasoning ?? 'Classified by model',
  };
}

function tryJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Yield every balanced {...} span, skipping braces inside JSON strings
 */
function* balancedObjects(text: string): Generator<string> {
  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
      const ch = text[i];
      if (inString) {
        if (escaped) {
          escaped = false;
        } else if (ch === '\\') {
          escaped = true;
        } else if (ch === '"') {
          inString = false;
        }
        continue;
      }
      if (ch === '"') {
        inString = true;
      } else if (ch === '{') {
        depth++;
      } else if (ch === '}') {
        depth--;
        if (depth === 0) {
          yield text.slice(start, i + 1);
          break;
        }
      }
    }
  }
}

/**
 * Locate and validate the routing payload inside a raw classifier reply.
 * Fenced ```json blocks are tried first, then each balanced object span.
 */
export function parseClassifierReply(raw: string): Result<ClassifierPayload> {
  const candidates: string[] = [];

  for (const match of raw.matchAll(/```(?:json)?\s*([\s\S]*?)```/gi)) {
    const body = match[1];
    if (body !== undefined) {
      candidates.push(body.trim());
    }
  }
  candidates.push(...balancedObjects(raw));

  for (const candidate of candidates) {
    const payload = toPayload(tryJson(candidate));
    if (payload !== null) {
      return success(payload);
    }
  }

  return failure(
    'CLASSIFICATION_FAILED',
    'No valid routing payload in classifier reply'
  );
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

export function createRouterService(deps: RouterServiceDeps): RouterService {
  const { classifier, rules, gazetteer, timeoutMs } = deps;
  const log = deps.logger ?? createLogger('router');

  function findCity(lowercased: string): string | null {
    const city = gazetteer.find((name) => containsTerm(lowercased, name));
    return city === undefined ? null : titleCase(city);
  }

  /**
   * Inject a gazetteer city when none was extracted
   */
  function withCity(query: string, decision: RoutingDecision): RoutingDecision {
    const existing = decision.parameters.city;
    if (existing !== undefined && existing.trim() !== '') {
      return decision;
    }
    const city = findCity(query.toLowerCase());
    if (city === null) {
      return decision;
    }
    return { ...decision, parameters: { ...decision.parameters, city } };
  }

  function matchKeywords(query: string): RoutingDecision {
    const lowercased = query.toLowerCase();

    for (const rule of rules) {
      const term = rule.triggers.find((trigger) => containsTerm(lowercased, trigger));
      if (term !== undefined) {
        const parameters: RoutingParameters = { ...rule.defaults };
        return {
          intent: rule.intent,
          parameters,
          rationale: `Keyword "${term}" matched ${rule.intent}`,
          source: 'keyword_fallback',
        };
      }
    }

    return {
      intent: FALLBACK_INTENT,
      parameters: {},
      rationale: 'No keyword rule matched; using general advisor',
      source: 'keyword_fallback',
    };
  }

  async function classify(query: string): Promise<Result<ClassifierPayload>> {
    try {
      const raw = await withTimeout(
        () => classifier.classify(query),
        timeoutMs,
        'classifier'
      );
      return parseClassifierReply(raw);
    } catch (err) {
      return failure('CLASSIFICATION_FAILED', errorMessage(err));
    }
  }

  return {
    matchKeywords,

    async route(query: string): Promise<RoutingDecision> {
      const text = query.trim();
      if (text === '') {
        return {
          intent: FALLBACK_INTENT,
          parameters: {},
          rationale: 'Empty query; using general advisor',
          source: 'keyword_fallback',
        };
      }

      try {
        const classified = await classify(text);

        if (classified.success) {
          return withCity(text, {
            intent: classified.data.intent,
            parameters: classified.data.parameters,
            rationale: classified.data.rationale,
            source: 'classifier',
          });
        }

        log.warn(
          { reason: classified.error.message },
          'Classifier failed, using keyword rules'
        );
        const fallback = matchKeywords(text);
        return withCity(text, {
          ...fallback,
          rationale: `Classifier unavailable (${classified.error.message}). ${fallback.rationale}`,
        });
      } catch (err) {
        log.error({ err }, 'Routing failed');
        return {
          intent: FALLBACK_INTENT,
          parameters: {},
          rationale: `Routing failed: ${errorMessage(err)}`,
          source: 'keyword_fallback',
        };
      }
    },
  };
}
