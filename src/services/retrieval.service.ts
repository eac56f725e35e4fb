/**
 * RetrievalService
 * Hybrid keyword + semantic search with positional score fusion
 *
 * SCOPE: Fusing two ranked lists from the document store into one
 *
 * Owns: No tables
 *
 * Dependencies:
 * - DocumentSearcher (keyword and semantic capabilities)
 *
 * GUARDRAILS:
 * - Never rejects; failures become keyword-only results or a Failure
 * - Output never exceeds k
 */

import { createLogger, withTimeout, type Logger } from '../lib/index.js';
import {
  errorMessage,
  failure,
  success,
  type DocumentFilter,
  type RankedDocument,
  type Result,
  type SearchDocument,
} from '../types/index.js';

/**
 * Document store capabilities, same signature for both
 */
export interface DocumentSearcher {
  keywordSearch(query: string, filter: DocumentFilter, k: number): Promise<SearchDocument[]>;
  semanticSearch(query: string, filter: DocumentFilter, k: number): Promise<SearchDocument[]>;
}

export type SearchMode = 'hybrid' | 'keyword_only';

export interface HybridSearchResult {
  documents: RankedDocument[];
  mode: SearchMode;
}

export interface SearchOptions {
  /** Fusion weight for the semantic list, 0..1 */
  alpha?: number;
}

/**
 * RetrievalService interface
 */
export interface RetrievalService {
  search(
    query: string,
    filter: DocumentFilter,
    k: number,
    options?: SearchOptions
  ): Promise<Result<HybridSearchResult>>;
}

export interface RetrievalServiceDeps {
  searcher: DocumentSearcher;
  alpha?: number;
  timeoutMs: number;
  logger?: Logger;
}

/** Characters of content used in the composite key */
const KEY_PREFIX_LENGTH = 100;

// ─────────────────────────────────────────────────────────────
// FUSION
// ─────────────────────────────────────────────────────────────

export function documentKey(doc: SearchDocument): string {
  const source = doc.metadata.source;
  return `${typeof source === 'string' ? source : ''}${doc.text.slice(0, KEY_PREFIX_LENGTH)}`;
}

/**
 * 1 - i/n for rank i of n; duplicate keys keep their best rank
 */
function positionalScores(list: readonly SearchDocument[]): Map<string, number> {
  const scores = new Map<string, number>();
  list.forEach((doc, index) => {
    const key = documentKey(doc);
    if (!scores.has(key)) {
      scores.set(key, 1 - index / list.length);
    }
  });
  return scores;
}

/**
 * Fuse two ranked lists. Ties keep first-seen order (keyword list first).
 * Documents with a combined score of 0 are dropped, so α=0 and α=1
 * reproduce the single-source rankings exactly.
 */
export function fuseRankings(
  keyword: readonly SearchDocument[],
  semantic: readonly SearchDocument[],
  alpha: number,
  k: number
): RankedDocument[] {
  const keywordScores = positionalScores(keyword);
  const semanticScores = positionalScores(semantic);
  const byKey = new Map<string, SearchDocument>();

  for (const doc of [...keyword, ...semantic]) {
    const key = documentKey(doc);
    if (!byKey.has(key)) {
      byKey.set(key, doc);
    }
  }

  const ranked: RankedDocument[] = [];
  for (const [key, doc] of byKey) {
    const keywordScore = keywordScores.get(key) ?? 0;
    const semanticScore = semanticScores.get(key) ?? 0;
    const score = keywordScore * (1 - alpha) + semanticScore * alpha;
    if (score > 0) {
      ranked.push({ ...doc, key, keywordScore, semanticScore, score });
    }
  }

  ranked.sort((a, b) => b.score - a.score);
  return ranked.slice(0, Math.max(0, k));
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

export function createRetrievalService(deps: RetrievalServiceDeps): RetrievalService {
  const { searcher, timeoutMs } = deps;
  const defaultAlpha = deps.alpha ?? 0.5;
  const log = deps.logger ?? createLogger('retrieval');

  return {
    async search(
      query: string,
      filter: DocumentFilter,
      k: number,
      options?: SearchOptions
    ): Promise<Result<HybridSearchResult>> {
      if (k <= 0) {
        return success({ documents: [], mode: 'hybrid' });
      }

      const alpha = Math.min(1, Math.max(0, options?.alpha ?? defaultAlpha));
      const candidates = k * 2;

      const [keyword, semantic] = await Promise.allSettled([
        withTimeout(
          () => searcher.keywordSearch(query, filter, candidates),
          timeoutMs,
          'keyword search'
        ),
        withTimeout(
          () => searcher.semanticSearch(query, filter, candidates),
          timeoutMs,
          'semantic search'
        ),
      ]);

      if (keyword.status === 'fulfilled' && semantic.status === 'fulfilled') {
        return success({
          documents: fuseRankings(keyword.value, semantic.value, alpha, k),
          mode: 'hybrid',
        });
      }

      if (semantic.status === 'rejected') {
        log.warn(
          { err: errorMessage(semantic.reason) },
          'Semantic search failed, degrading to keyword results'
        );
      }

      if (keyword.status === 'fulfilled') {
        return success({
          documents: fuseRankings(keyword.value, [], 0, k),
          mode: 'keyword_only',
        });
      }

      log.warn(
        { err: errorMessage(keyword.reason) },
        'Keyword search failed, retrying once'
      );

      try {
        const retried = await withTimeout(
          () => searcher.keywordSearch(query, filter, k),
          timeoutMs,
          'keyword search retry'
        );
        return success({
          documents: fuseRankings(retried, [], 0, k),
          mode: 'keyword_only',
        });
      } catch (err) {
        log.warn({ err: errorMessage(err) }, 'Document search unavailable');
        return failure('RETRIEVAL_FAILED', 'Document search unavailable', {
          reason: errorMessage(err),
        });
      }
    },
  };
}
