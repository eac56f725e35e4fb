/**
 * RetrievalService Unit Tests
 *
 * Hybrid fusion of keyword and semantic rankings, plus degradation.
 */

import { describe, it, expect, beforeEach } from 'vitest';

import {
  createRetrievalService,
  documentKey,
  fuseRankings,
} from '@/services/retrieval.service.js';
import type { RetrievalService } from '@/services/retrieval.service.js';

import { doc } from '../../fixtures/index.js';
import { createMockSearcher } from '../../mocks/index.js';

const A = doc('Alpha document about rents', 'kb-a');
const B = doc('Beta document about licences', 'kb-b');
const C = doc('Gamma document about footfall', 'kb-c');
const D = doc('Delta document about menus', 'kb-d');

function texts(list: { text: string }[]): string[] {
  return list.map((d) => d.text);
}

describe('fuseRankings', () => {
  it('should combine positional scores with equal weight', () => {
    const fused = fuseRankings([A, B, C], [C, D], 0.5, 10);

    expect(texts(fused)).toEqual([C.text, A.text, B.text, D.text]);
    expect(fused[0]?.keywordScore).toBeCloseTo(1 / 3);
    expect(fused[0]?.semanticScore).toBe(1);
    expect(fused[0]?.score).toBeCloseTo(2 / 3);
    expect(fused[3]?.score).toBeCloseTo(0.25);
  });

  it('should reproduce the keyword ranking at alpha 0', () => {
    expect(texts(fuseRankings([A, B, C], [D, C], 0, 10))).toEqual([A.text, B.text, C.text]);
  });

  it('should reproduce the semantic ranking at alpha 1', () => {
    expect(texts(fuseRankings([A, B, C], [D, C], 1, 10))).toEqual([D.text, C.text]);
  });

  it('should keep first-seen order on ties, keyword list first', () => {
    expect(texts(fuseRankings([A], [B], 0.5, 10))).toEqual([A.text, B.text]);
  });

  it('should merge duplicates by source and content prefix', () => {
    const sameAsA = doc(A.text, 'kb-a');
    const otherSource = doc(A.text, 'kb-z');

    const fused = fuseRankings([A, sameAsA, B], [otherSource], 0.5, 10);

    expect(fused.map((d) => d.key)).toEqual([
      `kb-a${A.text}`,
      `kb-z${A.text}`,
      `kb-b${B.text}`,
    ]);
    expect(fused[0]?.keywordScore).toBe(1);
    expect(fused[2]?.keywordScore).toBeCloseTo(1 / 3);
  });

  it('should truncate to k', () => {
    expect(fuseRankings([A, B, C], [D], 0.5, 2)).toHaveLength(2);
    expect(fuseRankings([A, B, C], [D], 0.5, 0)).toEqual([]);
  });
});

describe('documentKey', () => {
  it('should use an empty source when none is recorded', () => {
    const text = 'x'.repeat(150);
    expect(documentKey({ text, metadata: {} })).toBe('x'.repeat(100));
    expect(documentKey({ text: 'abc', metadata: { source: 42 } })).toBe('abc');
  });
});

describe('RetrievalService', () => {
  let searcher: ReturnType<typeof createMockSearcher>;
  let retrievalService: RetrievalService;

  beforeEach(() => {
    searcher = createMockSearcher();
    retrievalService = createRetrievalService({ searcher, timeoutMs: 20 });
  });

  it('should request 2k candidates from both searches', async () => {
    searcher.keywordSearch.mockResolvedValue([A, B]);
    searcher.semanticSearch.mockResolvedValue([B, C]);

    const result = await retrievalService.search('rent', { types: ['real_estate'] }, 2);

    expect(searcher.keywordSearch).toHaveBeenCalledWith('rent', { types: ['real_estate'] }, 4);
    expect(searcher.semanticSearch).toHaveBeenCalledWith('rent', { types: ['real_estate'] }, 4);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.mode).toBe('hybrid');
      expect(texts(result.data.documents)).toEqual([B.text, A.text]);
    }
  });

  it('should honour a per-call alpha', async () => {
    searcher.keywordSearch.mockResolvedValue([A, B]);
    searcher.semanticSearch.mockResolvedValue([C]);

    const result = await retrievalService.search('rent', {}, 5, { alpha: 1 });

    expect(result.success && texts(result.data.documents)).toEqual([C.text]);
  });

  it('should degrade to keyword results when semantic search fails', async () => {
    searcher.keywordSearch.mockResolvedValue([A, B, C]);
    searcher.semanticSearch.mockRejectedValue(new Error('embedding quota'));

    const result = await retrievalService.search('rent', {}, 2);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.mode).toBe('keyword_only');
      expect(texts(result.data.documents)).toEqual([A.text, B.text]);
    }
  });

  it('should degrade to keyword results when semantic search times out', async () => {
    searcher.keywordSearch.mockResolvedValue([A]);
    searcher.semanticSearch.mockReturnValue(new Promise(() => undefined));

    const result = await retrievalService.search('rent', {}, 3);

    expect(result.success && result.data.mode).toBe('keyword_only');
  });

  it('should retry the keyword search once with k when it fails', async () => {
    searcher.keywordSearch
      .mockRejectedValueOnce(new Error('fts unavailable'))
      .mockResolvedValueOnce([D]);
    searcher.semanticSearch.mockResolvedValue([A]);

    const result = await retrievalService.search('menus', {}, 3);

    expect(searcher.keywordSearch).toHaveBeenCalledTimes(2);
    expect(searcher.keywordSearch).toHaveBeenLastCalledWith('menus', {}, 3);
    expect(result).toEqual({
      success: true,
      data: {
        mode: 'keyword_only',
        documents: [
          { ...D, key: `kb-d${D.text}`, keywordScore: 1, semanticScore: 0, score: 1 },
        ],
      },
    });
  });

  it('should fail with RETRIEVAL_FAILED when the retry also fails', async () => {
    searcher.keywordSearch.mockRejectedValue(new Error('fts unavailable'));

    const result = await retrievalService.search('menus', {}, 3);

    expect(result).toEqual({
      success: false,
      error: {
        code: 'RETRIEVAL_FAILED',
        message: 'Document search unavailable',
        details: { reason: 'fts unavailable' },
      },
    });
  });

  it('should not search when k is zero', async () => {
    const result = await retrievalService.search('menus', {}, 0);

    expect(result).toEqual({ success: true, data: { documents: [], mode: 'hybrid' } });
    expect(searcher.keywordSearch).not.toHaveBeenCalled();
  });
});
