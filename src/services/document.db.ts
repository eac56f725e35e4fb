/**
 * Document Store Adapter
 * Implements DocumentSearcher using Supabase (Postgres FTS + pgvector)
 *
 * SCOPE: Read-only keyword and semantic search over `documents`
 *
 * Both capabilities go through SQL functions defined in
 * supabase/migrations so results come back already ranked.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { DocumentFilter, SearchDocument } from '../types/index.js';

import type { DocumentSearcher } from './retrieval.service.js';

/**
 * Query embedding capability (OpenRouter embeddings)
 */
export interface QueryEmbedder {
  embed(text: string): Promise<number[]>;
}

/**
 * Row returned by keyword_search_documents / match_documents
 */
interface DocumentRow {
  id: string;
  content: string;
  source: string | null;
  doc_type: string | null;
  metadata: Record<string, unknown> | null;
  score: number;
}

function mapRowToDocument(row: DocumentRow): SearchDocument {
  return {
    text: row.content,
    metadata: {
      ...row.metadata,
      id: row.id,
      source: row.source ?? '',
      type: row.doc_type,
      score: row.score,
    },
  };
}

function filterTypes(filter: DocumentFilter): string[] | null {
  return filter.types !== undefined && filter.types.length > 0
    ? [...filter.types]
    : null;
}

/**
 * Create the Supabase-backed document searcher
 */
export function createDocumentSearcher(
  supabase: SupabaseClient,
  embedder: QueryEmbedder
): DocumentSearcher {
  return {
    async keywordSearch(
      query: string,
      filter: DocumentFilter,
      k: number
    ): Promise<SearchDocument[]> {
      const { data, error } = await supabase.rpc('keyword_search_documents', {
        search_query: query,
        match_count: k,
        filter_types: filterTypes(filter),
      });

      if (error !== null) {
        throw new Error(`Keyword search failed: ${error.message}`);
      }

      return ((data ?? []) as DocumentRow[]).map(mapRowToDocument);
    },

    async semanticSearch(
      query: string,
      filter: DocumentFilter,
      k: number
    ): Promise<SearchDocument[]> {
      const embedding = await embedder.embed(query);

      const { data, error } = await supabase.rpc('match_documents', {
        query_embedding: embedding,
        match_count: k,
        filter_types: filterTypes(filter),
      });

      if (error !== null) {
        throw new Error(`Semantic search failed: ${error.message}`);
      }

      return ((data ?? []) as DocumentRow[]).map(mapRowToDocument);
    },
  };
}
