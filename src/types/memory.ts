/**
 * Memory Domain Types
 *
 * SCOPE: per-user conversational state and its persisted snapshot
 */

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────
// MESSAGES
// ─────────────────────────────────────────────────────────────

export type MessageRole = 'user' | 'assistant' | 'system';

export interface Message {
  role: MessageRole;
  content: string;
}

// ─────────────────────────────────────────────────────────────
// RECORD
// ─────────────────────────────────────────────────────────────

export type PreferenceKey = 'cuisine' | 'city' | 'budget';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface ShortTermMemory {
  messages: Message[];
  /** Last time the window changed, epoch ms */
  timestamp: number;
}

export interface LongTermMemory {
  facts: string[];
  preferences: Partial<Record<PreferenceKey, string>>;
  recentQueries: string[];
  insights: Record<string, JsonValue>;
}

export interface MemoryRecord {
  shortTerm: ShortTermMemory;
  longTerm: LongTermMemory;
  session: Record<string, JsonValue>;
  lastActivity: number;
}

/**
 * Read-only copy handed out by the memory service
 */
export type MemoryRecordView = Readonly<{
  shortTerm: Readonly<{ messages: readonly Message[]; timestamp: number }>;
  longTerm: Readonly<{
    facts: readonly string[];
    preferences: Readonly<Partial<Record<PreferenceKey, string>>>;
    recentQueries: readonly string[];
    insights: Readonly<Record<string, JsonValue>>;
  }>;
  session: Readonly<Record<string, JsonValue>>;
  lastActivity: number;
}>;

/**
 * Memories matched against a query
 */
export interface RelevantMemories {
  facts: string[];
  preferences: Partial<Record<PreferenceKey, string>>;
  insights: Record<string, JsonValue>;
}

/**
 * Compact summary used by handlers and the API
 */
export interface UserContextSummary {
  userId: string;
  preferences: Partial<Record<PreferenceKey, string>>;
  facts: string[];
  recentQueries: string[];
  lastActivity: string;
  messageCount: number;
}

export interface MemoryConfig {
  shortTermCapacity: number;
  recentQueryCapacity: number;
  sessionTimeoutMs: number;
}

export const DEFAULT_MEMORY_CONFIG: MemoryConfig = {
  shortTermCapacity: 10,
  recentQueryCapacity: 20,
  sessionTimeoutMs: 3600 * 1000,
};

// ─────────────────────────────────────────────────────────────
// SNAPSHOT
// ─────────────────────────────────────────────────────────────

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

const messageSchema = z.object({
  role: z.enum(['user', 'assistant', 'system']),
  content: z.string(),
});

const recordSnapshotSchema = z.object({
  shortTerm: z.object({
    messages: z.array(messageSchema),
    timestamp: z.number(),
  }),
  longTerm: z.object({
    facts: z.array(z.string()),
    preferences: z.object({
      cuisine: z.string().optional(),
      city: z.string().optional(),
      budget: z.string().optional(),
    }),
    recentQueries: z.array(z.string()),
    insights: z.record(jsonValueSchema),
  }),
  session: z.record(jsonValueSchema),
  lastActivity: z.number(),
});

export const memorySnapshotSchema = z.object({
  version: z.literal(1),
  savedAt: z.string(),
  users: z.record(recordSnapshotSchema),
});

export type MemorySnapshot = z.infer<typeof memorySnapshotSchema>;
