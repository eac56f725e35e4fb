/**
 * MemoryService
 * Per-user conversational state held in process
 *
 * SCOPE: Short-term window, long-term facts/preferences/insights,
 *        session scratch, inactivity eviction, snapshots
 *
 * Owns: The in-memory user record map (never exposed directly)
 *
 * Dependencies:
 * - Preference keyword tables (vocabulary.json)
 * - KeyedMutex (one writer per user)
 *
 * GUARDRAILS:
 * - Every mutation of a record runs under that user's lock
 * - Eviction takes the same lock and re-checks the timestamp
 * - Callers only ever receive copies
 */

import { containsTerm } from '../config/vocabulary.js';
import { KeyedMutex } from '../lib/index.js';
import {
  DEFAULT_MEMORY_CONFIG,
  failure,
  memorySnapshotSchema,
  success,
  type JsonValue,
  type MemoryConfig,
  type MemoryRecord,
  type MemoryRecordView,
  type MemorySnapshot,
  type Message,
  type PreferenceKey,
  type RelevantMemories,
  type Result,
  type UserContextSummary,
} from '../types/index.js';

/**
 * MemoryService interface
 */
export interface MemoryService {
  touch(userId: string): Promise<MemoryRecordView>;
  append(userId: string, message: Message): Promise<void>;
  extractAndMergePreferences(
    userId: string,
    text: string
  ): Promise<Partial<Record<PreferenceKey, string>>>;
  addFact(userId: string, fact: string): Promise<void>;
  setInsight(userId: string, key: string, value: JsonValue): Promise<void>;
  setSessionValue(userId: string, key: string, value: JsonValue): Promise<void>;
  getSessionValue(userId: string, key: string): JsonValue | undefined;
  clearSession(userId: string): Promise<boolean>;

  get(userId: string): MemoryRecordView | null;
  getPreferences(userId: string): Partial<Record<PreferenceKey, string>>;
  getConversation(userId: string, max?: number): Message[];
  getRelevantMemories(userId: string, query: string): RelevantMemories;
  getUserContext(userId: string): UserContextSummary | null;
  userIds(): string[];

  evict(now?: number): Promise<string[]>;
  serialize(): MemorySnapshot;
  deserialize(snapshot: unknown): Result<number>;
}

export interface MemoryServiceDeps {
  preferenceTables: Readonly<
    Record<PreferenceKey, ReadonlyArray<readonly [string, string]>>
  >;
  config?: Partial<MemoryConfig>;
  now?: () => number;
}

const PREFERENCE_KEYS: readonly PreferenceKey[] = ['cuisine', 'city', 'budget'];

const RELEVANT_LIMIT = 5;

// ─────────────────────────────────────────────────────────────
// HELPERS
// ─────────────────────────────────────────────────────────────

function emptyRecord(now: number): MemoryRecord {
  return {
    shortTerm: { messages: [], timestamp: now },
    longTerm: { facts: [], preferences: {}, recentQueries: [], insights: {} },
    session: {},
    lastActivity: now,
  };
}

function copyRecord(record: MemoryRecord): MemoryRecord {
  return structuredClone(record);
}

function pushBounded<T>(list: T[], item: T, capacity: number): void {
  list.push(item);
  if (list.length > capacity) {
    list.splice(0, list.length - capacity);
  }
}

function queryWords(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/[^a-z0-9]+/)
      .filter((word) => word.length > 2)
  );
}

/**
 * "route:market_analysis" -> "market analysis"
 */
function insightPhrase(key: string): string {
  const tail = key.slice(key.lastIndexOf(':') + 1);
  return tail.replace(/_/g, ' ').toLowerCase();
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

export function createMemoryService(deps: MemoryServiceDeps): MemoryService {
  const config: MemoryConfig = { ...DEFAULT_MEMORY_CONFIG, ...deps.config };
  const now = deps.now ?? Date.now;
  const records = new Map<string, MemoryRecord>();
  const locks = new KeyedMutex();

  function ensure(userId: string): MemoryRecord {
    let record = records.get(userId);
    if (record === undefined) {
      record = emptyRecord(now());
      records.set(userId, record);
    }
    return record;
  }

  /**
   * Run a mutation under the user's lock; creates the record lazily
   */
  function mutate<T>(userId: string, change: (record: MemoryRecord) => T): Promise<T> {
    return locks.runExclusive(userId, () => change(ensure(userId)));
  }

  function detectPreferences(text: string): Partial<Record<PreferenceKey, string>> {
    const lowercased = text.toLowerCase();
    const detected: Partial<Record<PreferenceKey, string>> = {};

    for (const key of PREFERENCE_KEYS) {
      for (const [term, value] of deps.preferenceTables[key]) {
        if (containsTerm(lowercased, term)) {
          detected[key] = value;
        }
      }
    }
    return detected;
  }

  return {
    touch(userId: string): Promise<MemoryRecordView> {
      return mutate(userId, (record) => {
        record.lastActivity = now();
        return copyRecord(record);
      });
    },

    append(userId: string, message: Message): Promise<void> {
      return mutate(userId, (record) => {
        const timestamp = now();
        pushBounded(
          record.shortTerm.messages,
          { role: message.role, content: message.content },
          config.shortTermCapacity
        );
        record.shortTerm.timestamp = timestamp;
        record.lastActivity = timestamp;

        if (message.role === 'user') {
          pushBounded(
            record.longTerm.recentQueries,
            message.content,
            config.recentQueryCapacity
          );
        }
      });
    },

    async extractAndMergePreferences(userId: string, text: string) {
      const detected = detectPreferences(text);
      if (Object.keys(detected).length === 0) {
        return detected;
      }

      await mutate(userId, (record) => {
        record.longTerm.preferences = { ...record.longTerm.preferences, ...detected };
        record.lastActivity = now();
      });
      return detected;
    },

    addFact(userId: string, fact: string): Promise<void> {
      return mutate(userId, (record) => {
        const trimmed = fact.trim();
        if (trimmed !== '' && !record.longTerm.facts.includes(trimmed)) {
          record.longTerm.facts.push(trimmed);
        }
        record.lastActivity = now();
      });
    },

    setInsight(userId: string, key: string, value: JsonValue): Promise<void> {
      return mutate(userId, (record) => {
        record.longTerm.insights[key] = structuredClone(value);
        record.lastActivity = now();
      });
    },

    setSessionValue(userId: string, key: string, value: JsonValue): Promise<void> {
      return mutate(userId, (record) => {
        record.session[key] = structuredClone(value);
        record.lastActivity = now();
      });
    },

    getSessionValue(userId: string, key: string): JsonValue | undefined {
      const value = records.get(userId)?.session[key];
      return value === undefined ? undefined : structuredClone(value);
    },

    clearSession(userId: string): Promise<boolean> {
      return locks.runExclusive(userId, () => {
        const record = records.get(userId);
        if (record === undefined) {
          return false;
        }
        record.session = {};
        return true;
      });
    },

    get(userId: string): MemoryRecordView | null {
      const record = records.get(userId);
      return record === undefined ? null : copyRecord(record);
    },

    getPreferences(userId: string): Partial<Record<PreferenceKey, string>> {
      return { ...records.get(userId)?.longTerm.preferences };
    },

    getConversation(userId: string, max = config.shortTermCapacity): Message[] {
      const messages = records.get(userId)?.shortTerm.messages ?? [];
      if (max <= 0) {
        return [];
      }
      return messages.slice(-max).map((m) => ({ ...m }));
    },

    getRelevantMemories(userId: string, query: string): RelevantMemories {
      const relevant: RelevantMemories = { facts: [], preferences: {}, insights: {} };
      const record = records.get(userId);
      if (record === undefined) {
        return relevant;
      }

      const lowercased = query.toLowerCase();
      const words = queryWords(query);

      relevant.facts = record.longTerm.facts
        .filter((fact) => [...queryWords(fact)].some((word) => words.has(word)))
        .slice(0, RELEVANT_LIMIT);

      let preferenceCount = 0;
      for (const key of PREFERENCE_KEYS) {
        const value = record.longTerm.preferences[key];
        if (value !== undefined && lowercased.includes(key) && preferenceCount < RELEVANT_LIMIT) {
          relevant.preferences[key] = value;
          preferenceCount++;
        }
      }

      const insightKeys = Object.keys(record.longTerm.insights)
        .filter(
          (key) =>
            lowercased.includes(key.toLowerCase()) ||
            lowercased.includes(insightPhrase(key))
        )
        .slice(0, RELEVANT_LIMIT);
      for (const key of insightKeys) {
        const value = record.longTerm.insights[key];
        if (value !== undefined) {
          relevant.insights[key] = structuredClone(value);
        }
      }

      return relevant;
    },

    getUserContext(userId: string): UserContextSummary | null {
      const record = records.get(userId);
      if (record === undefined) {
        return null;
      }
      return {
        userId,
        preferences: { ...record.longTerm.preferences },
        facts: record.longTerm.facts.slice(-RELEVANT_LIMIT),
        recentQueries: record.longTerm.recentQueries.slice(-RELEVANT_LIMIT),
        lastActivity: new Date(record.lastActivity).toISOString(),
        messageCount: record.shortTerm.messages.length,
      };
    },

    userIds(): string[] {
      return [...records.keys()];
    },

    async evict(at?: number): Promise<string[]> {
      const cutoff = (at ?? now()) - config.sessionTimeoutMs;
      const candidates = [...records.entries()]
        .filter(([, record]) => record.lastActivity < cutoff)
        .map(([userId]) => userId);

      const evicted: string[] = [];
      for (const userId of candidates) {
        const removed = await locks.runExclusive(userId, () => {
          const record = records.get(userId);
          if (record === undefined || record.lastActivity >= cutoff) {
            return false;
          }
          return records.delete(userId);
        });
        if (removed) {
          evicted.push(userId);
        }
      }
      return evicted;
    },

    serialize(): MemorySnapshot {
      const users: MemorySnapshot['users'] = {};
      for (const [userId, record] of records) {
        users[userId] = copyRecord(record);
      }
      return {
        version: 1,
        savedAt: new Date(now()).toISOString(),
        users,
      };
    },

    deserialize(snapshot: unknown): Result<number> {
      const parsed = memorySnapshotSchema.safeParse(snapshot);
      if (!parsed.success) {
        return failure('VALIDATION_ERROR', 'Invalid memory snapshot', {
          issues: parsed.error.issues.map((issue) => issue.path.join('.')),
        });
      }

      records.clear();
      for (const [userId, record] of Object.entries(parsed.data.users)) {
        records.set(userId, {
          shortTerm: {
            messages: record.shortTerm.messages.slice(-config.shortTermCapacity),
            timestamp: record.shortTerm.timestamp,
          },
          longTerm: {
            facts: [...record.longTerm.facts],
            preferences: { ...record.longTerm.preferences },
            recentQueries: record.longTerm.recentQueries.slice(
              -config.recentQueryCapacity
            ),
            insights: { ...record.longTerm.insights },
          },
          session: { ...record.session },
          lastActivity: record.lastActivity,
        });
      }
      return success(records.size);
    },
  };
}
