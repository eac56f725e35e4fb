/**
 * MemoryService Unit Tests
 *
 * GUARDRAILS:
 * - The short-term window never exceeds capacity
 * - A preference key holds one value; later matches overwrite
 * - Eviction is exact at the timeout boundary and re-checks under the lock
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { PREFERENCE_TABLES } from '@/config/vocabulary.js';
import { createMemoryService } from '@/services/memory.service.js';
import type { MemoryService } from '@/services/memory.service.js';

// ─────────────────────────────────────────────────────────────
// TEST FIXTURES
// ─────────────────────────────────────────────────────────────

const USER_A = 'user-a';
const USER_B = 'user-b';
const TIMEOUT_MS = 1000;

describe('MemoryService', () => {
  let clock: number;
  let memoryService: MemoryService;

  beforeEach(() => {
    clock = 0;
    memoryService = createMemoryService({
      preferenceTables: PREFERENCE_TABLES,
      config: { shortTermCapacity: 3, recentQueryCapacity: 2, sessionTimeoutMs: TIMEOUT_MS },
      now: () => clock,
    });
  });

  describe('touch', () => {
    it('should create the record lazily and bump activity', async () => {
      expect(memoryService.get(USER_A)).toBeNull();

      clock = 50;
      const view = await memoryService.touch(USER_A);

      expect(view.lastActivity).toBe(50);
      expect(view.shortTerm.messages).toEqual([]);
      expect(memoryService.userIds()).toEqual([USER_A]);
    });
  });

  describe('append', () => {
    it('should keep only the most recent messages up to capacity', async () => {
      for (let i = 1; i <= 5; i++) {
        await memoryService.append(USER_A, { role: 'user', content: `q${i}` });
      }

      expect(memoryService.getConversation(USER_A)).toEqual([
        { role: 'user', content: 'q3' },
        { role: 'user', content: 'q4' },
        { role: 'user', content: 'q5' },
      ]);
      expect(memoryService.get(USER_A)?.longTerm.recentQueries).toEqual(['q4', 'q5']);
    });

    it('should not record assistant messages as queries', async () => {
      await memoryService.append(USER_A, { role: 'user', content: 'hello' });
      await memoryService.append(USER_A, { role: 'assistant', content: 'hi' });

      expect(memoryService.get(USER_A)?.longTerm.recentQueries).toEqual(['hello']);
      expect(memoryService.getConversation(USER_A, 1)).toEqual([
        { role: 'assistant', content: 'hi' },
      ]);
      expect(memoryService.getConversation(USER_A, 0)).toEqual([]);
    });

    it('should hand out copies', async () => {
      await memoryService.append(USER_A, { role: 'user', content: 'hello' });

      const conversation = memoryService.getConversation(USER_A);
      conversation.push({ role: 'user', content: 'injected' });

      expect(memoryService.getConversation(USER_A)).toHaveLength(1);
    });
  });

  describe('extractAndMergePreferences', () => {
    it('should let the last matching table entry win', async () => {
      const detected = await memoryService.extractAndMergePreferences(
        USER_A,
        'I want South Indian food in Chennai on a luxury budget'
      );

      expect(detected).toEqual({ cuisine: 'South Indian', city: 'Chennai', budget: 'High' });
    });

    it('should overwrite earlier values and keep the rest', async () => {
      await memoryService.extractAndMergePreferences(USER_A, 'mexican place in pune');
      await memoryService.extractAndMergePreferences(USER_A, 'actually italian');

      expect(memoryService.getPreferences(USER_A)).toEqual({ cuisine: 'Italian', city: 'Pune' });
    });

    it('should leave memory untouched when nothing matches', async () => {
      const detected = await memoryService.extractAndMergePreferences(USER_A, 'good morning');

      expect(detected).toEqual({});
      expect(memoryService.get(USER_A)).toBeNull();
    });
  });

  describe('concurrent updates', () => {
    it('should apply a same-user burst in call order and stay bounded', async () => {
      await Promise.all([
        memoryService.append(USER_A, { role: 'user', content: 'q1' }),
        memoryService.extractAndMergePreferences(USER_A, 'mexican place in pune'),
        memoryService.append(USER_A, { role: 'user', content: 'q2' }),
        memoryService.append(USER_B, { role: 'user', content: 'b1' }),
        memoryService.extractAndMergePreferences(USER_A, 'actually italian'),
        memoryService.append(USER_A, { role: 'user', content: 'q3' }),
        memoryService.append(USER_A, { role: 'assistant', content: 'a3' }),
        memoryService.append(USER_A, { role: 'user', content: 'q4' }),
        memoryService.append(USER_B, { role: 'user', content: 'b2' }),
      ]);

      expect(memoryService.getConversation(USER_A)).toEqual([
        { role: 'user', content: 'q3' },
        { role: 'assistant', content: 'a3' },
        { role: 'user', content: 'q4' },
      ]);
      expect(memoryService.get(USER_A)?.longTerm.recentQueries).toEqual(['q3', 'q4']);
      expect(memoryService.getPreferences(USER_A)).toEqual({ cuisine: 'Italian', city: 'Pune' });
      expect(memoryService.getConversation(USER_B)).toEqual([
        { role: 'user', content: 'b1' },
        { role: 'user', content: 'b2' },
      ]);
    });
  });

  describe('facts, insights and session', () => {
    it('should not store a fact twice', async () => {
      await memoryService.addFact(USER_A, 'Owns a cafe in Adyar');
      await memoryService.addFact(USER_A, ' Owns a cafe in Adyar ');

      expect(memoryService.get(USER_A)?.longTerm.facts).toEqual(['Owns a cafe in Adyar']);
    });

    it('should clear only the session scratch on logout', async () => {
      await memoryService.setSessionValue(USER_A, 'lastRoute', 'market_analysis');
      await memoryService.append(USER_A, { role: 'user', content: 'hello' });

      expect(memoryService.getSessionValue(USER_A, 'lastRoute')).toBe('market_analysis');
      expect(await memoryService.clearSession(USER_A)).toBe(true);
      expect(memoryService.getSessionValue(USER_A, 'lastRoute')).toBeUndefined();
      expect(memoryService.getConversation(USER_A)).toHaveLength(1);
      expect(await memoryService.clearSession(USER_B)).toBe(false);
    });
  });

  describe('getRelevantMemories', () => {
    it('should match facts by shared words and preferences and insights by key', async () => {
      await memoryService.addFact(USER_A, 'Owns a cafe in Adyar');
      await memoryService.addFact(USER_A, 'Prefers vegetarian menus');
      await memoryService.extractAndMergePreferences(USER_A, 'thai food in delhi');
      await memoryService.setInsight(USER_A, 'route:market_analysis', { documents: [] });
      await memoryService.setInsight(USER_A, 'route:real_estate', { documents: [] });

      const relevant = memoryService.getRelevantMemories(
        USER_A,
        'Another cafe? Redo the market analysis for my city'
      );

      expect(relevant).toEqual({
        facts: ['Owns a cafe in Adyar'],
        preferences: { city: 'Delhi' },
        insights: { 'route:market_analysis': { documents: [] } },
      });
    });

    it('should return empty results for an unknown user', () => {
      expect(memoryService.getRelevantMemories(USER_B, 'anything')).toEqual({
        facts: [],
        preferences: {},
        insights: {},
      });
    });
  });

  describe('getUserContext', () => {
    it('should summarise the record', async () => {
      clock = 1_700_000_000_000;
      await memoryService.append(USER_A, { role: 'user', content: 'thai food' });
      await memoryService.extractAndMergePreferences(USER_A, 'thai food');

      expect(memoryService.getUserContext(USER_A)).toEqual({
        userId: USER_A,
        preferences: { cuisine: 'Thai' },
        facts: [],
        recentQueries: ['thai food'],
        lastActivity: new Date(1_700_000_000_000).toISOString(),
        messageCount: 1,
      });
      expect(memoryService.getUserContext(USER_B)).toBeNull();
    });
  });

  describe('evict', () => {
    it('should keep a record exactly at the timeout and evict one past it', async () => {
      await memoryService.touch(USER_A);

      expect(await memoryService.evict(TIMEOUT_MS)).toEqual([]);
      expect(await memoryService.evict(TIMEOUT_MS + 1)).toEqual([USER_A]);
      expect(memoryService.get(USER_A)).toBeNull();
    });

    it('should only evict inactive users', async () => {
      await memoryService.touch(USER_A);
      clock = 800;
      await memoryService.touch(USER_B);
      clock = 1500;

      expect(await memoryService.evict()).toEqual([USER_A]);
      expect(memoryService.userIds()).toEqual([USER_B]);
    });

    it('should re-check activity after acquiring the lock', async () => {
      await memoryService.touch(USER_A);
      clock = 5000;

      const touching = memoryService.touch(USER_A);
      const evicting = memoryService.evict();

      await touching;
      expect(await evicting).toEqual([]);
      expect(memoryService.get(USER_A)?.lastActivity).toBe(5000);
    });
  });

  describe('serialize / deserialize', () => {
    it('should round-trip every record', async () => {
      clock = 1_700_000_000_000;
      await memoryService.append(USER_A, { role: 'user', content: 'rent in pune' });
      await memoryService.extractAndMergePreferences(USER_A, 'rent in pune');
      await memoryService.setInsight(USER_A, 'route:real_estate', { parameters: { city: 'Pune' } });
      await memoryService.setSessionValue(USER_B, 'lastRoute', 'basic_query');

      const snapshot = memoryService.serialize();
      expect(snapshot.version).toBe(1);
      expect(snapshot.savedAt).toBe('2023-11-14T22:13:20.000Z');

      const restored = createMemoryService({ preferenceTables: PREFERENCE_TABLES });
      const result = restored.deserialize(JSON.parse(JSON.stringify(snapshot)));

      expect(result).toEqual({ success: true, data: 2 });
      expect(restored.get(USER_A)).toEqual(memoryService.get(USER_A));
      expect(restored.get(USER_B)).toEqual(memoryService.get(USER_B));
    });

    it('should reject a malformed snapshot and keep existing records', async () => {
      await memoryService.touch(USER_A);

      const result = memoryService.deserialize({ version: 2, users: {} });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('VALIDATION_ERROR');
      }
      expect(memoryService.userIds()).toEqual([USER_A]);
    });

    it('should trim restored windows to capacity', () => {
      const result = memoryService.deserialize({
        version: 1,
        savedAt: '2024-01-01T00:00:00.000Z',
        users: {
          [USER_A]: {
            shortTerm: {
              messages: ['m1', 'm2', 'm3', 'm4'].map((content) => ({ role: 'user', content })),
              timestamp: 10,
            },
            longTerm: { facts: [], preferences: {}, recentQueries: ['a', 'b', 'c'], insights: {} },
            session: {},
            lastActivity: 10,
          },
        },
      });

      expect(result).toEqual({ success: true, data: 1 });
      expect(memoryService.getConversation(USER_A).map((m) => m.content)).toEqual([
        'm2',
        'm3',
        'm4',
      ]);
      expect(memoryService.get(USER_A)?.longTerm.recentQueries).toEqual(['b', 'c']);
    });
  });
});
