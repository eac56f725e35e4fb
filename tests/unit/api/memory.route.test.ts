/**
 * Memory Route Unit Tests
 */

import { Hono } from 'hono';
import { describe, it, expect, vi, beforeEach } from 'vitest';

import { createMemoryRoutes } from '@/api/routes/memory.js';
import { ACCESS_POLICY } from '@/config/access-policy.js';
import { PREFERENCE_TABLES } from '@/config/vocabulary.js';
import { createMemoryService } from '@/services/memory.service.js';
import type { MemoryService } from '@/services/memory.service.js';
import { createPermissionService } from '@/services/permission.service.js';
import type { User } from '@/types/index.js';

import { adminUser, analystUser, guestUser } from '../../fixtures/index.js';
import { withActor } from '../../mocks/index.js';

describe('Memory Routes', () => {
  let memoryService: MemoryService;
  const logout = vi.fn<(userId: string) => Promise<boolean>>();

  function createTestApp(user: User | null): Hono {
    const app = new Hono();
    app.use('*', withActor(user));
    app.route(
      '/api/v1',
      createMemoryRoutes({
        memoryService,
        permissionService: createPermissionService({ policy: ACCESS_POLICY }),
        sessionService: { logout },
      })
    );
    return app;
  }

  beforeEach(() => {
    vi.clearAllMocks();
    memoryService = createMemoryService({
      preferenceTables: PREFERENCE_TABLES,
      now: () => Date.UTC(2024, 0, 15, 10),
    });
  });

  describe('GET /memory', () => {
    it('should return the summary and conversation', async () => {
      await memoryService.append(analystUser.id, { role: 'user', content: 'Cafes in Pune' });
      await memoryService.extractAndMergePreferences(analystUser.id, 'Cafes in Pune');

      const res = await createTestApp(analystUser).request('/api/v1/memory');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        data: {
          summary: {
            userId: analystUser.id,
            preferences: { city: 'Pune' },
            facts: [],
            recentQueries: ['Cafes in Pune'],
            lastActivity: '2024-01-15T10:00:00.000Z',
            messageCount: 1,
          },
          conversation: [{ role: 'user', content: 'Cafes in Pune' }],
        },
        meta: { requestId: 'req-test' },
      });
    });

    it('should return an empty view for a new user', async () => {
      const res = await createTestApp(analystUser).request('/api/v1/memory');

      expect(await res.json()).toMatchObject({ data: { summary: null, conversation: [] } });
    });

    it('should deny roles without memory read', async () => {
      const res = await createTestApp(guestUser).request('/api/v1/memory');

      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({
        error: {
          code: 'PERMISSION_DENIED',
          message: 'Memory access is not available for your role',
          requestId: 'req-test',
        },
      });
    });

    it('should require an authenticated user', async () => {
      const res = await createTestApp(null).request('/api/v1/memory');

      expect(res.status).toBe(401);
    });
  });

  describe('POST /memory/facts', () => {
    function postFact(user: User | null, body: string): Promise<Response> {
      return Promise.resolve(
        createTestApp(user).request('/api/v1/memory/facts', {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body,
        })
      );
    }

    it('should store a fact once and return the fact list', async () => {
      await postFact(adminUser, JSON.stringify({ fact: 'Budget is 40 lakh' }));
      const res = await postFact(adminUser, JSON.stringify({ fact: '  Budget is 40 lakh ' }));

      expect(res.status).toBe(201);
      expect(await res.json()).toEqual({
        data: { facts: ['Budget is 40 lakh'] },
        meta: { requestId: 'req-test' },
      });
      expect(memoryService.getRelevantMemories(adminUser.id, 'What budget do I need?').facts).toEqual([
        'Budget is 40 lakh',
      ]);
    });

    it('should deny roles without memory write', async () => {
      const res = await postFact(analystUser, JSON.stringify({ fact: 'Opening in May' }));

      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({
        error: {
          code: 'PERMISSION_DENIED',
          message: 'Saving memories is not available for your role',
          requestId: 'req-test',
        },
      });
      expect(memoryService.get(analystUser.id)).toBeNull();
    });

    it('should reject a blank fact', async () => {
      const res = await postFact(adminUser, JSON.stringify({ fact: '   ' }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: { code: 'VALIDATION_ERROR', message: 'Fact is required', requestId: 'req-test' },
      });
    });

    it('should reject a body that is not JSON', async () => {
      const res = await postFact(adminUser, 'not json');

      expect(res.status).toBe(400);
    });
  });

  describe('DELETE /memory/session', () => {
    it('should clear the session', async () => {
      logout.mockResolvedValue(true);

      const res = await createTestApp(guestUser).request('/api/v1/memory/session', {
        method: 'DELETE',
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        data: { cleared: true },
        meta: { requestId: 'req-test' },
      });
      expect(logout).toHaveBeenCalledWith(guestUser.id);
    });
  });
});
