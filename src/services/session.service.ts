/**
 * SessionService
 * Lifecycle around the in-process memory store
 *
 * SCOPE: Persist/restore snapshots, periodic eviction, logout
 *
 * Dependencies:
 * - MemoryService (serialize, deserialize, evict, clearSession)
 * - MemorySnapshotStore (file or Redis)
 *
 * GUARDRAILS:
 * - Only one sweep runs at a time
 * - The sweep timer is unref'd and never keeps the process alive
 */

import { createLogger, type Logger } from '../lib/index.js';
import {
  errorMessage,
  failure,
  success,
  type MemorySnapshot,
  type Result,
} from '../types/index.js';

import type { MemorySnapshotStore } from './memory.storage.js';

/**
 * MemoryService dependency interface
 */
export interface SessionServiceMemoryDep {
  serialize(): MemorySnapshot;
  deserialize(snapshot: unknown): Result<number>;
  evict(now?: number): Promise<string[]>;
  clearSession(userId: string): Promise<boolean>;
}

/**
 * SessionService interface
 */
export interface SessionService {
  save(): Promise<Result<{ users: number }>>;
  restore(): Promise<Result<{ users: number }>>;
  sweep(): Promise<string[]>;
  logout(userId: string): Promise<boolean>;
  start(): void;
  stop(): void;
  readonly running: boolean;
}

export interface SessionServiceDeps {
  memoryService: SessionServiceMemoryDep;
  store: MemorySnapshotStore;
  sweepIntervalMs: number;
  logger?: Logger;
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

export function createSessionService(deps: SessionServiceDeps): SessionService {
  const { memoryService, store, sweepIntervalMs } = deps;
  const log = deps.logger ?? createLogger('session');

  let timer: NodeJS.Timeout | null = null;
  let sweeping: Promise<string[]> | null = null;

  async function runSweep(): Promise<string[]> {
    try {
      const evicted = await memoryService.evict();
      if (evicted.length > 0) {
        log.info({ evicted: evicted.length }, 'Evicted inactive sessions');
      }
      return evicted;
    } catch (err) {
      log.error({ err }, 'Session sweep failed');
      return [];
    }
  }

  const service: SessionService = {
    async save(): Promise<Result<{ users: number }>> {
      const snapshot = memoryService.serialize();
      const users = Object.keys(snapshot.users).length;
      try {
        await store.save(snapshot);
      } catch (err) {
        log.error({ err, store: store.kind }, 'Failed to save memory snapshot');
        return failure('INTERNAL_ERROR', 'Failed to save memory snapshot', {
          reason: errorMessage(err),
        });
      }
      log.info({ users, store: store.kind }, 'Memory snapshot saved');
      return success({ users });
    },

    async restore(): Promise<Result<{ users: number }>> {
      let raw: unknown;
      try {
        raw = await store.load();
      } catch (err) {
        log.error({ err, store: store.kind }, 'Failed to load memory snapshot');
        return failure('INTERNAL_ERROR', 'Failed to load memory snapshot', {
          reason: errorMessage(err),
        });
      }

      if (raw === null || raw === undefined) {
        return success({ users: 0 });
      }

      const result = memoryService.deserialize(raw);
      if (!result.success) {
        log.warn({ details: result.error.details }, 'Discarding invalid memory snapshot');
        return result;
      }
      log.info({ users: result.data, store: store.kind }, 'Memory snapshot restored');
      return success({ users: result.data });
    },

    sweep(): Promise<string[]> {
      if (sweeping === null) {
        sweeping = runSweep().finally(() => {
          sweeping = null;
        });
      }
      return sweeping;
    },

    logout(userId: string): Promise<boolean> {
      return memoryService.clearSession(userId);
    },

    start(): void {
      if (timer !== null) {
        return;
      }
      timer = setInterval(() => {
        service.sweep().catch((err: unknown) => {
          log.error({ err }, 'Session sweep rejected');
        });
      }, sweepIntervalMs);
      timer.unref();
    },

    stop(): void {
      if (timer !== null) {
        clearInterval(timer);
        timer = null;
      }
    },

    get running(): boolean {
      return timer !== null;
    },
  };

  return service;
}
