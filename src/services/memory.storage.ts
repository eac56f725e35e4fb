/**
 * Memory Snapshot Storage
 * Durable homes for MemoryService snapshots
 *
 * SCOPE: Load/save a whole snapshot; no partial updates
 *
 * Implementations:
 * - File (JSON on local disk, written atomically via rename)
 * - Upstash Redis (single key, JSON-serialized by the client)
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import type { MemorySnapshot } from '../types/index.js';

/**
 * Snapshot store interface; load() returns null when nothing was saved
 */
export interface MemorySnapshotStore {
  readonly kind: 'file' | 'redis';
  load(): Promise<unknown>;
  save(snapshot: MemorySnapshot): Promise<void>;
}

/**
 * Subset of the Upstash client used here
 */
export interface SnapshotRedisClient {
  get<T>(key: string): Promise<T | null>;
  set(key: string, value: unknown): Promise<unknown>;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export function createFileSnapshotStore(filePath: string): MemorySnapshotStore {
  return {
    kind: 'file',

    async load(): Promise<unknown> {
      let raw: string;
      try {
        raw = await readFile(filePath, 'utf8');
      } catch (err) {
        if (isMissingFile(err)) {
          return null;
        }
        throw err;
      }
      return JSON.parse(raw);
    },

    async save(snapshot: MemorySnapshot): Promise<void> {
      await mkdir(dirname(filePath), { recursive: true });
      const tmpPath = `${filePath}.tmp`;
      await writeFile(tmpPath, JSON.stringify(snapshot, null, 2), 'utf8');
      await rename(tmpPath, filePath);
    },
  };
}

export function createRedisSnapshotStore(
  redis: SnapshotRedisClient,
  key: string
): MemorySnapshotStore {
  return {
    kind: 'redis',

    async load(): Promise<unknown> {
      return redis.get<unknown>(key);
    },

    async save(snapshot: MemorySnapshot): Promise<void> {
      await redis.set(key, snapshot);
    },
  };
}
