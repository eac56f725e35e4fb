/**
 * Memory snapshot store tests
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import {
  createFileSnapshotStore,
  createRedisSnapshotStore,
} from '@/services/memory.storage.js';

describe('File snapshot store', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'advisor-memory-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should return null when nothing was saved', async () => {
    const store = createFileSnapshotStore(join(dir, 'memory.json'));
    expect(await store.load()).toBeNull();
  });

  it('should create missing directories and write JSON', async () => {
    const path = join(dir, 'nested', 'memory.json');
    const store = createFileSnapshotStore(path);

    await store.save({ version: 1, savedAt: '2024-01-01T00:00:00.000Z', users: {} });

    const raw = await readFile(path, 'utf8');
    expect(JSON.parse(raw)).toEqual({
      version: 1,
      savedAt: '2024-01-01T00:00:00.000Z',
      users: {},
    });
    expect(await store.load()).toEqual(JSON.parse(raw));
  });

  it('should surface unreadable JSON as an error', async () => {
    const path = join(dir, 'memory.json');
    await writeFile(path, '{not json', 'utf8');

    await expect(createFileSnapshotStore(path).load()).rejects.toThrow(SyntaxError);
  });
});

describe('Redis snapshot store', () => {
  it('should read and write a single key', async () => {
    const redis = {
      get: vi.fn().mockResolvedValue({ version: 1, savedAt: 'x', users: {} }),
      set: vi.fn().mockResolvedValue('OK'),
    };
    const store = createRedisSnapshotStore(redis, 'advisor:memory');

    expect(store.kind).toBe('redis');
    expect(await store.load()).toEqual({ version: 1, savedAt: 'x', users: {} });

    const snapshot = { version: 1 as const, savedAt: '2024-01-01T00:00:00.000Z', users: {} };
    await store.save(snapshot);
    expect(redis.get).toHaveBeenCalledWith('advisor:memory');
    expect(redis.set).toHaveBeenCalledWith('advisor:memory', snapshot);
  });
});
