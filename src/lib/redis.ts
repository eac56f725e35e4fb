/**
 * Upstash Redis Client Configuration
 * Backs the memory snapshot store when MEMORY_STORE=redis
 */

import { Redis } from '@upstash/redis';

export interface RedisConnection {
  url: string | undefined;
  token: string | undefined;
}

let redisInstance: Redis | null = null;

/**
 * Get the Redis client instance (lazy initialization)
 */
export function getRedis(connection: RedisConnection): Redis {
  if (redisInstance === null) {
    if (connection.url === undefined || connection.url === '') {
      throw new Error('UPSTASH_REDIS_URL is required');
    }
    if (connection.token === undefined || connection.token === '') {
      throw new Error('UPSTASH_REDIS_TOKEN is required');
    }
    redisInstance = new Redis({
      url: connection.url,
      token: connection.token,
    });
  }
  return redisInstance;
}
