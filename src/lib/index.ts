/**
 * Shared Library Exports
 */

export { createLogger, logger, setLogLevel } from './logger.js';
export type { Logger } from './logger.js';
export { withTimeout, TimeoutError } from './timeout.js';
export { KeyedMutex } from './keyed-mutex.js';
export { createSupabaseAdmin } from './supabase.js';
export type { SupabaseConnection } from './supabase.js';
export { getRedis } from './redis.js';
export type { RedisConnection } from './redis.js';
export { createNeo4jDriver } from './neo4j.js';
export type { Neo4jConnection } from './neo4j.js';
