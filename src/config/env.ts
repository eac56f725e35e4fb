/**
 * Environment configuration
 *
 * Parsed once at startup; everything downstream receives typed values.
 */

import { z } from 'zod';

import { failure, success, type Result } from '../types/index.js';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  ALLOWED_ORIGINS: z.string().default('http://localhost:3000'),

  OPENROUTER_API_KEY: z.string().min(1, 'OPENROUTER_API_KEY is required'),
  OPENROUTER_BASE_URL: optionalString,
  LLM_MODEL: z.string().default('openai/gpt-4o-mini'),
  CLASSIFIER_MODEL: z.string().default('openai/gpt-4o-mini'),
  EMBEDDING_MODEL: z.string().default('openai/text-embedding-3-small'),

  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_KEY: z.string().min(1, 'SUPABASE_SERVICE_KEY is required'),

  NEO4J_URI: z.string().default('bolt://localhost:7687'),
  NEO4J_USERNAME: z.string().default('neo4j'),
  NEO4J_PASSWORD: z.string().default(''),

  MEMORY_STORE: z.enum(['file', 'redis']).default('file'),
  MEMORY_FILE_PATH: z.string().default('memory_data.json'),
  MEMORY_REDIS_KEY: z.string().default('advisor:memory:snapshot'),
  UPSTASH_REDIS_URL: optionalString,
  UPSTASH_REDIS_TOKEN: optionalString,

  SESSION_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(3600),
  SWEEP_INTERVAL_SECONDS: z.coerce.number().int().positive().default(300),
  SHORT_TERM_CAPACITY: z.coerce.number().int().positive().default(10),
  EXTERNAL_CALL_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  HANDLER_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  FUSION_WEIGHT: z.coerce.number().min(0).max(1).default(0.5),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  env: Env['NODE_ENV'];
  port: number;
  logLevel: Env['LOG_LEVEL'];
  allowedOrigins: string[];
  llm: {
    apiKey: string;
    baseURL: string | undefined;
    model: string;
    classifierModel: string;
    embeddingModel: string;
  };
  supabase: { url: string; serviceKey: string };
  neo4j: { uri: string; username: string; password: string };
  memory: {
    store: Env['MEMORY_STORE'];
    filePath: string;
    redisKey: string;
    redisUrl: string | undefined;
    redisToken: string | undefined;
    sessionTimeoutMs: number;
    sweepIntervalMs: number;
    shortTermCapacity: number;
  };
  timeouts: { externalCallMs: number; handlerMs: number };
  fusionWeight: number;
}

/**
 * Parse a raw environment into AppConfig
 */
export function loadConfig(
  source: Record<string, string | undefined> = process.env
): Result<AppConfig> {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      key: issue.path.join('.'),
      message: issue.message,
    }));
    return failure('VALIDATION_ERROR', 'Invalid environment configuration', {
      issues,
    });
  }

  const env = parsed.data;

  if (
    env.MEMORY_STORE === 'redis' &&
    (env.UPSTASH_REDIS_URL === undefined || env.UPSTASH_REDIS_TOKEN === undefined)
  ) {
    return failure('VALIDATION_ERROR', 'Invalid environment configuration', {
      issues: [
        {
          key: 'UPSTASH_REDIS_URL',
          message: 'UPSTASH_REDIS_URL and UPSTASH_REDIS_TOKEN are required when MEMORY_STORE=redis',
        },
      ],
    });
  }

  return success({
    env: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    allowedOrigins: env.ALLOWED_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin !== ''),
    llm: {
      apiKey: env.OPENROUTER_API_KEY,
      baseURL: env.OPENROUTER_BASE_URL,
      model: env.LLM_MODEL,
      classifierModel: env.CLASSIFIER_MODEL,
      embeddingModel: env.EMBEDDING_MODEL,
    },
    supabase: { url: env.SUPABASE_URL, serviceKey: env.SUPABASE_SERVICE_KEY },
    neo4j: {
      uri: env.NEO4J_URI,
      username: env.NEO4J_USERNAME,
      password: env.NEO4J_PASSWORD,
    },
    memory: {
      store: env.MEMORY_STORE,
      filePath: env.MEMORY_FILE_PATH,
      redisKey: env.MEMORY_REDIS_KEY,
      redisUrl: env.UPSTASH_REDIS_URL,
      redisToken: env.UPSTASH_REDIS_TOKEN,
      sessionTimeoutMs: env.SESSION_TIMEOUT_SECONDS * 1000,
      sweepIntervalMs: env.SWEEP_INTERVAL_SECONDS * 1000,
      shortTermCapacity: env.SHORT_TERM_CAPACITY,
    },
    timeouts: {
      externalCallMs: env.EXTERNAL_CALL_TIMEOUT_MS,
      handlerMs: env.HANDLER_TIMEOUT_MS,
    },
    fusionWeight: env.FUSION_WEIGHT,
  });
}
