/**
 * Restaurant Advisor Entry Point
 *
 * Wires together all services and starts the Hono application.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp } from './api/index.js';
import {
  ACCESS_POLICY,
  CITY_GAZETTEER,
  CONTEXT_PLANS,
  DEFAULT_CONTEXT_LIMITS,
  INTENT_RULES,
  PREFERENCE_TABLES,
  SPECIALIST_TERMS,
  loadConfig,
} from './config/index.js';
import {
  createNeo4jDriver,
  createSupabaseAdmin,
  getRedis,
  logger,
  setLogLevel,
} from './lib/index.js';
import {
  createIntentHandlers,
  createLLMClassifier,
  createLLMClient,
  createOrchestrator,
  createQueryEmbedder,
  createTextGenerator,
} from './orchestrator/index.js';
import {
  createContextService,
  createDocumentSearcher,
  createFileSnapshotStore,
  createGraphContextService,
  createGraphReader,
  createMemoryService,
  createPermissionService,
  createRedisSnapshotStore,
  createRetrievalService,
  createRouterService,
  createSessionService,
} from './services/index.js';
import type { MemorySnapshotStore } from './services/index.js';

// Validate environment
const configResult = loadConfig();

if (!configResult.success) {
  logger.fatal(
    { issues: configResult.error.details?.['issues'] },
    configResult.error.message
  );
  process.exit(1);
}

const config = configResult.data;
setLogLevel(config.logLevel);

// External clients
const supabase = createSupabaseAdmin(config.supabase);
const neo4jDriver = createNeo4jDriver(config.neo4j);
const llmClient = createLLMClient({
  apiKey: config.llm.apiKey,
  baseURL: config.llm.baseURL,
  siteName: 'Restaurant Advisor',
});

// Memory and its persistence
const memoryService = createMemoryService({
  preferenceTables: PREFERENCE_TABLES,
  config: {
    shortTermCapacity: config.memory.shortTermCapacity,
    sessionTimeoutMs: config.memory.sessionTimeoutMs,
  },
});

const snapshotStore: MemorySnapshotStore =
  config.memory.store === 'redis'
    ? createRedisSnapshotStore(
        getRedis({ url: config.memory.redisUrl, token: config.memory.redisToken }),
        config.memory.redisKey
      )
    : createFileSnapshotStore(config.memory.filePath);

const sessionService = createSessionService({
  memoryService,
  store: snapshotStore,
  sweepIntervalMs: config.memory.sweepIntervalMs,
});

// Routing, access and context
const permissionService = createPermissionService({ policy: ACCESS_POLICY });

const routerService = createRouterService({
  classifier: createLLMClassifier(llmClient, {
    model: config.llm.classifierModel,
    rules: INTENT_RULES,
  }),
  rules: INTENT_RULES,
  gazetteer: CITY_GAZETTEER,
  timeoutMs: config.timeouts.externalCallMs,
});

const retrievalService = createRetrievalService({
  searcher: createDocumentSearcher(
    supabase,
    createQueryEmbedder(llmClient, config.llm.embeddingModel)
  ),
  alpha: config.fusionWeight,
  timeoutMs: config.timeouts.externalCallMs,
});

const graphContextService = createGraphContextService({
  reader: createGraphReader(neo4jDriver),
  timeoutMs: config.timeouts.externalCallMs,
});

const contextService = createContextService({
  permissionService,
  retrievalService,
  graphContextService,
  memoryService,
  plans: CONTEXT_PLANS,
  limits: DEFAULT_CONTEXT_LIMITS,
});

// Dispatch
const orchestrator = createOrchestrator({
  routerService,
  permissionService,
  contextService,
  memoryService,
  handlers: createIntentHandlers({
    generator: createTextGenerator(llmClient, { model: config.llm.model }),
    permissionService,
    specialistTerms: SPECIALIST_TERMS,
  }),
  config: { handlerTimeoutMs: config.timeouts.handlerMs },
});

// Create the API application
const app = createApp({
  supabaseClient: supabase,
  services: { orchestrator, memoryService, permissionService, sessionService },
  allowedOrigins: config.allowedOrigins,
});

async function main(): Promise<void> {
  const restored = await sessionService.restore();
  if (!restored.success) {
    logger.warn({ reason: restored.error.message }, 'Starting with empty memory');
  }
  sessionService.start();

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info({ port: info.port, store: snapshotStore.kind }, 'Server started');
  });

  let shuttingDown = false;

  async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    sessionService.stop();
    server.close();

    const saved = await sessionService.save();
    if (!saved.success) {
      logger.error({ reason: saved.error.message }, 'Memory snapshot not saved');
    }
    await neo4jDriver.close();
    process.exit(0);
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Startup failed');
  process.exit(1);
});

export { app };
