/**
 * Service Layer Exports
 *
 * Services are the ONLY gateway to the document store, the graph store
 * and the per-user memory. All business logic lives here.
 */

// PermissionService
export type { PermissionService, PermissionServiceDeps } from './permission.service.js';
export { createPermissionService } from './permission.service.js';

// RouterService
export type {
  ClassifierPayload,
  RouterService,
  RouterServiceDeps,
} from './router.service.js';
export { createRouterService, parseClassifierReply } from './router.service.js';

// MemoryService
export type { MemoryService, MemoryServiceDeps } from './memory.service.js';
export { createMemoryService } from './memory.service.js';

// RetrievalService
export type {
  DocumentSearcher,
  HybridSearchResult,
  RetrievalService,
  RetrievalServiceDeps,
  SearchMode,
  SearchOptions,
} from './retrieval.service.js';
export { createRetrievalService, documentKey, fuseRankings } from './retrieval.service.js';
export type { QueryEmbedder } from './document.db.js';
export { createDocumentSearcher } from './document.db.js';

// GraphContextService
export type {
  GraphContextService,
  GraphContextServiceDeps,
  GraphReader,
} from './graph-context.service.js';
export {
  createGraphContextService,
  formatLocation,
  formatRegulation,
} from './graph-context.service.js';
export { createGraphReader } from './graph.db.js';

// ContextService
export type { ContextService, ContextServiceDeps } from './context.service.js';
export { createContextService, insightKey } from './context.service.js';

// SessionService
export type { SessionService, SessionServiceDeps } from './session.service.js';
export { createSessionService } from './session.service.js';
export type { MemorySnapshotStore, SnapshotRedisClient } from './memory.storage.js';
export { createFileSnapshotStore, createRedisSnapshotStore } from './memory.storage.js';
