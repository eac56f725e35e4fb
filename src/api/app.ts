/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as accessLogger } from 'hono/logger';

import { createLogger } from '../lib/index.js';
import type {
  Intent,
  Message,
  OrchestratorInput,
  OrchestratorResult,
  Permission,
  Result,
  Role,
  UserContextSummary,
  WILDCARD,
} from '../types/index.js';

import { createAuthMiddleware, createPublicMiddleware } from './middleware/auth.js';
import type { AuthVerifier } from './middleware/auth.js';
import { createAccessRoutes } from './routes/access.js';
import { createAdvisorRoutes } from './routes/advisor.js';
import { createHealthRoutes } from './routes/health.js';
import { createMemoryRoutes } from './routes/memory.js';
import { errorResponse } from './utils/response.js';

/**
 * Services the HTTP layer talks to
 */
export interface ApiServices {
  orchestrator: {
    run(input: OrchestratorInput): Promise<Result<OrchestratorResult>>;
  };
  memoryService: {
    getUserContext(userId: string): UserContextSummary | null;
    getConversation(userId: string, max?: number): Message[];
    addFact(userId: string, fact: string): Promise<void>;
    userIds(): string[];
  };
  permissionService: {
    canUseMemory(role: Role, permission: Permission): boolean;
    describeRole(role: Role): string;
    allowedIntents(role: Role): readonly Intent[] | typeof WILDCARD;
  };
  sessionService: {
    logout(userId: string): Promise<boolean>;
    readonly running: boolean;
  };
}

/**
 * App configuration
 */
export interface AppOptions {
  supabaseClient: AuthVerifier;
  services: ApiServices;
  allowedOrigins?: string[];
  /** Access log lines; off in tests */
  accessLog?: boolean;
}

/**
 * Create the main Hono application
 */
export function createApp(options: AppOptions): Hono {
  const { supabaseClient, services, allowedOrigins } = options;
  const log = createLogger('http');
  const app = new Hono();

  // Global middleware
  if (options.accessLog ?? true) {
    app.use('*', accessLogger((line) => log.info(line)));
  }
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
      credentials: true,
    })
  );

  // Public routes (no auth)
  app.use('/api/v1/health', createPublicMiddleware());
  app.route(
    '/api/v1',
    createHealthRoutes({
      memoryService: services.memoryService,
      sessionService: services.sessionService,
    })
  );

  // Auth middleware for protected routes
  const authMiddleware = createAuthMiddleware({ supabaseClient });

  app.use('/api/v1/advisor/*', authMiddleware);
  app.route('/api/v1', createAdvisorRoutes({ orchestrator: services.orchestrator }));

  app.use('/api/v1/memory', authMiddleware);
  app.use('/api/v1/memory/*', authMiddleware);
  app.route(
    '/api/v1',
    createMemoryRoutes({
      memoryService: services.memoryService,
      permissionService: services.permissionService,
      sessionService: services.sessionService,
    })
  );

  app.use('/api/v1/access', authMiddleware);
  app.route(
    '/api/v1',
    createAccessRoutes({ permissionService: services.permissionService })
  );

  // 404 handler
  app.notFound((c) => {
    const requestId = c.get('requestId') ?? 'unknown';
    return errorResponse(
      c,
      { code: 'NOT_FOUND', message: 'Endpoint not found' },
      requestId
    );
  });

  // Global error handler
  app.onError((err, c) => {
    const requestId = c.get('requestId') ?? 'unknown';
    log.error({ err, requestId }, 'Unhandled error');
    return errorResponse(
      c,
      { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
      requestId
    );
  });

  return app;
}
