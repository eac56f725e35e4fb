/**
 * Health Route
 * Public endpoint for health checks
 */

import { Hono } from 'hono';

interface HealthRoutesDeps {
  memoryService: { userIds(): string[] };
  sessionService: { readonly running: boolean };
}

/**
 * Create health check routes
 */
export function createHealthRoutes(deps: HealthRoutesDeps): Hono {
  const app = new Hono();

  /**
   * GET /health
   * Health check - no authentication required
   */
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: 'v1',
      activeUsers: deps.memoryService.userIds().length,
      sweeper: deps.sessionService.running ? 'running' : 'stopped',
    });
  });

  return app;
}
