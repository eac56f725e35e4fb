/**
 * Access Routes
 * What the caller's role may do
 */

import { Hono } from 'hono';

import type { Intent, Role, WILDCARD } from '../../types/index.js';
import { getRequestId, getUser } from '../utils/actor.js';
import { errorResponse, successResponse } from '../utils/response.js';

interface AccessRoutesPermissionDep {
  describeRole(role: Role): string;
  allowedIntents(role: Role): readonly Intent[] | typeof WILDCARD;
}

interface AccessRoutesDeps {
  permissionService: AccessRoutesPermissionDep;
}

export function createAccessRoutes(deps: AccessRoutesDeps): Hono {
  const { permissionService } = deps;
  const app = new Hono();

  /**
   * GET /access
   */
  app.get('/access', (c) => {
    const requestId = getRequestId(c);
    const user = getUser(c);
    if (user === null) {
      return errorResponse(
        c,
        { code: 'UNAUTHORIZED', message: 'Authentication required' },
        requestId
      );
    }

    return successResponse(
      c,
      {
        userId: user.id,
        displayName: user.displayName,
        role: user.role,
        description: permissionService.describeRole(user.role),
        intents: permissionService.allowedIntents(user.role),
      },
      requestId
    );
  });

  return app;
}
