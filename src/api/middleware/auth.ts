/**
 * Auth Middleware
 * Constructs ActorContext from a Supabase JWT
 *
 * The role comes from the user's `app_metadata.role`; anything missing or
 * unknown resolves to `guest`.
 */

import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';
import { z } from 'zod';

import { createLogger } from '../../lib/index.js';
import type { ActorContext, User } from '../../types/index.js';
import { ROLES } from '../../types/index.js';
import { errorResponse } from '../utils/response.js';

/**
 * Supabase auth user, narrowed to what the middleware reads
 */
export interface AuthUser {
  id: string;
  email?: string;
  app_metadata: Record<string, unknown>;
  user_metadata: Record<string, unknown>;
}

/**
 * Token verification capability (SupabaseClient satisfies this)
 */
export interface AuthVerifier {
  auth: {
    getUser(jwt: string): Promise<{
      data: { user: AuthUser | null };
      error: unknown;
    }>;
  };
}

interface AuthMiddlewareDeps {
  supabaseClient: AuthVerifier;
}

const roleSchema = z.enum(ROLES).catch('guest');

const displayNameSchema = z.string().trim().min(1);

/**
 * Generate a unique request ID
 */
function generateRequestId(): string {
  return nanoid();
}

/**
 * Map a verified auth user to the advisor's User
 */
export function toUser(authUser: AuthUser): User {
  const name = displayNameSchema.safeParse(
    authUser.user_metadata['full_name'] ?? authUser.user_metadata['name']
  );
  return {
    id: authUser.id,
    role: roleSchema.parse(authUser.app_metadata['role']),
    displayName: name.success ? name.data : (authUser.email ?? authUser.id),
  };
}

/**
 * Create auth middleware for protected routes
 * Extracts JWT, verifies with Supabase, constructs ActorContext
 */
export function createAuthMiddleware(deps: AuthMiddlewareDeps) {
  const { supabaseClient } = deps;
  const log = createLogger('auth');

  return async function authMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    // 1. Extract token from Authorization header
    const authHeader = c.req.header('Authorization');
    const token = authHeader?.startsWith('Bearer ') ? authHeader.slice(7).trim() : '';

    if (!token) {
      return errorResponse(
        c,
        { code: 'UNAUTHORIZED', message: 'Missing or invalid authorization header' },
        requestId
      );
    }

    try {
      // 2. Verify JWT with Supabase
      const {
        data: { user },
        error,
      } = await supabaseClient.auth.getUser(token);

      if (error || !user) {
        return errorResponse(
          c,
          { code: 'UNAUTHORIZED', message: 'Invalid or expired token' },
          requestId
        );
      }

      // 3. Construct ActorContext
      const actor: ActorContext = {
        type: 'user',
        user: toUser(user),
        requestId,
      };

      // 4. Attach to context
      c.set('actor', actor);
      c.set('requestId', requestId);

      // 5. Continue to next handler
      return next();
    } catch (err) {
      log.error({ err, requestId }, 'Auth middleware error');
      return errorResponse(
        c,
        { code: 'INTERNAL_ERROR', message: 'Authentication failed' },
        requestId
      );
    }
  };
}

/**
 * Create public middleware for routes that don't require auth
 * Creates an anonymous actor
 */
export function createPublicMiddleware() {
  return function publicMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    const actor: ActorContext = {
      type: 'anonymous',
      requestId,
    };

    c.set('actor', actor);
    c.set('requestId', requestId);

    return next();
  };
}
