/**
 * Actor helpers shared by protected routes
 */

import type { Context } from 'hono';

import type { User } from '../../types/index.js';

export function getRequestId(c: Context): string {
  return c.get('requestId');
}

/**
 * The authenticated user, or null for anonymous actors
 */
export function getUser(c: Context): User | null {
  return c.get('actor').user ?? null;
}
