/**
 * Type exports
 */

export * from './result.js';
export * from './routing.js';
export * from './auth.js';
export * from './context.js';
export * from './memory.js';
export * from './orchestrator.js';
