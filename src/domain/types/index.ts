/**
 * Domain Types - Unified exports
 */

export * from './result';
export * from './kubernetes';
export * from './rollout';
export * from './rollout-store';
