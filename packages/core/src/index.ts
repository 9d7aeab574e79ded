/**
 * @koboldgate/core - protocol constants and shared types
 *
 * Pure definitions with no side effects.
 * Dependency direction: core → runtime → backend → gateway → server → cli
 */

export * from './constants.js';
export * from './errors/index.js';
export * from './logger.js';
export * from './rpc/methods.js';
export * from './rpc/notifications.js';
export * from './schemas.js';
export * from './types/index.js';
export * from './utils/deep-merge.js';
