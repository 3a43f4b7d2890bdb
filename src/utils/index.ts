/**
 * Gateway - Utilities Module
 */

export { default as logger } from './logger.js';
export * from './logger.js';
export * from './types.js';
export * from './helpers.js';
