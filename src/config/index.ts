/**
 * Barrel export for configuration modules
 *
 * @module config
 */

export * from './errors';
export * from './schema';
export * from './defaults';
export * from './loader';
export * from './settings';
