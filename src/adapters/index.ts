/**
 * Adapter Index
 *
 * Exports the registry, its types and the program resolvers.
 */

export * from './types.js';
export * from './errors.js';
export * from './adapter-registry.js';
export * from './program-resolver.js';
