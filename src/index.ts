/**
 * resource-lifecycle - create, update and delete strategies for BuildConfig
 * and Route objects.
 */

export * from './allocation/index.js';
export * from './apis/build/index.js';
export * from './apis/route/index.js';
export * from './core.js';
export * from './registry/index.js';
