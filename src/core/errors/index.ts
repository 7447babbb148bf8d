/**
 * Config Error System Exports
 */

export type * from './config-error.js';
export * from './factories.js';
export * from './type-guards.js';
export * from './formatter.js';
