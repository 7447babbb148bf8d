export { executeCheckCommand, topologySections } from './check.js';
export type { CheckCommandDeps } from './check.js';
export { executeDelegateCommand, showBound } from './delegate.js';
export type { DelegateCommandDeps, DelegateCommandOptions } from './delegate.js';
