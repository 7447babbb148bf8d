/**
 * Runtime mode of the current process.
 * Injected through DI rather than sniffed from env vars at the call site.
 */
export type RuntimeMode =
  | { kind: 'cli' }
  | { kind: 'test' };
