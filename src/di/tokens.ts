/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens, grouped by concern.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under the matching namespace
 * 2. Add @singleton() to the class
 * 3. Register the token alias in container.ts
 * 4. Use @inject(DI.YourToken) in consumers
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // CORE SERVICES
  // ═══════════════════════════════════════════════════════════════════
  Services: {
    /** Document in, validated linker out */
    LinkerCompiler: Symbol('Services.LinkerCompiler'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // PLUGINS
  // ═══════════════════════════════════════════════════════════════════
  Plugins: {
    /** Protocol, namer and client TLS registries (built-in + discovered) */
    Registries: Symbol('Plugins.Registries'),
    /** Dynamic import used for plugin discovery */
    ImportModule: Symbol('Plugins.ImportModule'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Runtime mode (cli/test) */
    Mode: Symbol('Runtime.Mode'),
    /** Process terminator (composition roots only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete process configuration (validated) */
    App: Symbol('Config.App'),
  },
} as const;

/** Type helper for token values */
export type DIToken = typeof DI[keyof typeof DI][keyof typeof DI[keyof typeof DI]];
