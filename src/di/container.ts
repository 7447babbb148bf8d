import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { AppConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { AppError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import { createBootstrapLogger } from '../core/logging/bootstrap.js';
import type { PluginRegistries } from '../plugins/plugin-set.js';
import { buildRegistries, builtinPlugins } from '../plugins/plugin-set.js';
import { loadPluginModules } from '../plugins/load-plugins.js';
import { LinkerCompiler } from '../application/linker-compiler.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;
let initialization: Promise<Result<void, AppError>> | null = null;

export type ImportModule = (specifier: string) => Promise<unknown>;

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  readonly env?: Record<string, string | undefined>;
  readonly cwd?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(env: Record<string, string | undefined>): RuntimeMode {
  // The only place the environment decides the runtime mode.
  if (env.VITEST || env.NODE_ENV === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'cli' };
}

function registerRuntime(mode: RuntimeMode): void {
  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });

  if (!container.isRegistered(DI.Runtime.ProcessTerminator)) {
    const terminator: ProcessTerminator =
      mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
    container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION / LOGGING
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(env: Record<string, string | undefined>, cwd: string): Result<AppConfig, AppError> {
  // Tests may inject config before initialization.
  if (container.isRegistered(DI.Config.App)) {
    return ok(container.resolve<AppConfig>(DI.Config.App));
  }

  const config = loadConfig({ env, cwd });
  if (config.isErr()) return err(config.error);

  container.register<AppConfig>(DI.Config.App, { useValue: config.value });
  return ok(config.value);
}

function registerLogging(): void {
  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register(DI.Logging.Factory, {
      useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// PLUGINS
// ═══════════════════════════════════════════════════════════════════════════

const nativeImport: ImportModule = (specifier) => import(specifier);

async function registerPlugins(config: AppConfig): Promise<Result<void, AppError>> {
  if (container.isRegistered(DI.Plugins.Registries)) return ok(undefined);

  const logger = createBootstrapLogger('PluginDiscovery');
  const importModule = container.isRegistered(DI.Plugins.ImportModule)
    ? container.resolve<ImportModule>(DI.Plugins.ImportModule)
    : nativeImport;

  const discovered = await loadPluginModules(config.plugins.modules, {
    importModule,
    cwd: config.plugins.baseDir,
  });
  if (discovered.isErr()) {
    return err(Err.startupFailed('plugin_load', discovered.error.message, discovered.error));
  }

  const registries = buildRegistries([builtinPlugins, ...discovered.value]);
  if (registries.isErr()) {
    return err(Err.startupFailed('plugin_registry', registries.error.message, registries.error));
  }

  logger.debug(
    {
      modules: config.plugins.modules,
      protocols: registries.value.protocols.knownKeys(),
      namers: registries.value.namers.knownKeys(),
      tlsClients: registries.value.tlsClients.knownKeys(),
    },
    'plugins registered',
  );

  container.register<PluginRegistries>(DI.Plugins.Registries, { useValue: registries.value });
  return ok(undefined);
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICES
// ═══════════════════════════════════════════════════════════════════════════

function registerServices(): void {
  container.register(DI.Services.LinkerCompiler, {
    useFactory: instanceCachingFactory((c) => c.resolve(LinkerCompiler)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

async function initialize(options: ContainerInitOptions): Promise<Result<void, AppError>> {
  const env = options.env ?? process.env;
  registerRuntime(options.runtimeMode ?? detectRuntimeMode(env));

  const config = registerConfig(env, options.cwd ?? process.cwd());
  if (config.isErr()) return err(config.error);

  registerLogging();

  const plugins = await registerPlugins(config.value);
  if (plugins.isErr()) return err(plugins.error);

  registerServices();
  initialized = true;
  return ok(undefined);
}

/**
 * Initialize the DI container: runtime, config, logging, plugins, services.
 *
 * Concurrent callers share one initialization. A failed initialization is
 * not retried; call resetContainer() first.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Promise<Result<void, AppError>> {
  if (initialized) return Promise.resolve(ok(undefined));
  if (initialization === null) {
    initialization = initialize(options).catch(
      (e: unknown): Result<void, AppError> => err(Err.unexpected('Container initialization failed', e)),
    );
  }
  return initialization;
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
  initialization = null;
}

/**
 * Check initialization state.
 */
export function isInitialized(): boolean {
  return initialized;
}

// Export container for direct access when needed
export { container };
