/**
 * Linker reader: a parsed document in, a validated linker or every problem
 * with it out.
 *
 * Two passes over the top-level mapping:
 *
 * 1. Scan the keys in document order. `namers`, `admin`, `baseDtab` and
 *    `failFast` are read as they come and build up the linker defaults;
 *    `routers` is only remembered; any other key is an UnknownParameter.
 * 2. Replay the remembered routers against the finished defaults, admitting
 *    them one at a time: each router is checked against the routers admitted
 *    before it.
 *
 * A document that yields any error is rejected as a whole.
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { ConfigError } from '../core/errors/config-error.js';
import { ConfigErr } from '../core/errors/factories.js';
import { Dtab } from '../naming/dtab.js';
import { composeNamers, createNameInterpreter } from '../naming/name-interpreter.js';
import type { PluginRegistries } from '../plugins/plugin-set.js';
import type { ValidatedAdmin } from '../linker/admin-config.js';
import { defaultAdmin, readAdmin, validateAdmin } from '../linker/admin-config.js';
import type { LinkerDefaults, ValidatedLinker } from '../linker/linker-config.js';
import { emptyLinkerDefaults } from '../linker/linker-config.js';
import type { ValidatedNamer } from '../linker/namer-config.js';
import { namerWithDefaults, readNamer, validateNamer } from '../linker/namer-config.js';
import type { ValidatedRouter } from '../linker/router-config.js';
import { readRouter, routerWithDefaults, validateRouter } from '../linker/router-config.js';
import type { NonEmptyArray } from '../validation/validated.js';
import { errorsOf, invalid, nonEmpty } from '../validation/validated.js';
import type { ConfigField, ConfigNode } from './config-node.js';
import { readDocument } from './read-document.js';

/** `accumulate` reads every router; `first_error` stops at the first rejected one. */
export type ErrorMode = 'accumulate' | 'first_error';

export interface ReadLinkerOptions {
  readonly registries: PluginRegistries;
  readonly errorMode?: ErrorMode;
}

export type LinkerResult = Result<ValidatedLinker, NonEmptyArray<ConfigError>>;

// =============================================================================
// Pass 1: top-level scan
// =============================================================================

interface ScanState {
  readonly defaults: LinkerDefaults;
  readonly admin: ValidatedAdmin;
  readonly routers: ConfigNode | undefined;
  readonly errors: readonly ConfigError[];
}

const initialScan: ScanState = {
  defaults: emptyLinkerDefaults,
  admin: defaultAdmin,
  routers: undefined,
  errors: [],
};

function scanNamers(state: ScanState, node: ConfigNode, registries: PluginRegistries): ScanState {
  if (node.isNull) return state;
  if (node.kind !== 'seq') {
    return { ...state, errors: [...state.errors, ConfigErr.invalidParameter('namers', 'expected a list', node.location)] };
  }

  const results = node.items().map((item) =>
    readNamer(item, registries.namers).andThen((namer) => validateNamer(namerWithDefaults(namer))),
  );
  const namers: ValidatedNamer[] = results.flatMap((r) => (r.isOk() ? [r.value] : []));

  return {
    ...state,
    defaults: { ...state.defaults, namers: [...state.defaults.namers, ...namers] },
    errors: [...state.errors, ...results.flatMap((r) => errorsOf(r))],
  };
}

function scanBaseDtab(state: ScanState, node: ConfigNode): ScanState {
  const text = node.materialize(z.string());
  if (text.isErr()) return { ...state, errors: [...state.errors, ...text.error] };

  const dtab = Dtab.read(text.value);
  if (dtab.isErr()) {
    return { ...state, errors: [...state.errors, ConfigErr.invalidDtab(text.value, dtab.error, node.location)] };
  }
  return { ...state, defaults: { ...state.defaults, baseDtab: dtab.value } };
}

function scanFailFast(state: ScanState, node: ConfigNode): ScanState {
  const failFast = node.materialize(z.boolean());
  if (failFast.isErr()) return { ...state, errors: [...state.errors, ...failFast.error] };
  return { ...state, defaults: { ...state.defaults, failFast: failFast.value } };
}

function scanAdmin(state: ScanState, node: ConfigNode): ScanState {
  const admin = readAdmin(node).andThen(validateAdmin);
  if (admin.isErr()) return { ...state, errors: [...state.errors, ...admin.error] };
  return { ...state, admin: admin.value };
}

function scanField(state: ScanState, field: ConfigField, registries: PluginRegistries): ScanState {
  switch (field.key) {
    case 'namers':
      return scanNamers(state, field.node, registries);
    case 'baseDtab':
      return scanBaseDtab(state, field.node);
    case 'failFast':
      return scanFailFast(state, field.node);
    case 'admin':
      return scanAdmin(state, field.node);
    case 'routers':
      return { ...state, routers: field.node };
    default:
      return { ...state, errors: [...state.errors, ConfigErr.unknownParameter(field.key, '')] };
  }
}

// =============================================================================
// Pass 2: router replay
// =============================================================================

interface ReplayResult {
  readonly admitted: readonly ValidatedRouter[];
  readonly errors: readonly ConfigError[];
}

function replayRouters(
  node: ConfigNode | undefined,
  defaults: LinkerDefaults,
  options: ReadLinkerOptions,
): ReplayResult {
  if (node === undefined || node.isNull) return { admitted: [], errors: [] };
  if (node.kind !== 'seq') {
    return { admitted: [], errors: [ConfigErr.invalidParameter('routers', 'expected a list', node.location)] };
  }

  const admitted: ValidatedRouter[] = [];
  const errors: ConfigError[] = [];

  for (const item of node.items()) {
    const router = readRouter(item, options.registries).andThen((config) =>
      validateRouter(routerWithDefaults(config, defaults), admitted),
    );

    if (router.isOk()) {
      admitted.push(router.value);
      continue;
    }
    errors.push(...router.error);
    if (options.errorMode === 'first_error') break;
  }

  return { admitted, errors };
}

// =============================================================================
// Public API
// =============================================================================

/** Read a linker from an already parsed document. */
export function readLinker(root: ConfigNode, options: ReadLinkerOptions): LinkerResult {
  const scan = root.fields().reduce((state, field) => scanField(state, field, options.registries), initialScan);
  const replay = replayRouters(scan.routers, scan.defaults, options);

  const errors = [...scan.errors, ...replay.errors];
  if (replay.admitted.length === 0) errors.push(ConfigErr.noRoutersSpecified());

  const failures = nonEmpty(errors);
  if (failures !== undefined) return err(failures);

  const { namers, baseDtab, failFast } = scan.defaults;
  return ok({
    routers: replay.admitted,
    namers,
    admin: scan.admin,
    baseDtab,
    failFast,
    interpreter: createNameInterpreter(composeNamers(namers.map(({ prefix, namer }) => ({ prefix, namer })))),
  });
}

/** Parse and read a linker document (JSON or YAML). */
export function compileLinkerDocument(text: string, source: string, options: ReadLinkerOptions): LinkerResult {
  const root = readDocument(text, source);
  if (root.isErr()) return invalid(root.error);
  return readLinker(root.value, options);
}
