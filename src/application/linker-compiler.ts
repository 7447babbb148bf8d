import { inject, singleton } from 'tsyringe';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { DI } from '../di/tokens.js';
import type { ILoggerFactory, Logger } from '../core/logging/index.js';
import type { AppConfig } from '../config/app-config.js';
import type { PluginRegistries } from '../plugins/plugin-set.js';
import type { LinkerResult } from '../document/linker-reader.js';
import { compileLinkerDocument } from '../document/linker-reader.js';
import type { ValidatedLinker } from '../linker/linker-config.js';
import type { ValidatedRouter } from '../linker/router-config.js';
import type { BoundName } from '../naming/name-interpreter.js';
import type { NameTree } from '../naming/name-tree.js';
import { Dtab } from '../naming/dtab.js';
import { Path } from '../naming/path.js';

export interface DelegateRequest {
  /** Label of the router whose dtab is used; the first router when absent. */
  readonly router?: string | undefined;
  readonly path: string;
  /** Appended to the router dtab, so its entries take precedence. */
  readonly extraDtab?: string | undefined;
}

export interface Delegation {
  readonly router: string;
  readonly path: Path;
  readonly dtab: Dtab;
  /** First state of the resolution stream; undefined if it produced none. */
  readonly tree: NameTree<BoundName> | undefined;
}

export type DelegateError =
  | { readonly _tag: 'RouterNotFound'; readonly label: string; readonly known: readonly string[] }
  | { readonly _tag: 'InvalidPath'; readonly text: string; readonly cause: string }
  | { readonly _tag: 'InvalidDtab'; readonly text: string; readonly cause: string };

/**
 * Compiles linker documents against the registered plugins and answers
 * delegation queries on the result.
 */
@singleton()
export class LinkerCompiler {
  private readonly logger: Logger;

  constructor(
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory,
    @inject(DI.Config.App) private readonly config: AppConfig,
    @inject(DI.Plugins.Registries) private readonly registries: PluginRegistries,
  ) {
    this.logger = loggerFactory.create('LinkerCompiler');
  }

  compile(text: string, source: string): LinkerResult {
    const result = compileLinkerDocument(text, source, {
      registries: this.registries,
      errorMode: this.config.compile.errorMode,
    });

    if (result.isErr()) {
      this.logger.warn(
        { source, errors: result.error.length, first: result.error[0]._tag },
        'linker document rejected',
      );
      return result;
    }

    for (const router of result.value.routers) {
      this.logger.debug(
        { source, label: router.label, protocol: router.protocol, servers: router.servers.length, params: router.params },
        'router admitted',
      );
    }
    return result;
  }

  delegate(linker: ValidatedLinker, request: DelegateRequest): Result<Delegation, DelegateError> {
    const router = findRouter(linker.routers, request.router);
    if (router === undefined) {
      return err({
        _tag: 'RouterNotFound',
        label: request.router ?? '',
        known: linker.routers.map((r) => r.label),
      });
    }

    const path = Path.read(request.path);
    if (path.isErr()) return err({ _tag: 'InvalidPath', text: request.path, cause: path.error });

    let dtab = router.dtab;
    if (request.extraDtab !== undefined) {
      const extra = Dtab.read(request.extraDtab);
      if (extra.isErr()) return err({ _tag: 'InvalidDtab', text: request.extraDtab, cause: extra.error });
      dtab = dtab.concat(extra.value);
    }

    const tree = linker.interpreter.bind(dtab, path.value).sample();
    this.logger.debug({ router: router.label, path: request.path, result: tree?.kind }, 'delegated');

    return ok({ router: router.label, path: path.value, dtab, tree });
  }
}

function findRouter(routers: readonly ValidatedRouter[], label: string | undefined): ValidatedRouter | undefined {
  return label === undefined ? routers[0] : routers.find((r) => r.label === label);
}
