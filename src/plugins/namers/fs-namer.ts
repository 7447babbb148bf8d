/**
 * File-system namer.
 *
 * `/<service>/<rest...>` binds to the addresses listed in `<rootDir>/<service>`,
 * one `host port` pair per line. Blank lines and `#` comments are ignored.
 *
 * - no such file: negative (the next namer or dentry gets a chance)
 * - unreadable or malformed file: failure
 */

import fs from 'fs';
import path from 'path';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { z } from 'zod';
import type { BoundName, Namer } from '../../naming/name-interpreter.js';
import type { NameTree } from '../../naming/name-tree.js';
import { NameTrees } from '../../naming/name-tree.js';
import { Path } from '../../naming/path.js';
import { ResolutionStream } from '../../naming/resolution-stream.js';
import type { SocketAddress } from '../../linker/socket-address.js';
import { paramParser } from '../param-parser.js';
import type { NamerPlugin } from '../namer-plugin.js';

export type FsReadFailure =
  | { readonly kind: 'not_found' }
  | { readonly kind: 'unreadable'; readonly message: string };

export interface FsNamerDeps {
  readonly readFile: (filePath: string) => Result<string, FsReadFailure>;
}

export interface FsNamerParams {
  readonly rootDir: string;
}

export function readFileUtf8(filePath: string): Result<string, FsReadFailure> {
  try {
    return ok(fs.readFileSync(filePath, 'utf-8'));
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return err({ kind: 'not_found' });
    return err({ kind: 'unreadable', message: e instanceof Error ? e.message : String(e) });
  }
}

/** Parse `host port` lines; `undefined` when any line is malformed. */
export function parseAddressList(content: string): readonly SocketAddress[] | undefined {
  const addresses: SocketAddress[] = [];
  for (const rawLine of content.split('\n')) {
    const line = rawLine.replace(/#.*$/, '').trim();
    if (line === '') continue;

    const [host, portText, ...extra] = line.split(/\s+/);
    const port = Number(portText);
    if (host === undefined || extra.length > 0 || !Number.isInteger(port) || port < 1 || port > 65535) {
      return undefined;
    }
    addresses.push({ ip: host, port });
  }
  return addresses;
}

const UNSAFE_SERVICES: ReadonlySet<string> = new Set(['.', '..']);

export function createFsNamer(rootDir: string, prefix: Path, deps: FsNamerDeps = { readFile: readFileUtf8 }): Namer {
  const bind = (service: string, residual: Path): NameTree<BoundName> => {
    if (UNSAFE_SERVICES.has(service) || service.includes('/') || service.includes(path.sep)) return NameTrees.neg;

    const content = deps.readFile(path.join(rootDir, service));
    if (content.isErr()) {
      return content.error.kind === 'not_found' ? NameTrees.neg : NameTrees.fail;
    }

    const addresses = parseAddressList(content.value);
    if (addresses === undefined) return NameTrees.fail;

    return NameTrees.leaf({ id: prefix.concat(Path.of(service)), residual, addresses });
  };

  return {
    lookup: (p) => {
      const [service] = p.segments;
      if (service === undefined) return ResolutionStream.of<NameTree<BoundName>>(NameTrees.neg);
      return ResolutionStream.from(function* () {
        yield bind(service, p.drop(1));
      });
    },
  };
}

export const fsNamer: NamerPlugin<FsNamerParams> = {
  kind: 'fs',
  defaultPrefix: '/fs',
  params: paramParser({
    rootDir: z.string({ required_error: 'rootDir is required' }).min(1),
  }),
  mk: (params, context) => createFsNamer(params.rootDir, context.prefix),
};
