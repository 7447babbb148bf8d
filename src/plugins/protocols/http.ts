/**
 * HTTP protocol plugin.
 *
 * Requests are identified as `<dstPrefix>/<version>/<METHOD>/<host>`, with
 * the request path's segments appended when the router sets `httpUriInDst`.
 */

import { z } from 'zod';
import { Path } from '../../naming/path.js';
import { paramParser } from '../param-parser.js';
import type { IdentifierContext, ProtocolPlugin, RequestIdentifier } from '../protocol-plugin.js';

export interface HttpRequest {
  readonly method: string;
  /** `1.0`, `1.1`, ... */
  readonly version: string;
  readonly host?: string;
  readonly uri: string;
}

const kilobytes = z.number().int().positive();

const routerParams = paramParser({
  httpUriInDst: z.boolean().default(false),
});

const serverParams = paramParser({
  maxRequestKB: kilobytes.optional(),
});

const clientParams = paramParser({
  maxResponseKB: kilobytes.optional(),
});

export interface HttpRouterParams {
  readonly httpUriInDst: boolean;
}

export interface HttpServerParams {
  readonly maxRequestKB?: number | undefined;
}

export interface HttpClientParams {
  readonly maxResponseKB?: number | undefined;
}

export function httpIdentifier(router: IdentifierContext<HttpRouterParams>): RequestIdentifier<HttpRequest> {
  return (request) => {
    const head = Path.of(request.version, request.method.toUpperCase(), request.host ?? '');
    if (!router.params.httpUriInDst) return router.dstPrefix.concat(head);

    const [pathPart = ''] = request.uri.split('?');
    return router.dstPrefix.concat(head).concat(Path.of(...pathPart.split('/')));
  };
}

export const httpProtocol: ProtocolPlugin<HttpRequest, HttpRouterParams, HttpServerParams, HttpClientParams> = {
  name: 'http',
  defaultServerPort: 4140,
  routerParams,
  serverParams,
  clientParams,
  identifier: httpIdentifier,
};
