/**
 * Thrift protocol plugin.
 *
 * Every request of a router goes to `<dstPrefix>`, or to
 * `<dstPrefix>/<method>` when the router sets `thriftMethodInDst`.
 */

import { z } from 'zod';
import { Path } from '../../naming/path.js';
import { paramParser } from '../param-parser.js';
import type { IdentifierContext, ProtocolPlugin, RequestIdentifier } from '../protocol-plugin.js';

export interface ThriftRequest {
  readonly method: string;
}

export interface ThriftRouterParams {
  readonly thriftMethodInDst: boolean;
}

export interface ThriftTransportParams {
  readonly thriftFramed: boolean;
}

const transportParams = paramParser({
  thriftFramed: z.boolean().default(true),
});

export function thriftIdentifier(router: IdentifierContext<ThriftRouterParams>): RequestIdentifier<ThriftRequest> {
  return (request) =>
    router.params.thriftMethodInDst ? router.dstPrefix.concat(Path.of(request.method)) : router.dstPrefix;
}

export const thriftProtocol: ProtocolPlugin<ThriftRequest, ThriftRouterParams, ThriftTransportParams, ThriftTransportParams> = {
  name: 'thrift',
  defaultServerPort: 4114,
  routerParams: paramParser({
    thriftMethodInDst: z.boolean().default(false),
  }),
  serverParams: transportParams,
  clientParams: transportParams,
  identifier: thriftIdentifier,
};
