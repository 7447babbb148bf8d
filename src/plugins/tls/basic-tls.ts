/**
 * Client TLS with a fixed expectation: `none` skips peer validation, `static`
 * expects the same common name from every destination.
 */

import { z } from 'zod';
import { ok } from 'neverthrow';
import { paramParser } from '../param-parser.js';
import type { ClientTlsPlugin, PeerCheck } from '../tls-plugin.js';

const SKIP: PeerCheck = { kind: 'skip' };

export interface StaticTlsParams {
  readonly commonName: string;
  readonly caCertPath?: string | undefined;
}

export const noValidationTls: ClientTlsPlugin<{ readonly caCertPath?: string | undefined }> = {
  kind: 'none',
  params: paramParser({
    caCertPath: z.string().optional(),
  }),
  mk: (params) => ({
    caCertPath: params.caCertPath,
    peerCheck: () => ok(SKIP),
  }),
};

export const staticTls: ClientTlsPlugin<StaticTlsParams> = {
  kind: 'static',
  params: paramParser({
    commonName: z.string({ required_error: 'commonName is required' }).min(1),
    caCertPath: z.string().optional(),
  }),
  mk: (params) => {
    const check: PeerCheck = { kind: 'common_name', commonName: params.commonName };
    return { caCertPath: params.caCertPath, peerCheck: () => ok(check) };
  },
};
