import { describe, it, expect } from 'vitest';
import { httpIdentifier, httpProtocol } from '../../../../src/plugins/protocols/http.js';
import { thriftIdentifier, thriftProtocol } from '../../../../src/plugins/protocols/thrift.js';
import { Path } from '../../../../src/naming/path.js';
import { expectOk } from '../../../helpers/result-helpers.js';
import { parseRoot } from '../../../helpers/config-nodes.js';

describe('http identifier', () => {
  const request = { method: 'get', version: '1.1', host: 'api.example.test', uri: '/users/42?verbose=1' };

  it('names the destination by version, method and host', () => {
    const identify = httpIdentifier({ dstPrefix: Path.of('http'), params: { httpUriInDst: false } });
    expect(identify(request).show()).toBe('/http/1.1/GET/api.example.test');
  });

  it('appends the request path when configured to', () => {
    const identify = httpIdentifier({ dstPrefix: Path.of('web'), params: { httpUriInDst: true } });
    expect(identify(request).show()).toBe('/web/1.1/GET/api.example.test/users/42');
  });

  it('leaves out a missing host', () => {
    const identify = httpIdentifier({ dstPrefix: Path.of('http'), params: { httpUriInDst: false } });
    expect(identify({ method: 'POST', version: '1.0', uri: '/' }).show()).toBe('/http/1.0/POST');
  });

  it('defaults to port 4140 and no request path', () => {
    expect(httpProtocol.defaultServerPort).toBe(4140);
    expect(expectOk(httpProtocol.routerParams.parse([], 'router'), 'defaults')).toEqual({ httpUriInDst: false });
  });
});

describe('thrift identifier', () => {
  it('routes every call to the destination prefix', () => {
    const identify = thriftIdentifier({ dstPrefix: Path.of('thrift'), params: { thriftMethodInDst: false } });
    expect(identify({ method: 'getUser' }).show()).toBe('/thrift');
  });

  it('appends the method when configured to', () => {
    const identify = thriftIdentifier({ dstPrefix: Path.of('thrift'), params: { thriftMethodInDst: true } });
    expect(identify({ method: 'getUser' }).show()).toBe('/thrift/getUser');
  });

  it('frames transports unless told otherwise', () => {
    expect(thriftProtocol.defaultServerPort).toBe(4114);
    expect(expectOk(thriftProtocol.serverParams.parse([], 'server'), 'default')).toEqual({ thriftFramed: true });
    const fields = parseRoot('thriftFramed: false\n').fields();
    expect(expectOk(thriftProtocol.clientParams.parse(fields, 'client'), 'unframed')).toEqual({ thriftFramed: false });
  });
});
