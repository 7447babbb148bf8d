import { describe, it, expect, beforeEach } from 'vitest';
import { LinkerCompiler } from '../../../src/application/linker-compiler.js';
import type { ValidatedLinker } from '../../../src/linker/linker-config.js';
import { Path } from '../../../src/naming/path.js';
import { FakeLoggerFactory } from '../../helpers/FakeLoggerFactory.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';
import { testConfig, testRegistries } from '../../helpers/test-container.js';
import { constantPlugins } from '../../helpers/test-plugins.js';

const LINKER = [
  'namers:',
  '  - kind: constant',
  '    prefix: /a',
  '    port: 1001',
  '  - kind: constant',
  '    prefix: /b',
  '    port: 1002',
  'baseDtab: /svc => /a',
  'routers:',
  '  - protocol: http',
  '    servers:',
  '      - port: 4140',
  '  - protocol: thrift',
  '    baseDtab: /svc => /b',
  '    servers:',
  '      - port: 4114',
  '',
].join('\n');

const BAD_LINKER = 'routers:\n  - protocol: http\n    servers:\n      - port: 0\n';

describe('LinkerCompiler', () => {
  let loggerFactory: FakeLoggerFactory;
  let compiler: LinkerCompiler;

  beforeEach(() => {
    loggerFactory = new FakeLoggerFactory();
    compiler = new LinkerCompiler(loggerFactory, testConfig(), testRegistries([constantPlugins]));
  });

  const logsOf = () => loggerFactory.getLogger('LinkerCompiler');
  const compiled = (): ValidatedLinker => expectOk(compiler.compile(LINKER, 'linker.yaml'), 'compiling');

  describe('compile', () => {
    it('logs every admitted router', () => {
      compiled();
      expect(logsOf()?.getEntries('debug').map((e) => [e.msg, e.fields])).toEqual([
        [
          'router admitted',
          { source: 'linker.yaml', label: 'http', protocol: 'http', servers: 1, params: { httpUriInDst: false } },
        ],
        [
          'router admitted',
          { source: 'linker.yaml', label: 'thrift', protocol: 'thrift', servers: 1, params: { thriftMethodInDst: false } },
        ],
      ]);
    });

    it('warns about a rejected document', () => {
      const errors = expectErr(compiler.compile(BAD_LINKER, 'bad.yaml'), 'rejected');
      expect(errors.map((e) => e._tag)).toEqual(['InvalidPort', 'NoRoutersSpecified']);
      expect(logsOf()?.getEntries('warn')).toEqual([
        { level: 'warn', msg: 'linker document rejected', fields: { source: 'bad.yaml', errors: 2, first: 'InvalidPort' } },
      ]);
    });

    it('uses the configured error mode', () => {
      const twoBad = `${BAD_LINKER}  - protocol: thrift\n    servers:\n      - port: 0\n`;
      const accumulating = expectErr(compiler.compile(twoBad, 'bad.yaml'), 'accumulate');
      const stopping = new LinkerCompiler(
        loggerFactory,
        testConfig({ errorMode: 'first_error' }),
        testRegistries(),
      ).compile(twoBad, 'bad.yaml');

      expect(accumulating).toHaveLength(3);
      expect(expectErr(stopping, 'first_error')).toHaveLength(2);
    });
  });

  describe('delegate', () => {
    it('binds through the first router by default', () => {
      const delegation = expectOk(compiler.delegate(compiled(), { path: '/svc/users' }), 'default router');

      expect(delegation.router).toBe('http');
      expect(delegation.dtab.show()).toBe('/svc=>/a');
      expect(delegation.tree).toEqual({
        kind: 'leaf',
        value: { id: Path.of('a'), residual: Path.of('users'), addresses: [{ ip: '127.0.0.1', port: 1001 }] },
      });
    });

    it('uses the dtab of the named router', () => {
      const delegation = expectOk(compiler.delegate(compiled(), { router: 'thrift', path: '/svc/users' }), 'thrift');
      expect(delegation.tree?.kind === 'leaf' ? delegation.tree.value.id.show() : undefined).toBe('/b');
    });

    it('lets an extra dtab override the router dtab', () => {
      const delegation = expectOk(
        compiler.delegate(compiled(), { path: '/svc/users', extraDtab: '/svc => /b' }),
        'extra dtab',
      );
      expect(delegation.dtab.show()).toBe('/svc=>/a;/svc=>/b');
      // both dentries match; the later one is tried first
      const tree = delegation.tree;
      const first = tree?.kind === 'alt' ? tree.trees[0] : undefined;
      expect(first?.kind === 'leaf' ? first.value.addresses : undefined).toEqual([{ ip: '127.0.0.1', port: 1002 }]);
    });

    it('logs the outcome', () => {
      compiler.delegate(compiled(), { path: '/nowhere' });
      expect(logsOf()?.getEntries('debug').at(-1)).toEqual({
        level: 'debug',
        msg: 'delegated',
        fields: { router: 'http', path: '/nowhere', result: 'neg' },
      });
    });

    it('reports an unknown router with the known labels', () => {
      expect(expectErr(compiler.delegate(compiled(), { router: 'h2', path: '/svc' }), 'unknown router')).toEqual({
        _tag: 'RouterNotFound',
        label: 'h2',
        known: ['http', 'thrift'],
      });
    });

    it('reports a malformed path or dtab', () => {
      const linker = compiled();
      expect(expectErr(compiler.delegate(linker, { path: 'svc' }), 'bad path')._tag).toBe('InvalidPath');
      expect(expectErr(compiler.delegate(linker, { path: '/svc', extraDtab: '/svc =>' }), 'bad dtab')).toMatchObject({
        _tag: 'InvalidDtab',
        text: '/svc =>',
      });
    });
  });
});
