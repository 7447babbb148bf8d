import { describe, it, expect } from 'vitest';
import { namerWithDefaults, readNamer, validateNamer } from '../../../src/linker/namer-config.js';
import { Path } from '../../../src/naming/path.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';
import { child, parseRoot } from '../../helpers/config-nodes.js';
import { testRegistries } from '../../helpers/test-container.js';

const registries = testRegistries();

function namerNode(yaml: string) {
  return child(parseRoot(`namer:\n${yaml}`), 'namer');
}

describe('readNamer', () => {
  it('reads the kind, prefix and plugin parameters', () => {
    const config = expectOk(
      readNamer(namerNode('  kind: fs\n  prefix: /disco\n  rootDir: /etc/disco\n'), registries.namers),
      'reading an fs namer',
    );
    expect(config.plugin.kind).toBe('fs');
    expect(config.prefix).toBe('/disco');
    expect(config.params).toEqual({ rootDir: '/etc/disco' });
  });

  it('requires a kind', () => {
    const errors = expectErr(readNamer(namerNode('  rootDir: /etc/disco\n'), registries.namers), 'no kind');
    expect(errors).toEqual([
      {
        _tag: 'MissingRequiredField',
        name: 'kind',
        location: 'namer',
        message: 'namer: missing required field "kind"',
      },
    ]);
  });

  it('names the known kinds when the kind is unknown', () => {
    const errors = expectErr(readNamer(namerNode('  kind: consul\n'), registries.namers), 'unknown kind');
    expect(errors).toEqual([
      {
        _tag: 'PluginNotFound',
        kind: 'consul',
        registry: 'namer',
        known: ['fs'],
        location: 'namer.kind',
        message: 'namer.kind: unknown namer "consul". Known: fs',
      },
    ]);
  });

  it('rejects a non-string kind', () => {
    const errors = expectErr(readNamer(namerNode('  kind: 3\n'), registries.namers), 'numeric kind');
    expect(errors[0]).toMatchObject({ _tag: 'InvalidParameter', name: 'kind', reason: 'expected a string' });
  });

  it('reports plugin parameter problems and unknown keys together', () => {
    const errors = expectErr(readNamer(namerNode('  kind: fs\n  extra: 1\n'), registries.namers), 'missing rootDir');
    expect(errors.map((e) => e._tag)).toEqual(['UnknownParameter', 'InvalidParameter']);
    expect(errors[1]).toMatchObject({ name: 'rootDir', reason: 'rootDir is required' });
  });
});

describe('validateNamer', () => {
  const read = (yaml: string) =>
    namerWithDefaults(expectOk(readNamer(namerNode(yaml), registries.namers), 'reading namer'));

  it('uses the plugin default prefix', () => {
    const namer = expectOk(validateNamer(read('  kind: fs\n  rootDir: /etc/disco\n')), 'default prefix');
    expect(namer.prefix.show()).toBe('/fs');
    expect(namer.kind).toBe('fs');
  });

  it('treats a blank prefix as missing', () => {
    for (const prefix of ['""', '"  "']) {
      const errors = expectErr(validateNamer(read(`  kind: fs\n  rootDir: /d\n  prefix: ${prefix}\n`)), `prefix ${prefix}`);
      expect(errors).toEqual([
        { _tag: 'MissingPath', location: 'namer.prefix', message: 'namer.prefix: no path prefix configured' },
      ]);
    }
  });

  it('mounts a namer at the root prefix', () => {
    const namer = expectOk(validateNamer(read('  kind: fs\n  rootDir: /d\n  prefix: /\n')), 'root prefix');
    expect(namer.prefix.isEmpty).toBe(true);
  });

  it('rejects a malformed prefix', () => {
    const errors = expectErr(validateNamer(read('  kind: fs\n  rootDir: /d\n  prefix: disco\n')), 'relative prefix');
    expect(errors[0]).toMatchObject({ _tag: 'InvalidPath', text: 'disco', location: 'namer.prefix' });
  });

  it('builds a namer mounted at the prefix', () => {
    const namer = expectOk(validateNamer(read('  kind: fs\n  rootDir: /d\n  prefix: /disco\n')), 'custom prefix');
    expect(namer.prefix.equals(Path.of('disco'))).toBe(true);
  });
});
