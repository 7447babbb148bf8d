import { describe, it, expect } from 'vitest';
import { Path } from '../../../src/naming/path.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

describe('Path', () => {
  describe('read', () => {
    it('reads segments', () => {
      const path = expectOk(Path.read('/http/1.1/GET'), 'reading a plain path');
      expect(path.segments).toEqual(['http', '1.1', 'GET']);
      expect(path.show()).toBe('/http/1.1/GET');
    });

    it('reads "/" as the empty path', () => {
      const path = expectOk(Path.read('/'), 'reading the root');
      expect(path.isEmpty).toBe(true);
      expect(path.show()).toBe('/');
    });

    it('decodes hex escapes and shows them again', () => {
      const path = expectOk(Path.read('/a\\x20b'), 'reading an escaped space');
      expect(path.segments).toEqual(['a b']);
      expect(path.show()).toBe('/a\\x20b');
    });

    it('decodes multi-byte escapes as one character', () => {
      const path = expectOk(Path.read('/caf\\xc3\\xa9'), 'reading an escaped e-acute');
      expect(path.segments).toEqual(['caf\u00e9']);
      expect(path.show()).toBe('/caf\\xc3\\xa9');
    });

    it('rejects escapes that are not UTF-8', () => {
      expect(expectErr(Path.read('/\\xfe'), 'lone 0xfe')).toBe('escapes in the segment at offset 1 are not valid UTF-8');
      expect(expectErr(Path.read('/ok/a\\xc3'), 'truncated sequence')).toBe(
        'escapes in the segment at offset 4 are not valid UTF-8',
      );
    });

    it('rejects an empty segment', () => {
      expect(expectErr(Path.read('/a//b'), 'double slash')).toBe('empty path segment at offset 2');
    });

    it('rejects text without a leading slash', () => {
      expect(expectErr(Path.read(''), 'empty text')).toBe('expected a path, found end of input');
      expect(expectErr(Path.read('svc'), 'relative text')).toBe("expected '/' at offset 0");
    });

    it('rejects trailing characters', () => {
      expect(expectErr(Path.read('/a b'), 'space in path')).toBe("unexpected ' ' at offset 2");
    });

    it('rejects a malformed escape', () => {
      expect(expectErr(Path.read('/a\\xZZ'), 'bad escape')).toBe('invalid escape at offset 2');
    });
  });

  it('of drops empty segments', () => {
    expect(Path.of('', 'a', '', 'b').show()).toBe('/a/b');
    expect(Path.of('', '').isEmpty).toBe(true);
  });

  it('startsWith compares whole segments', () => {
    const path = Path.of('boo', 'urns');
    expect(path.startsWith(Path.of('boo'))).toBe(true);
    expect(path.startsWith(Path.of('bo'))).toBe(false);
    expect(path.startsWith(Path.empty)).toBe(true);
    expect(Path.of('boo').startsWith(path)).toBe(false);
  });

  it('take, drop and concat', () => {
    const path = Path.of('a', 'b', 'c');
    expect(path.take(2).show()).toBe('/a/b');
    expect(path.drop(1).show()).toBe('/b/c');
    expect(path.drop(5).isEmpty).toBe(true);
    expect(Path.of('x').concat(path).show()).toBe('/x/a/b/c');
    expect(path.concat(Path.empty)).toBe(path);
  });

  it('equals', () => {
    expect(Path.of('a', 'b').equals(Path.of('a', 'b'))).toBe(true);
    expect(Path.of('a', 'b').equals(Path.of('a'))).toBe(false);
  });
});
