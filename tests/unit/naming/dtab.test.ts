import { describe, it, expect } from 'vitest';
import { Dtab } from '../../../src/naming/dtab.js';
import { Path } from '../../../src/naming/path.js';
import { NameTrees, showTree } from '../../../src/naming/name-tree.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

const read = (text: string): Dtab => expectOk(Dtab.read(text), `reading dtab ${text}`);
const path = (text: string): Path => expectOk(Path.read(text), `reading path ${text}`);

describe('Dtab.read', () => {
  it('reads dentries separated by semicolons', () => {
    const dtab = read('/svc => /fs; /fs/legacy => /fs/current;');
    expect(dtab.size).toBe(2);
    expect(dtab.show()).toBe('/svc=>/fs;/fs/legacy=>/fs/current');
  });

  it('reads the empty dtab', () => {
    expect(read('').size).toBe(0);
    expect(read('   ').size).toBe(0);
  });

  it('reads alternatives, weights and terminals', () => {
    expect(read('/a => /b | /c').show()).toBe('/a=>/b | /c');
    expect(read('/a => 2*/b & /c').show()).toBe('/a=>2*/b & 1*/c');
    expect(read('/a => 0.5 * /b & 1.5*/c').show()).toBe('/a=>0.5*/b & 1.5*/c');
    expect(read('/a => ~ | ! | $').show()).toBe('/a=>~ | ! | $');
    expect(read('/a => (/b | /c) & /d').show()).toBe('/a=>1*(/b | /c) & 1*/d');
  });

  it('reports the first syntax problem', () => {
    expect(expectErr(Dtab.read('/a'), 'missing arrow')).toBe("expected '=>', found end of input");
    expect(expectErr(Dtab.read('/a=>/b /c=>/d'), 'missing separator')).toBe("expected ';' at offset 7, found '/'");
    expect(expectErr(Dtab.read('/a=>(/b'), 'unclosed group')).toBe("expected ')', found end of input");
    expect(expectErr(Dtab.read('a=>/b'), 'relative prefix')).toBe("expected '/' at offset 0");
  });
});

describe('Dtab.lookup', () => {
  it('is negative when no prefix matches', () => {
    expect(read('/svc => /fs').lookup(path('/other/x'))).toEqual(NameTrees.neg);
  });

  it('rewrites the matched prefix and keeps the rest', () => {
    const tree = read('/svc => /fs').lookup(path('/svc/users/v1'));
    expect(showTree(tree, (p) => p.show())).toBe('/fs/users/v1');
  });

  it('tries later dentries first', () => {
    const tree = read('/svc => /a; /svc/x => /b').lookup(path('/svc/x/y'));
    expect(showTree(tree, (p) => p.show())).toBe('/b/y | /a/x/y');
  });

  it('matches the empty prefix against every path', () => {
    const tree = read('/ => /root').lookup(path('/x'));
    expect(showTree(tree, (p) => p.show())).toBe('/root/x');
  });
});

it('concat appends the other dtab after this one', () => {
  const combined = read('/a => /b').concat(read('/c => /d'));
  expect(combined.show()).toBe('/a=>/b;/c=>/d');
  expect(Dtab.empty.concat(combined)).toBe(combined);
});
