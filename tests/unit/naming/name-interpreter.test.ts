import { describe, it, expect } from 'vitest';
import {
  composeNamers,
  createNameInterpreter,
  MAX_BIND_REWRITES,
  negativeNamer,
} from '../../../src/naming/name-interpreter.js';
import type { BoundName, Namer, PrefixedNamer } from '../../../src/naming/name-interpreter.js';
import { Dtab } from '../../../src/naming/dtab.js';
import { Path } from '../../../src/naming/path.js';
import { NameTrees, leaves, showTree } from '../../../src/naming/name-tree.js';
import type { NameTree } from '../../../src/naming/name-tree.js';
import { ResolutionStream } from '../../../src/naming/resolution-stream.js';
import { expectOk } from '../../helpers/result-helpers.js';

const path = (text: string): Path => expectOk(Path.read(text), `reading path ${text}`);
const dtab = (text: string): Dtab => expectOk(Dtab.read(text), `reading dtab ${text}`);

/** Binds every path it sees to its own prefix, keeping the path as residual. */
function prefixNamer(prefixText: string): PrefixedNamer {
  const prefix = path(prefixText);
  return {
    prefix,
    namer: {
      lookup: (residual) =>
        ResolutionStream.of<NameTree<BoundName>>(NameTrees.leaf({ id: prefix, residual, addresses: [] })),
    },
  };
}

const showBound = (tree: NameTree<BoundName> | undefined): string =>
  tree === undefined ? '(none)' : showTree(tree, (b) => `${b.id.show()}+${b.residual.show()}`);

describe('composeNamers', () => {
  it('lets the namer declared last win when prefixes overlap', () => {
    const namer = composeNamers([prefixNamer('/boo/urns'), prefixNamer('/boo')]);
    expect(showBound(namer.lookup(path('/boo/urns')).sample())).toBe('/boo+/urns');
  });

  it('reversed declaration binds under the longer prefix', () => {
    const namer = composeNamers([prefixNamer('/boo'), prefixNamer('/boo/urns')]);
    expect(showBound(namer.lookup(path('/boo/urns')).sample())).toBe('/boo/urns+/');
  });

  it('lets a namer at the root catch every path a later namer leaves', () => {
    const namer = composeNamers([prefixNamer('/'), prefixNamer('/boo')]);
    expect(showBound(namer.lookup(path('/other/x')).sample())).toBe('/+/other/x');
    expect(showBound(namer.lookup(path('/boo/x')).sample())).toBe('/boo+/x');
  });

  it('passes unmatched paths down to the negative namer', () => {
    const namer = composeNamers([prefixNamer('/boo')]);
    expect(namer.lookup(path('/other')).sample()).toEqual(NameTrees.neg);
  });

  it('is the negative namer when empty', () => {
    expect(composeNamers([]).lookup(path('/x')).sample()).toEqual(negativeNamer.lookup(path('/x')).sample());
  });
});

describe('createNameInterpreter', () => {
  const interpreter = createNameInterpreter(composeNamers([prefixNamer('/boo')]));

  it('hands paths no dentry matches to the namer', () => {
    expect(showBound(interpreter.bind(Dtab.empty, path('/boo/x')).sample())).toBe('/boo+/x');
  });

  it('rewrites through the dtab first', () => {
    expect(showBound(interpreter.bind(dtab('/svc => /boo'), path('/svc/users')).sample())).toBe('/boo+/users');
  });

  it('falls back across alternatives that resolve negatively', () => {
    const bound = interpreter.bind(dtab('/svc => /missing | /boo'), path('/svc/x')).sample();
    expect(showBound(bound)).toBe('/boo+/x');
  });

  it('keeps union weights', () => {
    const bound = interpreter.bind(dtab('/svc => 3*/boo/a & /boo/b'), path('/svc')).sample();
    expect(showBound(bound)).toBe('3*/boo+/a & 1*/boo+/b');
  });

  it('fails a binding that rewrites forever', () => {
    const bound = interpreter.bind(dtab('/a => /b; /b => /a'), path('/a')).sample();
    expect(bound).toEqual(NameTrees.fail);
  });

  it('fails a binding that branches back into itself', () => {
    expect(interpreter.bind(dtab('/a => /a | /a'), path('/a')).sample()).toEqual(NameTrees.fail);
  });

  it('binds nothing through a union that branches back into itself', () => {
    const bound = interpreter.bind(dtab('/a => /a & /b'), path('/a')).sample();
    expect(bound?.kind).toBe('union');
    expect(leaves(bound ?? NameTrees.neg)).toEqual([]);
  });

  it('shares one rewrite budget across every branch', () => {
    let lookups = 0;
    const counting = createNameInterpreter({
      lookup: () => {
        lookups++;
        return ResolutionStream.of<NameTree<BoundName>>(NameTrees.neg);
      },
    });
    counting.bind(dtab('/a => /b | /a'), path('/a')).sample();
    // each rewrite but the last leaves budget for its /b branch
    expect(lookups).toBe(MAX_BIND_REWRITES - 1);
  });

  it('keeps failure from the dtab', () => {
    expect(interpreter.bind(dtab('/svc => !'), path('/svc/x')).sample()).toEqual(NameTrees.fail);
  });

  it('follows every state the namer produces', () => {
    const counting: Namer = {
      lookup: (residual) =>
        ResolutionStream.of<NameTree<BoundName>>(
          NameTrees.neg,
          NameTrees.leaf({ id: path('/live'), residual, addresses: [{ ip: '10.0.0.1', port: 8080 }] }),
        ),
    };
    const live = createNameInterpreter(composeNamers([{ prefix: path('/live'), namer: counting }]));
    const states = live.bind(Dtab.empty, path('/live/svc')).take(5);
    expect(states.map(showBound)).toEqual(['~', '/live+/svc']);
  });

  it('does no work until sampled', () => {
    let lookups = 0;
    const spying = createNameInterpreter({
      lookup: () => {
        lookups++;
        return ResolutionStream.of<NameTree<BoundName>>(NameTrees.neg);
      },
    });
    const stream = spying.bind(Dtab.empty, path('/x'));
    expect(lookups).toBe(0);
    stream.sample();
    expect(lookups).toBe(1);
  });
});
