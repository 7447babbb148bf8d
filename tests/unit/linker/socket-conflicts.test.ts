import { describe, it, expect } from 'vitest';
import { conflicts, findSocketConflicts } from '../../../src/linker/socket-conflicts.js';
import { formatAddress, isWildcard, resolveIp } from '../../../src/linker/socket-address.js';
import type { SocketAddress } from '../../../src/linker/socket-address.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

const addr = (ip: string, port: number): SocketAddress => ({ ip, port });

describe('conflicts', () => {
  const cases: readonly [SocketAddress, SocketAddress, boolean][] = [
    [addr('127.0.0.1', 4140), addr('127.0.0.1', 4140), true],
    [addr('127.0.0.1', 4140), addr('127.0.0.1', 4141), false],
    [addr('127.0.0.1', 4140), addr('10.0.0.1', 4140), false],
    [addr('0.0.0.0', 4140), addr('10.0.0.1', 4140), true],
    [addr('::', 4140), addr('10.0.0.1', 4140), true],
    [addr('0.0.0.0', 0), addr('0.0.0.0', 0), false],
    [addr('127.0.0.1', 0), addr('127.0.0.1', 0), false],
  ];

  it.each(cases)('%o vs %o => %s', (a, b, expected) => {
    expect(conflicts(a, b)).toBe(expected);
  });

  it.each(cases)('is symmetric for %o and %o', (a, b) => {
    expect(conflicts(a, b)).toBe(conflicts(b, a));
  });
});

describe('findSocketConflicts', () => {
  it('reports admitted addresses before same-router ones, earlier address first', () => {
    const errors = findSocketConflicts(
      [
        { addr: addr('127.0.0.1', 8080), location: 'routers[1].servers[0]' },
        { addr: addr('127.0.0.1', 8080), location: 'routers[1].servers[1]' },
      ],
      [addr('0.0.0.0', 8080)],
    );

    expect(errors.map((e) => e._tag)).toEqual(['ConflictingPorts', 'ConflictingPorts', 'ConflictingServers']);
    expect(errors[2]).toEqual({
      _tag: 'ConflictingServers',
      first: addr('127.0.0.1', 8080),
      second: addr('127.0.0.1', 8080),
      location: 'routers[1].servers[1]',
      message: 'routers[1].servers[1]: servers of the same router conflict: 127.0.0.1:8080, 127.0.0.1:8080',
    });
    expect(errors[0]?.message).toBe('routers[1].servers[0]: conflicting servers: 0.0.0.0:8080, 127.0.0.1:8080');
  });

  it('finds nothing for distinct or ephemeral ports', () => {
    expect(
      findSocketConflicts(
        [
          { addr: addr('127.0.0.1', 0), location: 'a' },
          { addr: addr('127.0.0.1', 0), location: 'b' },
          { addr: addr('127.0.0.1', 9000), location: 'c' },
        ],
        [addr('127.0.0.1', 0), addr('127.0.0.1', 9001)],
      ),
    ).toEqual([]);
  });
});

describe('socket addresses', () => {
  it('defaults to loopback and maps "any" to the wildcard', () => {
    expect(expectOk(resolveIp(undefined), 'absent ip')).toBe('127.0.0.1');
    expect(expectOk(resolveIp('any'), 'any')).toBe('0.0.0.0');
    expect(expectOk(resolveIp('::1'), 'ipv6 loopback')).toBe('::1');
  });

  it.each([
    ['0:0:0:0:0:0:0:0', '::'],
    ['::0', '::'],
    ['0:0:0:0:0:0:0:1', '::1'],
    ['2001:DB8:0:0:0:0:0:1', '2001:db8::1'],
    ['::ffff:127.0.0.1', '127.0.0.1'],
    ['::FFFF:0.0.0.0', '0.0.0.0'],
    ['::ffff:7f00:1', '127.0.0.1'],
  ])('spells %s as %s', (text, canonical) => {
    expect(expectOk(resolveIp(text), text)).toBe(canonical);
  });

  it('finds conflicts between different spellings of one address', () => {
    const at = (text: string, port: number): SocketAddress => ({ ip: expectOk(resolveIp(text), text), port });

    expect(conflicts(at('0:0:0:0:0:0:0:0', 8080), at('10.0.0.1', 8080))).toBe(true);
    expect(conflicts(at('::1', 8080), at('0:0:0:0:0:0:0:1', 8080))).toBe(true);
    expect(conflicts(at('::ffff:127.0.0.1', 8080), at('127.0.0.1', 8080))).toBe(true);
    expect(conflicts(at('::ffff:0.0.0.0', 8080), at('10.0.0.1', 8080))).toBe(true);
  });

  it('rejects host names and malformed addresses', () => {
    expect(expectErr(resolveIp('localhost'), 'host name')).toBe('localhost');
    expect(expectErr(resolveIp('300.1.1.1'), 'out of range octet')).toBe('300.1.1.1');
  });

  it('recognizes both wildcards', () => {
    expect(isWildcard('0.0.0.0')).toBe(true);
    expect(isWildcard('::')).toBe(true);
    expect(isWildcard('127.0.0.1')).toBe(false);
  });

  it('brackets IPv6 addresses', () => {
    expect(formatAddress(addr('::1', 80))).toBe('[::1]:80');
    expect(formatAddress(addr('10.0.0.1', 80))).toBe('10.0.0.1:80');
  });
});
