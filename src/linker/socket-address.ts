import { isIP } from 'net';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';

/** A resolved bind address. Port 0 means "any free port". */
export interface SocketAddress {
  readonly ip: string;
  readonly port: number;
}

export const LOOPBACK_IP = '127.0.0.1';
export const WILDCARD_IP = '0.0.0.0';
export const EPHEMERAL_PORT = 0;

const WILDCARDS: ReadonlySet<string> = new Set([WILDCARD_IP, '::']);

export function isWildcard(ip: string): boolean {
  return WILDCARDS.has(ip);
}

const IPV4_MAPPED = /^::ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/;

/**
 * One spelling per address: IPv6 in compressed lowercase form, and
 * IPv4-mapped IPv6 addresses as the IPv4 address they map.
 */
export function canonicalIp(ip: string): string {
  if (isIP(ip) !== 6 || ip.includes('%')) return ip;
  const host = new URL(`http://[${ip}]`).hostname.slice(1, -1);

  const mapped = IPV4_MAPPED.exec(host);
  const hi = mapped?.[1];
  const lo = mapped?.[2];
  if (hi === undefined || lo === undefined) return host;
  return [parseInt(hi, 16), parseInt(lo, 16)].flatMap((word) => [word >> 8, word & 0xff]).join('.');
}

/**
 * Resolve the textual bind IP of a server.
 *
 * Absent means loopback; `any` is an alias for the IPv4 wildcard.
 */
export function resolveIp(text: string | undefined): Result<string, string> {
  if (text === undefined) return ok(LOOPBACK_IP);
  const trimmed = text.trim().toLowerCase();
  if (trimmed === 'any') return ok(WILDCARD_IP);
  if (isIP(trimmed) === 0) return err(text);
  return ok(canonicalIp(trimmed));
}

export function formatAddress(addr: SocketAddress): string {
  return addr.ip.includes(':') ? `[${addr.ip}]:${addr.port}` : `${addr.ip}:${addr.port}`;
}
