/**
 * Purpose: IPv4 address and subnet arithmetic.
 * Intent: Work on big-endian octet tuples so carries across octet boundaries stay exact.
 */

import { MAX_LISTED_SUBNETS } from "../config.js";
import { DomainError } from "../errors.js";

export type Octets = readonly [number, number, number, number];

export interface SubnetInfo {
  network: Octets;
  prefix: number;
  mask: Octets;
  broadcast: Octets;
  firstHost: Octets;
  lastHost: Octets;
  hostCount: number;
}

const DOMAIN = "network";
const ADDRESS_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

function octet(text: string | undefined): number | null {
  if (text === undefined) return null;
  if (text.length > 1 && text.startsWith("0")) return null;
  const n = Number(text);
  return n <= 255 ? n : null;
}

export function parseAddress(text: string): Octets {
  const m = ADDRESS_PATTERN.exec(text.trim());
  const a = octet(m?.[1]);
  const b = octet(m?.[2]);
  const c = octet(m?.[3]);
  const d = octet(m?.[4]);
  if (a === null || b === null || c === null || d === null) {
    throw new DomainError(DOMAIN, "LP_DOMAIN_INVALID_ADDRESS", `invalid IPv4 address: ${text}`);
  }
  return [a, b, c, d];
}

export function formatAddress(o: Octets): string {
  return o.join(".");
}

export function assertPrefix(prefix: number): number {
  if (!Number.isInteger(prefix) || prefix < 0 || prefix > 32) {
    throw new DomainError(DOMAIN, "LP_DOMAIN_INVALID_PREFIX", `invalid prefix length: /${prefix}`);
  }
  return prefix;
}

export function maskOctets(prefix: number): Octets {
  assertPrefix(prefix);
  const byte = (i: number): number => {
    const bits = Math.min(8, Math.max(0, prefix - i * 8));
    return (0xff << (8 - bits)) & 0xff;
  };
  return [byte(0), byte(1), byte(2), byte(3)];
}

export function calculateMask(prefix: number): string {
  return formatAddress(maskOctets(prefix));
}

export function wildcardMask(prefix: number): string {
  const m = maskOctets(prefix);
  return formatAddress([255 - m[0], 255 - m[1], 255 - m[2], 255 - m[3]]);
}

/** Counts the leading one bits; throws when the mask has a one after a zero. */
export function prefixFromMask(mask: string): number {
  const o = parseAddress(mask);
  let prefix = 0;
  let seenZero = false;
  for (const byte of o) {
    for (let bit = 7; bit >= 0; bit--) {
      const set = ((byte >> bit) & 1) === 1;
      if (set && seenZero) {
        throw new DomainError(DOMAIN, "LP_DOMAIN_INVALID_MASK", `non-contiguous mask: ${mask}`);
      }
      if (set) prefix++;
      else seenZero = true;
    }
  }
  return prefix;
}

export function hostsInPrefix(prefix: number): number {
  const hostBits = 32 - assertPrefix(prefix);
  if (hostBits > 1) return 2 ** hostBits - 2;
  return hostBits === 1 ? 2 : 1;
}

/** Adds `offset` (which may exceed 2^31) with carry from the last octet upward, wrapping past 255.255.255.255. */
export function addToAddress(o: Octets, offset: number): Octets {
  const out = [o[0], o[1], o[2], o[3]];
  let carry = offset;
  for (let i = 3; i >= 0 && carry > 0; i--) {
    const sum = (out[i] ?? 0) + (carry % 256);
    out[i] = sum % 256;
    carry = Math.floor(carry / 256) + Math.floor(sum / 256);
  }
  return [out[0] ?? 0, out[1] ?? 0, out[2] ?? 0, out[3] ?? 0];
}

function applyMask(o: Octets, m: Octets): Octets {
  return [o[0] & m[0], o[1] & m[1], o[2] & m[2], o[3] & m[3]];
}

export function subnetInfo(address: Octets, prefix: number): SubnetInfo {
  const mask = maskOctets(prefix);
  const network = applyMask(address, mask);
  const broadcast: Octets = [network[0] | (255 - mask[0]), network[1] | (255 - mask[1]), network[2] | (255 - mask[2]), network[3] | (255 - mask[3])];
  const hostBits = 32 - prefix;

  let firstHost = network;
  let lastHost = network;
  if (hostBits > 1) {
    firstHost = [network[0], network[1], network[2], network[3] + 1];
    lastHost = [broadcast[0], broadcast[1], broadcast[2], broadcast[3] - 1];
  }

  return { network, prefix, mask, broadcast, firstHost, lastHost, hostCount: hostsInPrefix(prefix) };
}

/** Parses `A.B.C.D/n`, masking the address down to its network. */
export function parseCidr(text: string): SubnetInfo {
  const trimmed = text.trim();
  const slash = trimmed.indexOf("/");
  const prefixText = trimmed.slice(slash + 1);
  if (slash === -1 || !/^\d{1,2}$/.test(prefixText)) {
    throw new DomainError(DOMAIN, "LP_DOMAIN_INVALID_CIDR", `invalid CIDR: ${text}`);
  }
  const prefix = Number(prefixText);
  if (prefix > 32) throw new DomainError(DOMAIN, "LP_DOMAIN_INVALID_CIDR", `invalid CIDR: ${text}`);
  return subnetInfo(parseAddress(trimmed.slice(0, slash)), prefix);
}

export function formatCidr(info: Pick<SubnetInfo, "network" | "prefix">): string {
  return `${formatAddress(info.network)}/${info.prefix}`;
}

function listSubnets(base: SubnetInfo, newPrefix: number): SubnetInfo[] {
  const count = 2 ** (newPrefix - base.prefix);
  if (count > MAX_LISTED_SUBNETS) {
    throw new DomainError(
      DOMAIN,
      "LP_DOMAIN_TOO_MANY_SUBNETS",
      `split would list ${count} subnets (limit ${MAX_LISTED_SUBNETS})`
    );
  }
  const size = 2 ** (32 - newPrefix);
  const out: SubnetInfo[] = [];
  for (let i = 0; i < count; i++) out.push(subnetInfo(addToAddress(base.network, i * size), newPrefix));
  return out;
}

export function splitToSubnets(cidr: string, count: number): SubnetInfo[] {
  const base = parseCidr(cidr);
  if (!Number.isInteger(count) || count < 1) {
    throw new DomainError(DOMAIN, "LP_DOMAIN_SPLIT_INFEASIBLE", `cannot split into ${count} subnets`);
  }
  const newPrefix = base.prefix + Math.ceil(Math.log2(count));
  if (newPrefix > 32) {
    throw new DomainError(DOMAIN, "LP_DOMAIN_SPLIT_INFEASIBLE", `cannot split /${base.prefix} into ${count} subnets`);
  }
  return listSubnets(base, newPrefix);
}

export function splitByHostCount(cidr: string, hosts: number): SubnetInfo[] {
  const base = parseCidr(cidr);
  if (!Number.isInteger(hosts) || hosts < 0) {
    throw new DomainError(DOMAIN, "LP_DOMAIN_SPLIT_INFEASIBLE", `invalid host count: ${hosts}`);
  }
  const hostBits = Math.max(2, Math.ceil(Math.log2(hosts + 2)));
  const newPrefix = 32 - hostBits;
  if (newPrefix < base.prefix) {
    throw new DomainError(
      DOMAIN,
      "LP_DOMAIN_SPLIT_INFEASIBLE",
      `/${base.prefix} is too small for subnets of ${hosts} hosts`
    );
  }
  return listSubnets(base, newPrefix);
}

export function addressInRange(address: string, cidr: string): boolean {
  const info = parseCidr(cidr);
  const masked = applyMask(parseAddress(address), info.mask);
  return masked.every((byte, i) => byte === info.network[i]);
}

export function nextSubnet(cidr: string): string {
  const info = parseCidr(cidr);
  const next = addToAddress(info.network, 2 ** (32 - info.prefix));
  return `${formatAddress(next)}/${info.prefix}`;
}

export function formatSubnetInfo(info: SubnetInfo): string {
  return [
    `Network: ${formatCidr(info)}`,
    `Mask: ${formatAddress(info.mask)}`,
    `Hosts: ${info.hostCount}`,
    `Range: ${formatAddress(info.firstHost)} - ${formatAddress(info.lastHost)}`,
    `Broadcast: ${formatAddress(info.broadcast)}`,
  ].join("\n");
}

export function formatSubnetList(subnets: readonly SubnetInfo[]): string {
  return subnets.map((s, i) => `${i + 1}: ${formatCidr(s)} [${s.hostCount}h]`).join("\n");
}
