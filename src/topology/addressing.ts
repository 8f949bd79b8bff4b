/**
 * Subnet arithmetic for address allocation and validation.
 */

import * as ipaddr from 'ipaddr.js';

export interface ParsedSubnet {
  family: 4 | 6;
  prefix: number;
  network: bigint;
  /** Address width in bits: 32 or 128. */
  width: number;
}

export function isValidAddress(address: string): boolean {
  return ipaddr.isValid(address);
}

/** Canonical text form of an address, or undefined when it does not parse. */
export function normalizeAddress(address: string): string | undefined {
  if (!ipaddr.isValid(address)) return undefined;
  return ipaddr.parse(address).toString();
}

export function parseSubnet(cidr: string): ParsedSubnet | undefined {
  let parsed: [ipaddr.IPv4 | ipaddr.IPv6, number];
  try {
    parsed = ipaddr.parseCIDR(cidr);
  } catch {
    return undefined;
  }
  const [address, prefix] = parsed;
  const width = address.kind() === 'ipv4' ? 32 : 128;
  const mask = ((1n << BigInt(prefix)) - 1n) << BigInt(width - prefix);
  return {
    family: width === 32 ? 4 : 6,
    prefix,
    network: toBigInt(address.toByteArray()) & mask,
    width,
  };
}

export function isAddressInSubnet(address: string, cidr: string): boolean {
  const subnet = parseSubnet(cidr);
  if (!subnet || !ipaddr.isValid(address)) return false;
  const parsed = ipaddr.parse(address);
  if ((parsed.kind() === 'ipv4' ? 4 : 6) !== subnet.family) return false;
  const hostBits = BigInt(subnet.width - subnet.prefix);
  return toBigInt(parsed.toByteArray()) >> hostBits === subnet.network >> hostBits;
}

/**
 * The first `count` usable host addresses of a subnet, in ascending order,
 * skipping the network address, the IPv4 broadcast address and anything in
 * `exclude`. Returns fewer when the subnet runs out.
 */
export function allocateHosts(cidr: string, count: number, exclude: Iterable<string> = []): string[] {
  const subnet = parseSubnet(cidr);
  if (!subnet || count <= 0) return [];

  const skip = new Set<string>();
  for (const address of exclude) {
    const normalized = normalizeAddress(address);
    if (normalized) skip.add(normalized);
  }

  const size = 1n << BigInt(subnet.width - subnet.prefix);
  const last = subnet.family === 4 && size > 2n ? size - 2n : size - 1n;
  const hosts: string[] = [];
  for (let offset = 1n; offset <= last && hosts.length < count; offset++) {
    const address = fromBigInt(subnet.network + offset, subnet.width);
    if (!skip.has(address)) hosts.push(address);
  }
  return hosts;
}

/** A CIDR in the form `ip route` prints it: network address and prefix. */
export function canonicalSubnet(cidr: string): string | undefined {
  const subnet = parseSubnet(cidr);
  if (!subnet) return undefined;
  return `${fromBigInt(subnet.network, subnet.width)}/${subnet.prefix}`;
}

/** Prefix length of a CIDR string. */
export function prefixLength(cidr: string): number | undefined {
  return parseSubnet(cidr)?.prefix;
}

function toBigInt(bytes: number[]): bigint {
  let value = 0n;
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte);
  }
  return value;
}

function fromBigInt(value: bigint, width: number): string {
  const bytes: number[] = [];
  let remaining = value;
  for (let i = 0; i < width / 8; i++) {
    bytes.unshift(Number(remaining & 0xffn));
    remaining >>= 8n;
  }
  return ipaddr.fromByteArray(bytes).toString();
}
