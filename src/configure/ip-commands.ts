/**
 * Linux `ip` command lines and parsers for their JSON output.
 *
 * Read-only queries run unprivileged; every mutating command goes through
 * sudo.
 */

import { normalizeAddress } from '../topology/addressing';

export interface LinkAddress {
  family: 4 | 6;
  address: string;
  prefix: number;
  scope?: string;
}

export interface LinkInfo {
  name: string;
  mac?: string;
  /** Administratively up. */
  up: boolean;
  addresses: LinkAddress[];
}

export interface RouteInfo {
  dst: string;
  gateway?: string;
  dev?: string;
}

export const IP_COMMANDS = {
  listAddresses: 'ip -j addr list',
  listRoutes: (family: 4 | 6) => (family === 6 ? 'ip -6 -j route list' : 'ip -j route list'),
  linkUp: (device: string) => `sudo ip link set dev ${device} up`,
  flushAddresses: (device: string) => `sudo ip addr flush dev ${device}`,
  addVlan: (device: string, vlan: number) => `sudo ip link add link ${device} name ${device}.${vlan} type vlan id ${vlan}`,
  addAddress: (address: string, prefix: number, device: string) => `sudo ip addr add ${address}/${prefix} dev ${device}`,
  addRoute: (subnet: string, gateway: string) => `sudo ip route add ${subnet} via ${gateway}`,
  markerExists: (marker: string) => `test -f ${marker}`,
  touchMarker: (marker: string) => `touch ${marker}`,
} as const;

/** Parse `ip -j addr list`. */
export function parseAddrList(stdout: string): LinkInfo[] {
  return parseJsonArray(stdout, 'ip addr list').flatMap((entry): LinkInfo[] => {
    if (!isRecord(entry) || typeof entry.ifname !== 'string') return [];
    const flags = Array.isArray(entry.flags) ? entry.flags : [];
    const addrInfo = Array.isArray(entry.addr_info) ? entry.addr_info : [];
    return [
      {
        name: entry.ifname,
        mac: typeof entry.address === 'string' ? entry.address.toLowerCase() : undefined,
        up: flags.includes('UP'),
        addresses: addrInfo.flatMap(parseAddress),
      },
    ];
  });
}

/** Parse `ip -j route list` (either family). */
export function parseRouteList(stdout: string): RouteInfo[] {
  return parseJsonArray(stdout, 'ip route list').flatMap((entry): RouteInfo[] => {
    if (!isRecord(entry) || typeof entry.dst !== 'string') return [];
    return [
      {
        dst: entry.dst,
        gateway: typeof entry.gateway === 'string' ? entry.gateway : undefined,
        dev: typeof entry.dev === 'string' ? entry.dev : undefined,
      },
    ];
  });
}

/** Device carrying the default route, which is the management interface. */
export function managementDevice(routes: readonly RouteInfo[]): string | undefined {
  return routes.find((r) => r.dst === 'default')?.dev;
}

export function findLinkByMac(links: readonly LinkInfo[], mac: string): LinkInfo | undefined {
  const wanted = mac.toLowerCase();
  // VLAN sub-interfaces share their parent's MAC; prefer the parent.
  return links.find((l) => l.mac === wanted && !l.name.includes('.')) ?? links.find((l) => l.mac === wanted);
}

/** Addresses other than IPv6 link-local ones. */
export function configuredAddresses(link: LinkInfo): LinkAddress[] {
  return link.addresses.filter((a) => a.scope !== 'link');
}

export function sameAddress(entry: LinkAddress, address: string, prefix: number): boolean {
  return entry.prefix === prefix && normalizeAddress(entry.address) === normalizeAddress(address);
}

export function hasAddress(link: LinkInfo, address: string, prefix: number): boolean {
  return link.addresses.some((a) => sameAddress(a, address, prefix));
}

function parseAddress(entry: unknown): LinkAddress[] {
  if (!isRecord(entry) || typeof entry.local !== 'string' || typeof entry.prefixlen !== 'number') return [];
  const family = entry.family === 'inet6' ? 6 : entry.family === 'inet' ? 4 : undefined;
  if (!family) return [];
  return [
    {
      family,
      address: entry.local,
      prefix: entry.prefixlen,
      scope: typeof entry.scope === 'string' ? entry.scope : undefined,
    },
  ];
}

function parseJsonArray(stdout: string, what: string): unknown[] {
  const trimmed = stdout.trim();
  if (trimmed === '') return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (err) {
    throw new Error(`Could not parse ${what} output: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!Array.isArray(parsed)) throw new Error(`Expected a JSON array from ${what}`);
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
