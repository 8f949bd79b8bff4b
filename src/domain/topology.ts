/**
 * Topology domain model.
 *
 * Fixed-shape records for every entity of a slice. Fields fall in two groups:
 * desired fields, written by the builder operations before submission, and
 * authoritative fields (reservation, addresses, MAC, PCI address), written
 * only by the Reconciler. Records handed out by the graph are read-only
 * copies.
 */

import { ReservationInfo, SliceState } from './reservation';

export enum NetworkServiceType {
  L2Bridge = 'L2Bridge',
  L2PTP = 'L2PTP',
  L2STS = 'L2STS',
  FABNetv4 = 'FABNetv4',
  FABNetv6 = 'FABNetv6',
  FABNetv4Ext = 'FABNetv4Ext',
  FABNetv6Ext = 'FABNetv6Ext',
  L3VPN = 'L3VPN',
  FacilityPort = 'FacilityPort',
}

export type NetworkLayer = 'L2' | 'L3';

export const NETWORK_SERVICE_LAYERS: Record<NetworkServiceType, NetworkLayer> = {
  [NetworkServiceType.L2Bridge]: 'L2',
  [NetworkServiceType.L2PTP]: 'L2',
  [NetworkServiceType.L2STS]: 'L2',
  [NetworkServiceType.FABNetv4]: 'L3',
  [NetworkServiceType.FABNetv6]: 'L3',
  [NetworkServiceType.FABNetv4Ext]: 'L3',
  [NetworkServiceType.FABNetv6Ext]: 'L3',
  [NetworkServiceType.L3VPN]: 'L3',
  [NetworkServiceType.FacilityPort]: 'L2',
};

const IPV6_SERVICE_TYPES = new Set<NetworkServiceType>([
  NetworkServiceType.FABNetv6,
  NetworkServiceType.FABNetv6Ext,
]);

export function isIpv6ServiceType(type: NetworkServiceType): boolean {
  return IPV6_SERVICE_TYPES.has(type);
}

const NETWORK_SERVICE_TYPE_VALUES = new Set<string>(Object.values(NetworkServiceType));

export function isNetworkServiceType(value: unknown): value is NetworkServiceType {
  return typeof value === 'string' && NETWORK_SERVICE_TYPE_VALUES.has(value);
}

export type ComponentType = 'SharedNIC' | 'SmartNIC' | 'GPU' | 'NVME' | 'FPGA' | 'Storage';

export interface Capacity {
  cores: number;
  ramGb: number;
  diskGb: number;
}

/** A static route configured after boot. */
export interface RouteSpec {
  /** Destination CIDR, or the name of an L3 network service whose subnet to use. */
  subnet: string;
  /** Gateway address, or the name of an L3 network service whose gateway to use. */
  nextHop: string;
}

export type PostBootTask =
  | { kind: 'execute'; command: string }
  | { kind: 'upload'; localPath: string; remotePath: string };

export interface NodeRecord {
  readonly name: string;
  readonly site: string;
  readonly host?: string;
  readonly image: string;
  readonly capacity?: Readonly<Capacity>;
  readonly instanceType?: string;
  /** Login user; defaults from the image table. */
  readonly username?: string;
  readonly components: readonly string[];
  readonly routes: readonly RouteSpec[];
  readonly postBootTasks: readonly PostBootTask[];
  readonly reservation: Readonly<ReservationInfo>;
  readonly managementIp?: string;
}

export interface ComponentRecord {
  readonly name: string;
  readonly shortName: string;
  readonly node: string;
  readonly model: string;
  readonly type: ComponentType;
  readonly units: number;
  readonly interfaces: readonly string[];
  readonly reservation: Readonly<ReservationInfo>;
  readonly pciAddress?: string;
}

export interface InterfaceRecord {
  readonly name: string;
  readonly node: string;
  readonly component: string;
  readonly port: number;
  readonly bandwidthGbps: number;
  /** VLAN tag requested by the user. */
  readonly vlan?: number;
  /** Address chosen by the user; otherwise one is allocated from the service subnet. */
  readonly ipAddress?: string;
  readonly networkService?: string;
  readonly reservation: Readonly<ReservationInfo>;
  readonly mac?: string;
  /** VLAN tag assigned by the orchestrator (facility ports, auto-tagged services). */
  readonly assignedVlan?: number;
  /** Addresses present on the interface after post-boot configuration. */
  readonly configuredAddresses?: readonly string[];
}

export interface NetworkServiceRecord {
  readonly name: string;
  readonly type: NetworkServiceType;
  readonly layer: NetworkLayer;
  readonly interfaces: readonly string[];
  /** User subnet for L2 services, used for address allocation. */
  readonly userSubnet?: string;
  /** Explicit route (ordered site list) for ERO-routed point-to-point services. */
  readonly ero?: readonly string[];
  /** External facility a FacilityPort service connects to. */
  readonly facility?: string;
  readonly reservation: Readonly<ReservationInfo>;
  readonly subnet?: string;
  readonly gateway?: string;
}

/** Public half of the slice key pair plus a reference to the private half. */
export interface SliceKeyPair {
  publicKey: string;
  privateKeyFile: string;
  passphrase?: string;
}

export interface SliceInfo {
  readonly name: string;
  readonly projectId: string;
  readonly sliceId?: string;
  readonly state: SliceState;
  readonly leaseStart?: string;
  readonly leaseEnd?: string;
}

/** Every entity kind tracked in the graph. */
export type EntityKind = 'node' | 'component' | 'interface' | 'network service';
