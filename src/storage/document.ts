/**
 * Persisted slice document.
 *
 * A JSON document keyed by entity name, holding the desired graph, every
 * authoritative field and the last snapshot, so a new process can resume
 * waiting or configuring without resubmitting. Field names follow the
 * snake_case style of the testbed's own saved topologies.
 */

import { StateFileError } from '../domain/errors';
import {
  ReservationInfo,
  isReservationState,
  isSliceState,
} from '../domain/reservation';
import {
  ComponentObservation,
  EntityObservation,
  InterfaceObservation,
  NetworkServiceObservation,
  NodeObservation,
  TopologySnapshot,
} from '../domain/snapshot';
import {
  ComponentRecord,
  InterfaceRecord,
  NetworkServiceRecord,
  NodeRecord,
  NETWORK_SERVICE_LAYERS,
  PostBootTask,
  RouteSpec,
  isNetworkServiceType,
} from '../domain/topology';
import { CapabilityCatalog, isComponentType } from '../topology/catalog';
import { GraphRecords, TopologyGraph } from '../topology/graph';
import { Slice } from '../topology/slice';

export const SLICE_DOCUMENT_VERSION = 1;

export interface ReservationDocument {
  reservation_id?: string;
  state: string;
  error_message?: string;
}

export interface InterfaceDocument {
  component: string;
  port: number;
  bandwidth_gbps: number;
  vlan?: number;
  ip_address?: string;
  network_service?: string;
  reservation: ReservationDocument;
  mac?: string;
  assigned_vlan?: number;
  configured_addresses?: string[];
}

export interface ComponentDocument {
  short_name: string;
  model: string;
  type: string;
  units: number;
  interfaces: string[];
  reservation: ReservationDocument;
  pci_address?: string;
}

export interface NodeDocument {
  site: string;
  host?: string;
  image: string;
  capacity?: { cores: number; ram_gb: number; disk_gb: number };
  instance_type?: string;
  username?: string;
  routes: RouteSpec[];
  post_boot_tasks: PostBootTask[];
  reservation: ReservationDocument;
  management_ip?: string;
  components: Record<string, ComponentDocument>;
  interfaces: Record<string, InterfaceDocument>;
}

export interface NetworkServiceDocument {
  type: string;
  interfaces: string[];
  user_subnet?: string;
  ero?: string[];
  facility?: string;
  reservation: ReservationDocument;
  subnet?: string;
  gateway?: string;
}

export interface SliceDocument {
  version: number;
  slice: {
    name: string;
    project_id: string;
    slice_id?: string;
    state: string;
    lease_start?: string;
    lease_end?: string;
    submitted: boolean;
    keys?: { public_key: string; private_key_file: string };
  };
  nodes: Record<string, NodeDocument>;
  network_services: Record<string, NetworkServiceDocument>;
  last_snapshot?: TopologySnapshot;
}

// --- Writing ---

export function toDocument(slice: Slice): SliceDocument {
  const records = slice.graph.toRecords();
  const nodes: Record<string, NodeDocument> = {};
  for (const node of records.nodes) {
    const components: Record<string, ComponentDocument> = {};
    const interfaces: Record<string, InterfaceDocument> = {};
    for (const component of records.components.filter((c) => c.node === node.name)) {
      components[component.name] = {
        short_name: component.shortName,
        model: component.model,
        type: component.type,
        units: component.units,
        interfaces: [...component.interfaces],
        reservation: reservationDocument(component.reservation),
        pci_address: component.pciAddress,
      };
    }
    for (const iface of records.interfaces.filter((i) => i.node === node.name)) {
      interfaces[iface.name] = {
        component: iface.component,
        port: iface.port,
        bandwidth_gbps: iface.bandwidthGbps,
        vlan: iface.vlan,
        ip_address: iface.ipAddress,
        network_service: iface.networkService,
        reservation: reservationDocument(iface.reservation),
        mac: iface.mac,
        assigned_vlan: iface.assignedVlan,
        configured_addresses: iface.configuredAddresses ? [...iface.configuredAddresses] : undefined,
      };
    }
    nodes[node.name] = {
      site: node.site,
      host: node.host,
      image: node.image,
      capacity: node.capacity
        ? { cores: node.capacity.cores, ram_gb: node.capacity.ramGb, disk_gb: node.capacity.diskGb }
        : undefined,
      instance_type: node.instanceType,
      username: node.username,
      routes: node.routes.map((r) => ({ ...r })),
      post_boot_tasks: node.postBootTasks.map((t) => ({ ...t })),
      reservation: reservationDocument(node.reservation),
      management_ip: node.managementIp,
      components,
      interfaces,
    };
  }

  const networkServices: Record<string, NetworkServiceDocument> = {};
  for (const service of records.networkServices) {
    networkServices[service.name] = {
      type: service.type,
      interfaces: [...service.interfaces],
      user_subnet: service.userSubnet,
      ero: service.ero ? [...service.ero] : undefined,
      facility: service.facility,
      reservation: reservationDocument(service.reservation),
      subnet: service.subnet,
      gateway: service.gateway,
    };
  }

  const info = slice.info;
  return {
    version: SLICE_DOCUMENT_VERSION,
    slice: {
      name: info.name,
      project_id: info.projectId,
      slice_id: info.sliceId,
      state: info.state,
      lease_start: info.leaseStart,
      lease_end: info.leaseEnd,
      submitted: slice.graph.isSubmitted(),
      keys: slice.keys ? { public_key: slice.keys.publicKey, private_key_file: slice.keys.privateKeyFile } : undefined,
    },
    nodes,
    network_services: networkServices,
    last_snapshot: slice.lastSnapshot,
  };
}

function reservationDocument(reservation: Readonly<ReservationInfo>): ReservationDocument {
  return {
    reservation_id: reservation.reservationId,
    state: reservation.state,
    error_message: reservation.errorMessage,
  };
}

// --- Reading ---

/**
 * Rebuild a slice from a parsed document without contacting the
 * orchestrator. Throws StateFileError on any malformed field.
 */
export function restoreSlice(raw: unknown, catalog?: CapabilityCatalog): Slice {
  const doc = record(raw, 'document');
  const version = doc.version;
  if (version !== SLICE_DOCUMENT_VERSION) {
    throw new StateFileError(`Unsupported slice document version: ${String(version)}`, { version });
  }

  const sliceDoc = record(doc.slice, 'slice');
  const state = sliceDoc.state;
  if (!isSliceState(state)) {
    throw new StateFileError(`Unknown slice state: ${String(state)}`);
  }

  const keysDoc = sliceDoc.keys === undefined ? undefined : record(sliceDoc.keys, 'slice.keys');
  const records: GraphRecords = { nodes: [], components: [], interfaces: [], networkServices: [] };
  for (const [nodeName, nodeRaw] of Object.entries(record(doc.nodes, 'nodes'))) {
    const at = `nodes.${nodeName}`;
    const node = record(nodeRaw, at);
    const components = record(node.components ?? {}, `${at}.components`);
    const interfaces = record(node.interfaces ?? {}, `${at}.interfaces`);
    const capacity = node.capacity === undefined ? undefined : record(node.capacity, `${at}.capacity`);

    records.nodes.push({
      name: nodeName,
      site: str(node.site, `${at}.site`),
      host: optStr(node.host, `${at}.host`),
      image: str(node.image, `${at}.image`),
      capacity: capacity
        ? {
            cores: num(capacity.cores, `${at}.capacity.cores`),
            ramGb: num(capacity.ram_gb, `${at}.capacity.ram_gb`),
            diskGb: num(capacity.disk_gb, `${at}.capacity.disk_gb`),
          }
        : undefined,
      instanceType: optStr(node.instance_type, `${at}.instance_type`),
      username: optStr(node.username, `${at}.username`),
      components: Object.keys(components),
      routes: list(node.routes ?? [], `${at}.routes`).map((r, i) => route(r, `${at}.routes[${i}]`)),
      postBootTasks: list(node.post_boot_tasks ?? [], `${at}.post_boot_tasks`).map((t, i) =>
        postBootTask(t, `${at}.post_boot_tasks[${i}]`),
      ),
      reservation: reservation(node.reservation, `${at}.reservation`),
      managementIp: optStr(node.management_ip, `${at}.management_ip`),
    } satisfies NodeRecord);

    for (const [componentName, componentRaw] of Object.entries(components)) {
      records.components.push(component(componentName, nodeName, componentRaw, `${at}.components.${componentName}`));
    }
    for (const [ifaceName, ifaceRaw] of Object.entries(interfaces)) {
      records.interfaces.push(networkInterface(ifaceName, nodeName, ifaceRaw, `${at}.interfaces.${ifaceName}`));
    }
  }

  for (const [serviceName, serviceRaw] of Object.entries(record(doc.network_services ?? {}, 'network_services'))) {
    records.networkServices.push(networkService(serviceName, serviceRaw, `network_services.${serviceName}`));
  }

  let graph: TopologyGraph;
  try {
    graph = TopologyGraph.fromRecords(records, { submitted: sliceDoc.submitted === true, catalog });
  } catch (err) {
    throw new StateFileError(`Slice document is inconsistent: ${err instanceof Error ? err.message : String(err)}`);
  }

  return Slice.restore(
    {
      name: str(sliceDoc.name, 'slice.name'),
      projectId: str(sliceDoc.project_id, 'slice.project_id'),
      keys: keysDoc
        ? {
            publicKey: str(keysDoc.public_key, 'slice.keys.public_key'),
            privateKeyFile: str(keysDoc.private_key_file, 'slice.keys.private_key_file'),
          }
        : undefined,
      catalog,
    },
    graph,
    state,
    {
      sliceId: optStr(sliceDoc.slice_id, 'slice.slice_id'),
      leaseStart: optStr(sliceDoc.lease_start, 'slice.lease_start'),
      leaseEnd: optStr(sliceDoc.lease_end, 'slice.lease_end'),
    },
    doc.last_snapshot === undefined ? undefined : snapshot(doc.last_snapshot),
  );
}

function component(name: string, node: string, raw: unknown, at: string): ComponentRecord {
  const doc = record(raw, at);
  const type = str(doc.type, `${at}.type`);
  if (!isComponentType(type)) throw new StateFileError(`Unknown component type at ${at}: ${type}`);
  return {
    name,
    shortName: str(doc.short_name, `${at}.short_name`),
    node,
    model: str(doc.model, `${at}.model`),
    type,
    units: num(doc.units, `${at}.units`),
    interfaces: list(doc.interfaces ?? [], `${at}.interfaces`).map((i, n) => str(i, `${at}.interfaces[${n}]`)),
    reservation: reservation(doc.reservation, `${at}.reservation`),
    pciAddress: optStr(doc.pci_address, `${at}.pci_address`),
  };
}

function networkInterface(name: string, node: string, raw: unknown, at: string): InterfaceRecord {
  const doc = record(raw, at);
  const configured = doc.configured_addresses;
  return {
    name,
    node,
    component: str(doc.component, `${at}.component`),
    port: num(doc.port, `${at}.port`),
    bandwidthGbps: num(doc.bandwidth_gbps, `${at}.bandwidth_gbps`),
    vlan: optNum(doc.vlan, `${at}.vlan`),
    ipAddress: optStr(doc.ip_address, `${at}.ip_address`),
    networkService: optStr(doc.network_service, `${at}.network_service`),
    reservation: reservation(doc.reservation, `${at}.reservation`),
    mac: optStr(doc.mac, `${at}.mac`),
    assignedVlan: optNum(doc.assigned_vlan, `${at}.assigned_vlan`),
    configuredAddresses:
      configured === undefined
        ? undefined
        : list(configured, `${at}.configured_addresses`).map((a, i) => str(a, `${at}.configured_addresses[${i}]`)),
  };
}

function networkService(name: string, raw: unknown, at: string): NetworkServiceRecord {
  const doc = record(raw, at);
  const type = doc.type;
  if (!isNetworkServiceType(type)) throw new StateFileError(`Unknown network service type at ${at}: ${String(type)}`);
  return {
    name,
    type,
    layer: NETWORK_SERVICE_LAYERS[type],
    interfaces: list(doc.interfaces ?? [], `${at}.interfaces`).map((i, n) => str(i, `${at}.interfaces[${n}]`)),
    userSubnet: optStr(doc.user_subnet, `${at}.user_subnet`),
    ero: doc.ero === undefined ? undefined : list(doc.ero, `${at}.ero`).map((s, n) => str(s, `${at}.ero[${n}]`)),
    facility: optStr(doc.facility, `${at}.facility`),
    reservation: reservation(doc.reservation, `${at}.reservation`),
    subnet: optStr(doc.subnet, `${at}.subnet`),
    gateway: optStr(doc.gateway, `${at}.gateway`),
  };
}

function route(raw: unknown, at: string): RouteSpec {
  const doc = record(raw, at);
  return { subnet: str(doc.subnet, `${at}.subnet`), nextHop: str(doc.nextHop, `${at}.nextHop`) };
}

function postBootTask(raw: unknown, at: string): PostBootTask {
  const doc = record(raw, at);
  if (doc.kind === 'execute') return { kind: 'execute', command: str(doc.command, `${at}.command`) };
  if (doc.kind === 'upload') {
    return {
      kind: 'upload',
      localPath: str(doc.localPath, `${at}.localPath`),
      remotePath: str(doc.remotePath, `${at}.remotePath`),
    };
  }
  throw new StateFileError(`Unknown post-boot task kind at ${at}: ${String(doc.kind)}`);
}

function reservation(raw: unknown, at: string): ReservationInfo {
  const doc = record(raw, at);
  const state = doc.state;
  if (!isReservationState(state)) throw new StateFileError(`Unknown reservation state at ${at}: ${String(state)}`);
  const result: ReservationInfo = { state };
  const reservationId = optStr(doc.reservation_id, `${at}.reservation_id`);
  const errorMessage = optStr(doc.error_message, `${at}.error_message`);
  if (reservationId !== undefined) result.reservationId = reservationId;
  if (errorMessage !== undefined) result.errorMessage = errorMessage;
  return result;
}

function snapshot(raw: unknown): TopologySnapshot {
  const doc = record(raw, 'last_snapshot');
  const section = (key: string) =>
    Object.entries(record(doc[key] ?? {}, `last_snapshot.${key}`)).map(([name, value]) => {
      const at = `last_snapshot.${key}.${name}`;
      return { name, at, obs: record(value, at) };
    });

  const nodes: Record<string, NodeObservation> = {};
  for (const { name, at, obs } of section('nodes')) {
    nodes[name] = { ...observation(obs, at), managementIp: optStr(obs.managementIp, `${at}.managementIp`) };
  }
  const components: Record<string, ComponentObservation> = {};
  for (const { name, at, obs } of section('components')) {
    components[name] = { ...observation(obs, at), pciAddress: optStr(obs.pciAddress, `${at}.pciAddress`) };
  }
  const interfaces: Record<string, InterfaceObservation> = {};
  for (const { name, at, obs } of section('interfaces')) {
    interfaces[name] = {
      ...observation(obs, at),
      mac: optStr(obs.mac, `${at}.mac`),
      vlan: optNum(obs.vlan, `${at}.vlan`),
    };
  }
  const networkServices: Record<string, NetworkServiceObservation> = {};
  for (const { name, at, obs } of section('networkServices')) {
    networkServices[name] = {
      ...observation(obs, at),
      subnet: optStr(obs.subnet, `${at}.subnet`),
      gateway: optStr(obs.gateway, `${at}.gateway`),
    };
  }

  return {
    sliceId: str(doc.sliceId, 'last_snapshot.sliceId'),
    leaseStart: optStr(doc.leaseStart, 'last_snapshot.leaseStart'),
    leaseEnd: optStr(doc.leaseEnd, 'last_snapshot.leaseEnd'),
    nodes,
    components,
    interfaces,
    networkServices,
  };
}

function observation(obs: Record<string, unknown>, at: string): EntityObservation {
  const state = obs.state;
  if (!isReservationState(state)) throw new StateFileError(`Unknown reservation state at ${at}: ${String(state)}`);
  return {
    state,
    reservationId: optStr(obs.reservationId, `${at}.reservationId`),
    errorMessage: optStr(obs.errorMessage, `${at}.errorMessage`),
  };
}

function record(value: unknown, at: string): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new StateFileError(`Expected an object at ${at}`);
  }
  return Object.fromEntries(Object.entries(value));
}

function list(value: unknown, at: string): unknown[] {
  if (!Array.isArray(value)) throw new StateFileError(`Expected an array at ${at}`);
  return value;
}

function str(value: unknown, at: string): string {
  if (typeof value !== 'string') throw new StateFileError(`Expected a string at ${at}`);
  return value;
}

function optStr(value: unknown, at: string): string | undefined {
  return value === undefined || value === null ? undefined : str(value, at);
}

function num(value: unknown, at: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) throw new StateFileError(`Expected a number at ${at}`);
  return value;
}

function optNum(value: unknown, at: string): number | undefined {
  return value === undefined || value === null ? undefined : num(value, at);
}
