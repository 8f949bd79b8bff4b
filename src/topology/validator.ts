/**
 * Topology validation.
 *
 * Member rules are enforced eagerly by the graph builder; `validateTopology`
 * re-checks the whole graph before submission and reports every problem at
 * once instead of stopping at the first.
 */

import { TypedError, createTypedError } from '../domain/errors';
import { NETWORK_SERVICE_LAYERS, NetworkServiceType } from '../domain/topology';
import { isAddressInSubnet, isValidAddress, parseSubnet } from './addressing';
import type { TopologyGraph } from './graph';

/** Validation result. */
export interface ValidationResult {
  valid: boolean;
  errors: TypedError[];
  warnings: string[];
}

/** What the member rules need to know about one interface. */
export interface ServiceMember {
  name: string;
  site: string;
  /** The interface sits on a shared (virtual-function) NIC. */
  shared: boolean;
}

export interface ServiceOptions {
  ero?: readonly string[];
  facility?: string;
}

const FABNET_TYPES = new Set<NetworkServiceType>([
  NetworkServiceType.FABNetv4,
  NetworkServiceType.FABNetv6,
  NetworkServiceType.FABNetv4Ext,
  NetworkServiceType.FABNetv6Ext,
]);

export const MIN_VLAN = 1;
export const MAX_VLAN = 4094;

/**
 * Check member-count and placement rules for a network service.
 * Returns the reason the members are unacceptable, or undefined.
 */
export function checkServiceMembers(
  type: NetworkServiceType,
  members: readonly ServiceMember[],
  options: ServiceOptions = {},
): string | undefined {
  const sites = new Set(members.map((m) => m.site));

  if (options.ero && options.ero.length > 0 && type !== NetworkServiceType.L2PTP) {
    return `An explicit route is only supported on ${NetworkServiceType.L2PTP} services`;
  }

  switch (type) {
    case NetworkServiceType.L2PTP: {
      if (members.length !== 2) {
        return `${type} requires exactly 2 interfaces, got ${members.length}`;
      }
      if (sites.size !== 2) {
        return `${type} requires interfaces at two different sites`;
      }
      const shared = members.find((m) => m.shared);
      if (shared) {
        return `${type} cannot use interface "${shared.name}" on a shared NIC`;
      }
      return undefined;
    }
    case NetworkServiceType.L2Bridge:
      if (members.length < 2) return `${type} requires at least 2 interfaces, got ${members.length}`;
      if (sites.size !== 1) return `${type} interfaces must all be at one site`;
      return undefined;
    case NetworkServiceType.L2STS:
      if (members.length < 2) return `${type} requires at least 2 interfaces, got ${members.length}`;
      if (sites.size !== 2) return `${type} interfaces must span exactly two sites`;
      return undefined;
    case NetworkServiceType.FacilityPort:
      if (members.length < 1) return `${type} requires at least 1 interface`;
      if (!options.facility) return `${type} requires a facility name`;
      return undefined;
    default:
      if (members.length < 1) return `${type} requires at least 1 interface`;
      if (FABNET_TYPES.has(type) && sites.size !== 1) {
        return `${type} interfaces must all be at one site`;
      }
      return undefined;
  }
}

/**
 * Pick an L2 service type from the sites the interfaces live at:
 * one site bridges, two sites with two interfaces are point-to-point,
 * two sites with more use a site-to-site service.
 */
export function selectL2Type(members: readonly ServiceMember[]): NetworkServiceType | undefined {
  const sites = new Set(members.map((m) => m.site));
  if (sites.size === 1) return NetworkServiceType.L2Bridge;
  if (sites.size === 2) {
    return members.length === 2 ? NetworkServiceType.L2PTP : NetworkServiceType.L2STS;
  }
  return undefined;
}

/** Validate the whole graph before submission. */
export function validateTopology(graph: TopologyGraph): ValidationResult {
  const errors: TypedError[] = [];
  const warnings: string[] = [];

  const nodes = graph.listNodes();
  if (nodes.length === 0) {
    errors.push(
      createTypedError({ code: 'TOPOLOGY.EMPTY', message: 'The slice has no nodes' }),
    );
  }

  validateServices(graph, errors);
  validateInterfaces(graph, errors, warnings);
  validateRoutes(graph, errors);

  for (const node of nodes) {
    if (node.components.length === 0) continue;
    const attached = graph.listInterfaces(node.name).filter((i) => i.networkService);
    if (attached.length === 0 && graph.listInterfaces(node.name).length > 0) {
      warnings.push(`Node "${node.name}" has dataplane interfaces but none is attached to a network service`);
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}

function validateServices(graph: TopologyGraph, errors: TypedError[]): void {
  const owners = new Map<string, string>();

  for (const service of graph.listNetworkServices()) {
    const members: ServiceMember[] = [];
    for (const ifaceName of service.interfaces) {
      const previous = owners.get(ifaceName);
      if (previous !== undefined) {
        errors.push(
          createTypedError({
            code: 'TOPOLOGY.INTERFACE_SHARED',
            message: `Interface "${ifaceName}" belongs to both "${previous}" and "${service.name}"`,
            entity: ifaceName,
          }),
        );
      }
      owners.set(ifaceName, service.name);

      const iface = graph.getInterface(ifaceName);
      if (!iface) {
        errors.push(
          createTypedError({
            code: 'TOPOLOGY.DANGLING_REFERENCE',
            message: `Network service "${service.name}" references unknown interface "${ifaceName}"`,
            entity: service.name,
          }),
        );
        continue;
      }
      members.push(graph.describeMember(iface));
    }

    const reason = checkServiceMembers(service.type, members, service);
    if (reason) {
      errors.push(
        createTypedError({
          code: 'TOPOLOGY.INVALID',
          message: `Network service "${service.name}": ${reason}`,
          entity: service.name,
        }),
      );
    }

    if (service.userSubnet !== undefined && !parseSubnet(service.userSubnet)) {
      errors.push(
        createTypedError({
          code: 'TOPOLOGY.INVALID_SUBNET',
          message: `Network service "${service.name}" has an invalid subnet "${service.userSubnet}"`,
          entity: service.name,
        }),
      );
    }
  }
}

function validateInterfaces(graph: TopologyGraph, errors: TypedError[], warnings: string[]): void {
  for (const iface of graph.listInterfaces()) {
    if (iface.vlan !== undefined && (iface.vlan < MIN_VLAN || iface.vlan > MAX_VLAN)) {
      errors.push(
        createTypedError({
          code: 'TOPOLOGY.INVALID_VLAN',
          message: `Interface "${iface.name}" has VLAN ${iface.vlan} outside ${MIN_VLAN}-${MAX_VLAN}`,
          entity: iface.name,
        }),
      );
    }
    if (iface.ipAddress === undefined) continue;

    const service = iface.networkService ? graph.getNetworkService(iface.networkService) : undefined;
    if (!service) {
      warnings.push(`Interface "${iface.name}" has an address but no network service; it will not be configured`);
      continue;
    }
    if (service.userSubnet && !isAddressInSubnet(iface.ipAddress, service.userSubnet)) {
      errors.push(
        createTypedError({
          code: 'TOPOLOGY.ADDRESS_OUTSIDE_SUBNET',
          message: `Interface "${iface.name}" address ${iface.ipAddress} is outside ${service.userSubnet}`,
          entity: iface.name,
          details: { subnet: service.userSubnet },
        }),
      );
    }
  }
}

function validateRoutes(graph: TopologyGraph, errors: TypedError[]): void {
  for (const node of graph.listNodes()) {
    for (const route of node.routes) {
      for (const [field, value] of [['subnet', route.subnet], ['nextHop', route.nextHop]] as const) {
        const service = graph.getNetworkService(value);
        if (service) {
          if (NETWORK_SERVICE_LAYERS[service.type] !== 'L3') {
            errors.push(
              createTypedError({
                code: 'TOPOLOGY.INVALID_ROUTE',
                message: `Route ${field} on node "${node.name}" names "${value}", which is not an L3 service`,
                entity: node.name,
              }),
            );
          }
          continue;
        }
        const valid = field === 'subnet' ? parseSubnet(value) !== undefined : isValidAddress(value);
        if (!valid) {
          errors.push(
            createTypedError({
              code: 'TOPOLOGY.INVALID_ROUTE',
              message: `Route ${field} "${value}" on node "${node.name}" is neither an address nor an L3 service`,
              entity: node.name,
            }),
          );
        }
      }
    }
  }
}
