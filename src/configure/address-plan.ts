/**
 * Address plan for a slice.
 *
 * Assigns every attached interface the address it should carry. L3 services
 * use the orchestrator's subnet and skip its gateway; L2 services use the
 * user subnet. A user-chosen address always wins. Allocation walks services
 * and interfaces in name order, so the same graph always yields the same
 * plan and reruns are no-ops.
 */

import { InterfaceRecord } from '../domain/topology';
import { TopologyGraph } from '../topology/graph';
import { allocateHosts, isAddressInSubnet, normalizeAddress, prefixLength } from '../topology/addressing';

export interface PlannedAddress {
  address: string;
  prefix: number;
  subnet: string;
  networkService: string;
}

export interface AddressPlan {
  addresses: Map<string, PlannedAddress>;
  /** Services that could not be addressed, with the reason. */
  problems: Map<string, string>;
}

export function planAddresses(graph: TopologyGraph): AddressPlan {
  const addresses = new Map<string, PlannedAddress>();
  const problems = new Map<string, string>();

  const services = graph.listNetworkServices().sort((a, b) => a.name.localeCompare(b.name));
  for (const service of services) {
    const subnet = service.layer === 'L3' ? service.subnet : service.userSubnet;
    if (!subnet) {
      if (service.layer === 'L3') problems.set(service.name, 'the orchestrator has not assigned a subnet yet');
      continue;
    }
    const prefix = prefixLength(subnet);
    if (prefix === undefined) {
      problems.set(service.name, `subnet "${subnet}" is not valid`);
      continue;
    }

    const members = service.interfaces
      .map((name) => graph.getInterface(name))
      .filter((iface): iface is InterfaceRecord => iface !== undefined)
      .sort((a, b) => a.name.localeCompare(b.name));

    const reserved: string[] = service.gateway ? [service.gateway] : [];
    const automatic: string[] = [];
    for (const iface of members) {
      if (iface.ipAddress) {
        if (!isAddressInSubnet(iface.ipAddress, subnet)) {
          problems.set(service.name, `address ${iface.ipAddress} of "${iface.name}" is outside ${subnet}`);
          continue;
        }
        reserved.push(iface.ipAddress);
        addresses.set(iface.name, {
          address: normalizeAddress(iface.ipAddress) ?? iface.ipAddress,
          prefix,
          subnet,
          networkService: service.name,
        });
      } else {
        automatic.push(iface.name);
      }
    }

    const hosts = allocateHosts(subnet, automatic.length, reserved);
    if (hosts.length < automatic.length) {
      problems.set(service.name, `subnet ${subnet} has too few free addresses`);
    }
    automatic.forEach((ifaceName, i) => {
      const address = hosts[i];
      if (address) addresses.set(ifaceName, { address, prefix, subnet, networkService: service.name });
    });
  }

  return { addresses, problems };
}
