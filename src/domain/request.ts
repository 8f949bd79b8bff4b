/**
 * Request model sent to the orchestrator on submission.
 *
 * Only desired fields travel in a request; authoritative fields come back in
 * snapshots.
 */

import { Capacity, NetworkServiceType } from './topology';

export interface InterfaceRequest {
  name: string;
  bandwidthGbps: number;
  vlan?: number;
}

export interface ComponentRequest {
  name: string;
  model: string;
  units: number;
  interfaces: InterfaceRequest[];
}

export interface NodeRequest {
  name: string;
  site: string;
  host?: string;
  image: string;
  capacity?: Capacity;
  instanceType?: string;
  components: ComponentRequest[];
}

export interface NetworkServiceRequest {
  name: string;
  type: NetworkServiceType;
  interfaces: string[];
  subnet?: string;
  ero?: string[];
  facility?: string;
}

export interface TopologyRequest {
  nodes: NodeRequest[];
  networkServices: NetworkServiceRequest[];
}

export interface SliceRequest {
  name: string;
  projectId: string;
  /** Public key installed on every node for the login user. */
  sliceKey: string;
  /** Requested lease end, ISO-8601. */
  leaseEnd?: string;
  topology: TopologyRequest;
}
