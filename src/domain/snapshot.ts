/**
 * Orchestrator snapshot model.
 *
 * A snapshot is the orchestrator's authoritative, point-in-time view of a
 * slice, keyed by the same entity names used in the local graph. Entities
 * missing from a snapshot have not been accepted yet.
 */

import { ReservationState } from './reservation';

export interface EntityObservation {
  reservationId?: string;
  state: ReservationState;
  errorMessage?: string;
}

export interface NodeObservation extends EntityObservation {
  managementIp?: string;
}

export interface ComponentObservation extends EntityObservation {
  pciAddress?: string;
}

export interface InterfaceObservation extends EntityObservation {
  mac?: string;
  vlan?: number;
}

export interface NetworkServiceObservation extends EntityObservation {
  subnet?: string;
  gateway?: string;
}

export interface TopologySnapshot {
  sliceId: string;
  leaseStart?: string;
  leaseEnd?: string;
  nodes: Record<string, NodeObservation>;
  components: Record<string, ComponentObservation>;
  interfaces: Record<string, InterfaceObservation>;
  networkServices: Record<string, NetworkServiceObservation>;
}

export function emptySnapshot(sliceId: string): TopologySnapshot {
  return { sliceId, nodes: {}, components: {}, interfaces: {}, networkServices: {} };
}
