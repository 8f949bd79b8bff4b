/**
 * Reconciler.
 *
 * Merges orchestrator snapshots into the local graph and derives the slice's
 * aggregate state. A merge is computed in full, validated, then committed in
 * one synchronous step, so a snapshot is either merged completely or not at
 * all, and two merges can never interleave.
 */

import { InvalidStateError } from '../domain/errors';
import {
  AggregateState,
  ReservationInfo,
  ReservationState,
  SliceState,
  UNSUBMITTED_RESERVATION,
  isActiveReservation,
  isReservationState,
} from '../domain/reservation';
import { EntityObservation, TopologySnapshot } from '../domain/snapshot';
import { EntityKind } from '../domain/topology';
import { Logger, logger as rootLogger } from '../logger';
import {
  AuthoritativePatch,
  ComponentAuthority,
  EntityReservation,
  InterfaceAuthority,
  NetworkServiceAuthority,
  NodeAuthority,
  TopologyGraph,
} from '../topology/graph';
import { Slice } from '../topology/slice';
import { transitionSliceState } from './state-machine';

/**
 * Restricts which entities a wait is for. Entities of the listed nodes (and
 * the listed services) must be Active; everything else is not waited for.
 * A Failed entity fails the slice whether or not it is in scope.
 */
export interface StabilityScope {
  nodes?: readonly string[];
  networkServices?: readonly string[];
}

export interface FailedEntity {
  kind: EntityKind;
  name: string;
  errorMessage?: string;
}

export interface AggregateResult {
  state: AggregateState;
  failedEntities: FailedEntity[];
  /** In-scope entities not yet Active. */
  pendingEntities: string[];
}

export interface MergeReport {
  /** Snapshot entries with no counterpart in the graph, as `kind:name`. */
  unknownEntities: string[];
  /** Graph entities the snapshot does not mention yet. */
  unsubmittedEntities: string[];
}

export class Reconciler {
  private readonly log: Logger;

  constructor(log: Logger = rootLogger) {
    this.log = log.child({ module: 'reconciler' });
  }

  /** Overwrite authoritative fields from a snapshot. Idempotent. */
  merge(graph: TopologyGraph, snapshot: TopologySnapshot): MergeReport {
    const unsubmittedEntities: string[] = [];
    const observe = <O extends EntityObservation>(
      record: Record<string, O>,
      name: string,
    ): { observation?: O; reservation: Readonly<ReservationInfo> } => {
      const observation = lookup(record, name);
      if (!observation) {
        unsubmittedEntities.push(name);
        return { reservation: UNSUBMITTED_RESERVATION };
      }
      return { observation, reservation: toReservation(name, observation) };
    };

    const nodes = new Map<string, NodeAuthority>();
    for (const node of graph.listNodes()) {
      const { observation, reservation } = observe(snapshot.nodes, node.name);
      nodes.set(node.name, { reservation, managementIp: observation?.managementIp });
    }

    const components = new Map<string, ComponentAuthority>();
    for (const component of graph.listComponents()) {
      const { observation, reservation } = observe(snapshot.components, component.name);
      components.set(component.name, { reservation, pciAddress: observation?.pciAddress });
    }

    const interfaces = new Map<string, InterfaceAuthority>();
    for (const iface of graph.listInterfaces()) {
      const { observation, reservation } = observe(snapshot.interfaces, iface.name);
      interfaces.set(iface.name, {
        reservation,
        mac: observation?.mac,
        assignedVlan: observation?.vlan,
      });
    }

    const networkServices = new Map<string, NetworkServiceAuthority>();
    for (const service of graph.listNetworkServices()) {
      const { observation, reservation } = observe(snapshot.networkServices, service.name);
      networkServices.set(service.name, {
        reservation,
        subnet: observation?.subnet,
        gateway: observation?.gateway,
      });
    }

    const unknownEntities = [
      ...unknownKeys('node', snapshot.nodes, nodes),
      ...unknownKeys('component', snapshot.components, components),
      ...unknownKeys('interface', snapshot.interfaces, interfaces),
      ...unknownKeys('network service', snapshot.networkServices, networkServices),
    ];
    if (unknownEntities.length > 0) {
      this.log.warn('Snapshot reports entities the local graph does not have', {
        sliceId: snapshot.sliceId,
        unknownEntities,
      });
    }

    graph.commitAuthoritative({ nodes, components, interfaces, networkServices });
    return { unknownEntities, unsubmittedEntities };
  }

  /** Stable, Failed or Pending. Any Failed entity short-circuits to Failed. */
  aggregate(graph: TopologyGraph, scope?: StabilityScope): AggregateResult {
    const entities = graph.entities();
    const failedEntities: FailedEntity[] = entities
      .filter((e) => e.reservation.state === ReservationState.Failed)
      .map((e) => ({ kind: e.kind, name: e.name, errorMessage: e.reservation.errorMessage }));
    if (failedEntities.length > 0) {
      return { state: SliceState.Failed, failedEntities, pendingEntities: [] };
    }

    const pendingEntities = entities
      .filter((e) => inScope(e, scope) && !isActiveReservation(e.reservation.state))
      .map((e) => e.name);
    return {
      state: pendingEntities.length === 0 ? SliceState.Stable : SliceState.Pending,
      failedEntities,
      pendingEntities,
    };
  }

  /**
   * Merge a snapshot into a slice, update its lifecycle fields and move it
   * to the aggregate state.
   */
  reconcile(slice: Slice, snapshot: TopologySnapshot, scope?: StabilityScope): AggregateResult {
    if (slice.sliceId !== undefined && slice.sliceId !== snapshot.sliceId) {
      throw new InvalidStateError(
        `Snapshot for slice id ${snapshot.sliceId} does not belong to slice "${slice.name}" (${slice.sliceId})`,
        slice.name,
      );
    }

    this.merge(slice.graph, snapshot);
    slice.updateLifecycle({
      sliceId: snapshot.sliceId,
      leaseStart: snapshot.leaseStart,
      leaseEnd: snapshot.leaseEnd,
    });
    slice.recordSnapshot(snapshot);

    const result = this.aggregate(slice.graph, scope);
    if (slice.state !== result.state) {
      const transition = transitionSliceState(slice.state, result.state);
      if (transition.success) {
        slice.transitionTo(result.state);
      } else {
        this.log.warn('Ignoring aggregate state the slice cannot move to', {
          slice: slice.name,
          from: slice.state,
          to: result.state,
        });
      }
    }
    return result;
  }

  /** Record the addresses configured on a node's interfaces. */
  recordConfiguration(
    graph: TopologyGraph,
    nodeName: string,
    addresses: ReadonlyMap<string, readonly string[]>,
  ): void {
    graph.requireNode(nodeName);
    for (const ifaceName of addresses.keys()) {
      const iface = graph.getInterface(ifaceName);
      if (!iface || iface.node !== nodeName) {
        throw new InvalidStateError(`Interface "${ifaceName}" does not belong to node "${nodeName}"`, ifaceName);
      }
    }
    const patch: AuthoritativePatch = { configuredAddresses: addresses };
    graph.commitAuthoritative(patch);
  }
}

function inScope(entity: EntityReservation, scope?: StabilityScope): boolean {
  if (!scope) return true;
  if (entity.kind === 'network service') return scope.networkServices?.includes(entity.name) ?? false;
  const node = entity.owner ?? entity.name;
  return scope.nodes?.includes(node) ?? false;
}

function lookup<O>(record: Record<string, O>, name: string): O | undefined {
  return Object.prototype.hasOwnProperty.call(record, name) ? record[name] : undefined;
}

function toReservation(name: string, observation: EntityObservation): ReservationInfo {
  const state: unknown = observation.state;
  if (!isReservationState(state)) {
    throw new InvalidStateError(`Snapshot reports unknown reservation state "${String(state)}" for "${name}"`, name);
  }
  const reservation: ReservationInfo = { state };
  if (observation.reservationId !== undefined) reservation.reservationId = observation.reservationId;
  if (observation.errorMessage !== undefined) reservation.errorMessage = observation.errorMessage;
  return reservation;
}

function unknownKeys(kind: EntityKind, record: Record<string, unknown>, known: ReadonlyMap<string, unknown>): string[] {
  return Object.keys(record)
    .filter((name) => !known.has(name))
    .map((name) => `${kind}:${name}`);
}
