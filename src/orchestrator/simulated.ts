/**
 * In-process orchestrator.
 *
 * Accepts slice requests and walks every entity through
 * Ticketed → Provisioning → Active over a configurable number of queries,
 * counted from the submission or modification that added it, assigning management addresses, MACs, PCI addresses and L3 subnets the way
 * the real service does. Failures can be scripted per entity or per call, so
 * it doubles as the adapter for examples and tests.
 */

import { v4 as uuid } from 'uuid';
import { RejectedError, TransportError } from '../domain/errors';
import { ReservationState } from '../domain/reservation';
import { SliceRequest } from '../domain/request';
import { EntityObservation, TopologySnapshot } from '../domain/snapshot';
import { NETWORK_SERVICE_LAYERS, NetworkServiceType, isIpv6ServiceType } from '../domain/topology';
import { Logger, logger as rootLogger } from '../logger';
import { CallOptions, OrchestratorAdapter, SubmitResult } from './adapter';

export interface SimulatedOrchestratorOptions {
  /** Queries after submission until entities turn Active. Default: 3. */
  provisioningPolls?: number;
  /** Lease length granted on submission. Default: 24h. */
  leaseMs?: number;
  now?: () => Date;
  logger?: Logger;
}

/** Where an entity joined the slice and the ordinals its addresses derive from. */
interface SimulatedEntity {
  /** Query count of the slice when the entity was requested. */
  joinedAt: number;
  reservation: number;
  ordinal: number;
}

interface SimulatedSlice {
  sliceId: string;
  sequence: number;
  request: SliceRequest;
  queries: number;
  entities: Map<string, SimulatedEntity>;
  counters: Record<'reservation' | 'node' | 'component' | 'interface' | 'service', number>;
  leaseStart: string;
  leaseEnd: string;
  deleted: boolean;
  /** Entity name → forced failure message. */
  failures: Map<string, string>;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export class SimulatedOrchestrator implements OrchestratorAdapter {
  private readonly slices = new Map<string, SimulatedSlice>();
  private readonly provisioningPolls: number;
  private readonly leaseMs: number;
  private readonly now: () => Date;
  private readonly log: Logger;
  private sequence = 0;
  private transportFailures = 0;
  private rejection?: string;

  /** Every call made, in order, as `operation:sliceId` (submit uses the slice name). */
  readonly calls: string[] = [];

  constructor(options: SimulatedOrchestratorOptions = {}) {
    this.provisioningPolls = options.provisioningPolls ?? 3;
    this.leaseMs = options.leaseMs ?? DAY_MS;
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? rootLogger).child({ module: 'simulated-orchestrator' });
  }

  // --- Scripting ---

  /** Make the next `count` calls fail with a TransportError. */
  failNextCalls(count: number): void {
    this.transportFailures = count;
  }

  /** Reject every later submission with this message. */
  rejectSubmissions(message: string | undefined): void {
    this.rejection = message;
  }

  /** Report an entity as Failed from the next query on. */
  failEntity(sliceId: string, entityName: string, message: string): void {
    this.requireSlice(sliceId).failures.set(entityName, message);
  }

  // --- OrchestratorAdapter ---

  async submit(request: SliceRequest, options?: CallOptions): Promise<SubmitResult> {
    this.enter('submit', request.name, options);
    if (this.rejection) throw new RejectedError(this.rejection, { slice: request.name });
    if (request.topology.nodes.length === 0) {
      throw new RejectedError(`Slice "${request.name}" requests no nodes`, { slice: request.name });
    }
    const live = [...this.slices.values()].find((s) => s.request.name === request.name && !s.deleted);
    if (live) {
      throw new RejectedError(`A slice named "${request.name}" already exists`, { sliceId: live.sliceId });
    }

    const now = this.now();
    const slice: SimulatedSlice = {
      sliceId: `slice_${uuid()}`,
      sequence: ++this.sequence,
      request: structuredClone(request),
      queries: 0,
      entities: new Map(),
      counters: { reservation: 0, node: 0, component: 0, interface: 0, service: 0 },
      leaseStart: now.toISOString(),
      leaseEnd: request.leaseEnd ?? new Date(now.getTime() + this.leaseMs).toISOString(),
      deleted: false,
      failures: new Map(),
    };
    track(slice);
    this.slices.set(slice.sliceId, slice);
    this.log.info('Slice accepted', { slice: request.name, sliceId: slice.sliceId });
    return { sliceId: slice.sliceId, snapshot: this.snapshotOf(slice) };
  }

  async query(sliceId: string, options?: CallOptions): Promise<TopologySnapshot> {
    this.enter('query', sliceId, options);
    const slice = this.requireSlice(sliceId);
    slice.queries++;
    return this.snapshotOf(slice);
  }

  /**
   * Replace the slice's topology. Entities new to the request start at
   * Ticketed; entities missing from it are released.
   */
  async modify(sliceId: string, request: SliceRequest, options?: CallOptions): Promise<TopologySnapshot> {
    this.enter('modify', sliceId, options);
    const slice = this.requireSlice(sliceId);
    if (slice.deleted) throw new RejectedError(`Slice ${sliceId} has been deleted`, { sliceId });
    if (request.topology.nodes.length === 0) {
      throw new RejectedError(`Slice "${request.name}" requests no nodes`, { sliceId });
    }
    slice.request = structuredClone(request);
    const { added, released } = track(slice);
    for (const name of released) slice.failures.delete(name);
    this.log.info('Slice modified', { slice: request.name, sliceId, added: added.length, released: released.length });
    return this.snapshotOf(slice);
  }

  async delete(sliceId: string, options?: CallOptions): Promise<void> {
    this.enter('delete', sliceId, options);
    this.requireSlice(sliceId).deleted = true;
  }

  async renew(sliceId: string, leaseEnd: string, options?: CallOptions): Promise<void> {
    this.enter('renew', sliceId, options);
    const slice = this.requireSlice(sliceId);
    const end = Date.parse(leaseEnd);
    if (Number.isNaN(end) || end <= this.now().getTime()) {
      throw new RejectedError(`Lease end ${leaseEnd} is not in the future`, { sliceId });
    }
    if (slice.deleted) throw new RejectedError(`Slice ${sliceId} has been deleted`, { sliceId });
    slice.leaseEnd = new Date(end).toISOString();
  }

  // --- Internals ---

  private enter(operation: string, target: string, options?: CallOptions): void {
    this.calls.push(`${operation}:${target}`);
    if (options?.signal?.aborted) throw new TransportError(`${operation} aborted`);
    if (this.transportFailures > 0) {
      this.transportFailures--;
      throw new TransportError(`Simulated transport failure during ${operation}`, { statusCode: 503 });
    }
  }

  private requireSlice(sliceId: string): SimulatedSlice {
    const slice = this.slices.get(sliceId);
    if (!slice) throw new RejectedError(`Unknown slice ${sliceId}`, { sliceId });
    return slice;
  }

  private stateFor(slice: SimulatedSlice, name: string): ReservationState {
    if (slice.deleted) return ReservationState.Closed;
    const age = slice.queries - (slice.entities.get(name)?.joinedAt ?? 0);
    if (age >= this.provisioningPolls) return ReservationState.Active;
    return age === 0 ? ReservationState.Ticketed : ReservationState.Provisioning;
  }

  private snapshotOf(slice: SimulatedSlice): TopologySnapshot {
    const observe = (name: string): { observation: EntityObservation; active: boolean; ordinal: number } => {
      const state = this.stateFor(slice, name);
      const entity = slice.entities.get(name);
      const failure = slice.failures.get(name);
      return {
        observation: {
          reservationId: `rsv-${slice.sequence}-${entity?.reservation ?? 0}`,
          state: failure !== undefined ? ReservationState.Failed : state,
          errorMessage: failure,
        },
        active: state === ReservationState.Active,
        ordinal: entity?.ordinal ?? 0,
      };
    };

    const snapshot: TopologySnapshot = {
      sliceId: slice.sliceId,
      leaseStart: slice.leaseStart,
      leaseEnd: slice.leaseEnd,
      nodes: {},
      components: {},
      interfaces: {},
      networkServices: {},
    };

    for (const node of slice.request.topology.nodes) {
      const seen = observe(node.name);
      snapshot.nodes[node.name] = {
        ...seen.observation,
        managementIp: seen.active ? `10.20.${slice.sequence % 256}.${seen.ordinal + 10}` : undefined,
      };
      for (const component of node.components) {
        const part = observe(component.name);
        snapshot.components[component.name] = {
          ...part.observation,
          pciAddress: part.active ? `0000:${(part.ordinal + 0x10).toString(16)}:00.0` : undefined,
        };
        for (const iface of component.interfaces) {
          const port = observe(iface.name);
          snapshot.interfaces[iface.name] = {
            ...port.observation,
            mac: port.active ? macAddress(slice.sequence, port.ordinal) : undefined,
            vlan: iface.vlan,
          };
        }
      }
    }

    for (const service of slice.request.topology.networkServices) {
      const seen = observe(service.name);
      const addressing = seen.active ? l3Addressing(service.type, slice.sequence, seen.ordinal) : undefined;
      snapshot.networkServices[service.name] = {
        ...seen.observation,
        subnet: addressing?.subnet,
        gateway: addressing?.gateway,
      };
      if (service.type === NetworkServiceType.FacilityPort) {
        service.interfaces.forEach((ifaceName, i) => {
          const observed = snapshot.interfaces[ifaceName];
          if (observed && observed.vlan === undefined) observed.vlan = 100 + i;
        });
      }
    }

    return snapshot;
  }
}

/**
 * Register entities the request names for the first time and drop those it
 * no longer names. Nodes count from 0, everything else from 1.
 */
function track(slice: SimulatedSlice): { added: string[]; released: string[] } {
  const { counters } = slice;
  const requested = new Set<string>();
  const added: string[] = [];
  const join = (name: string, ordinal: () => number): void => {
    requested.add(name);
    if (slice.entities.has(name)) return;
    slice.entities.set(name, { joinedAt: slice.queries, reservation: counters.reservation++, ordinal: ordinal() });
    added.push(name);
  };

  for (const node of slice.request.topology.nodes) {
    join(node.name, () => counters.node++);
    for (const component of node.components) {
      join(component.name, () => ++counters.component);
      for (const iface of component.interfaces) join(iface.name, () => ++counters.interface);
    }
  }
  for (const service of slice.request.topology.networkServices) join(service.name, () => ++counters.service);

  const released = [...slice.entities.keys()].filter((name) => !requested.has(name));
  for (const name of released) slice.entities.delete(name);
  return { added, released };
}

function macAddress(sliceSequence: number, interfaceIndex: number): string {
  const bytes = [0x02, 0x5c, sliceSequence & 0xff, (interfaceIndex >> 16) & 0xff, (interfaceIndex >> 8) & 0xff, interfaceIndex & 0xff];
  return bytes.map((b) => b.toString(16).padStart(2, '0').toUpperCase()).join(':');
}

function l3Addressing(
  type: NetworkServiceType,
  sliceSequence: number,
  serviceIndex: number,
): { subnet: string; gateway: string } | undefined {
  if (NETWORK_SERVICE_LAYERS[type] !== 'L3') return undefined;
  if (isIpv6ServiceType(type)) {
    const prefix = `2602:fcfb:${sliceSequence.toString(16)}:${serviceIndex.toString(16)}`;
    return { subnet: `${prefix}::/64`, gateway: `${prefix}::1` };
  }
  const prefix = `10.${128 + (sliceSequence % 64)}.${serviceIndex % 256}`;
  return { subnet: `${prefix}.0/24`, gateway: `${prefix}.1` };
}
