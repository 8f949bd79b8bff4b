/**
 * Slice root aggregate.
 *
 * Owns the topology graph and the slice-level lifecycle fields. State
 * changes go through the slice state machine; lifecycle fields are written
 * only by the client and the Reconciler.
 */

import { InvalidStateError } from '../domain/errors';
import { SliceState } from '../domain/reservation';
import { TopologySnapshot } from '../domain/snapshot';
import { SliceInfo, SliceKeyPair } from '../domain/topology';
import { transitionSliceState } from '../engine/state-machine';
import { CapabilityCatalog } from './catalog';
import { TopologyGraph } from './graph';

export interface SliceOptions {
  name: string;
  projectId: string;
  keys?: SliceKeyPair;
  catalog?: CapabilityCatalog;
}

/** Lifecycle fields the orchestrator assigns. */
export interface SliceLifecycle {
  sliceId?: string;
  leaseStart?: string;
  leaseEnd?: string;
}

export class Slice {
  readonly name: string;
  readonly projectId: string;
  readonly graph: TopologyGraph;
  keys?: SliceKeyPair;

  private sliceIdValue?: string;
  private leaseStartValue?: string;
  private leaseEndValue?: string;
  private stateValue = SliceState.Unsubmitted;
  private snapshot?: TopologySnapshot;
  private polling = false;

  constructor(options: SliceOptions, graph?: TopologyGraph) {
    if (!options.name) throw new InvalidStateError('A slice needs a name');
    this.name = options.name;
    this.projectId = options.projectId;
    this.keys = options.keys;
    this.graph = graph ?? new TopologyGraph(options.catalog);
  }

  get sliceId(): string | undefined {
    return this.sliceIdValue;
  }

  get state(): SliceState {
    return this.stateValue;
  }

  get leaseEnd(): string | undefined {
    return this.leaseEndValue;
  }

  get lastSnapshot(): TopologySnapshot | undefined {
    return this.snapshot;
  }

  get info(): SliceInfo {
    return {
      name: this.name,
      projectId: this.projectId,
      sliceId: this.sliceIdValue,
      state: this.stateValue,
      leaseStart: this.leaseStartValue,
      leaseEnd: this.leaseEndValue,
    };
  }

  /** The slice id, or an InvalidStateError if the slice was never submitted. */
  requireSliceId(): string {
    if (!this.sliceIdValue) {
      throw new InvalidStateError(`Slice "${this.name}" has not been submitted`, this.name);
    }
    return this.sliceIdValue;
  }

  /** Move to a new aggregate state; throws on an illegal transition. */
  transitionTo(target: SliceState): void {
    const result = transitionSliceState(this.stateValue, target);
    if (!result.success) {
      throw new InvalidStateError(
        result.error?.message ?? `Invalid slice state transition: ${this.stateValue} -> ${target}`,
        this.name,
        result.error?.details,
      );
    }
    this.stateValue = target;
    if (target === SliceState.Deleted) this.graph.invalidate();
  }

  updateLifecycle(lifecycle: SliceLifecycle): void {
    if (lifecycle.sliceId !== undefined) this.sliceIdValue = lifecycle.sliceId;
    if (lifecycle.leaseStart !== undefined) this.leaseStartValue = lifecycle.leaseStart;
    if (lifecycle.leaseEnd !== undefined) this.leaseEndValue = lifecycle.leaseEnd;
  }

  recordSnapshot(snapshot: TopologySnapshot): void {
    this.snapshot = snapshot;
  }

  /** Claim the slice's single poll loop. */
  beginPolling(): void {
    if (this.polling) {
      throw new InvalidStateError(`Slice "${this.name}" is already being polled`, this.name);
    }
    this.polling = true;
  }

  endPolling(): void {
    this.polling = false;
  }

  isPolling(): boolean {
    return this.polling;
  }

  /** Restore lifecycle fields from a persisted document without resubmitting. */
  static restore(
    options: SliceOptions,
    graph: TopologyGraph,
    state: SliceState,
    lifecycle: SliceLifecycle,
    snapshot?: TopologySnapshot,
  ): Slice {
    const slice = new Slice(options, graph);
    slice.stateValue = state;
    slice.updateLifecycle(lifecycle);
    slice.snapshot = snapshot;
    if (state === SliceState.Deleted) graph.invalidate();
    return slice;
  }
}
