/**
 * Slice Client.
 *
 * The context object a program holds to work with slices: it wires the
 * orchestrator adapter, the remote channel, the state store, the event
 * publisher and the logger, and exposes the slice lifecycle as plain
 * methods.
 *
 * Usage:
 *   const client = SliceClient.fromSettings(requireSettings(await loadSettings()), { adapter });
 *   const slice = client.createSlice('demo');
 *   slice.graph.addNode('n1', { site: 'STAR', image: 'default_ubuntu_22', instanceType: 'c2.m8.d10' });
 *   await client.submit(slice);
 *   const result = await client.wait(slice, POLLING_PRESETS.fast);
 *   if (result.status === WaitStatus.Stable) await client.configure(slice);
 *   await client.modify(slice, (graph) => graph.addNode('n2', { site: 'TACC', image: 'default_rocky_9', instanceType: 'c2.m8.d10' }));
 *   await client.wait(slice);
 */

import { Settings, bastionSettings, loadSliceKeys, requireSettings, sliceKeySettings } from './config/settings';
import { ConfigureOptions, ConfigureResult, PostBootConfigurator } from './configure/post-boot';
import {
  InvalidSpecError,
  InvalidStateError,
  InvalidTopologyError,
  StateFileError,
  TransportError,
} from './domain/errors';
import { SliceEventType } from './domain/events';
import { SliceState } from './domain/reservation';
import { SliceRequest } from './domain/request';
import { TopologySnapshot } from './domain/snapshot';
import { SliceKeyPair } from './domain/topology';
import { TimeoutError, executeWithTimeout } from './engine/backoff';
import { Clock, systemClock } from './engine/clock';
import {
  PollingConfig,
  StabilityPoller,
  WaitOptions,
  WaitResult,
} from './engine/poller';
import { AggregateResult, Reconciler, StabilityScope } from './engine/reconciler';
import { isTerminalSliceState } from './engine/state-machine';
import { SliceEventPublisher } from './events/publisher';
import { Logger, logger as rootLogger, parseLogLevel, setLogLevel } from './logger';
import { CallOptions, OrchestratorAdapter } from './orchestrator/adapter';
import { CommandOptions, RemoteChannel, WaitForSshOptions, WaitForSshResult, targetOf } from './remote/channel';
import { ExecResult } from './remote/connector';
import { restoreSlice, toDocument } from './storage/document';
import { FileSliceStore } from './storage/file-store';
import { SliceStateStore } from './storage/store';
import { CapabilityCatalog, getDefaultCatalog } from './topology/catalog';
import { TopologyGraph } from './topology/graph';
import { Slice } from './topology/slice';

export interface SliceClientOptions {
  adapter: OrchestratorAdapter;
  /** Needed for configure, executeOn and waitForSsh. */
  channel?: RemoteChannel;
  store?: SliceStateStore;
  settings?: Settings;
  /** Key pair used for slices created without their own. */
  sliceKeys?: SliceKeyPair;
  catalog?: CapabilityCatalog;
  /** Polling defaults for wait(); per-call options override them. */
  polling?: Partial<PollingConfig>;
  /** Timeout of submit, delete and renew calls. Default: 120_000. */
  callTimeoutMs?: number;
  /** Concurrency of configure() when a call gives none. */
  configureConcurrency?: number;
  events?: SliceEventPublisher;
  clock?: Clock;
  logger?: Logger;
}

export interface SubmitOptions {
  /** Requested lease end. */
  leaseEnd?: Date | string;
  signal?: AbortSignal;
}

const DEFAULT_CALL_TIMEOUT_MS = 120_000;

export class SliceClient {
  readonly events: SliceEventPublisher;
  readonly reconciler: Reconciler;
  private readonly adapter: OrchestratorAdapter;
  private readonly channel?: RemoteChannel;
  private readonly store?: SliceStateStore;
  private readonly settings?: Settings;
  private readonly catalog: CapabilityCatalog;
  private readonly poller: StabilityPoller;
  private readonly configurator?: PostBootConfigurator;
  private readonly polling: Partial<PollingConfig>;
  private readonly callTimeoutMs: number;
  private readonly configureConcurrency?: number;
  private readonly log: Logger;
  private sliceKeys?: SliceKeyPair;

  constructor(options: SliceClientOptions) {
    const base = options.logger ?? rootLogger;
    this.log = base.child({ module: 'client' });
    this.adapter = options.adapter;
    this.channel = options.channel;
    this.store = options.store;
    this.settings = options.settings;
    this.sliceKeys = options.sliceKeys;
    this.catalog = options.catalog ?? getDefaultCatalog();
    this.polling = options.polling ?? {};
    this.callTimeoutMs = options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.configureConcurrency = options.configureConcurrency;
    this.events = options.events ?? new SliceEventPublisher(undefined, base);
    this.reconciler = new Reconciler(base);
    this.poller = new StabilityPoller({
      adapter: this.adapter,
      reconciler: this.reconciler,
      clock: options.clock ?? systemClock,
      logger: base,
    });
    if (this.channel) {
      this.configurator = new PostBootConfigurator({ channel: this.channel, reconciler: this.reconciler, logger: base });
    }

    const level = parseLogLevel(this.settings?.logLevel);
    if (level !== undefined) setLogLevel(level);
  }

  /**
   * Build a client from validated settings: a remote channel through the
   * configured bastion and a file store under the data directory.
   */
  static fromSettings(
    settings: Settings,
    options: Omit<SliceClientOptions, 'settings' | 'channel' | 'store'> &
      Partial<Pick<SliceClientOptions, 'channel' | 'store'>>,
  ): SliceClient {
    requireSettings(settings);
    const channel =
      options.channel ??
      new RemoteChannel({
        bastion: bastionSettings(settings),
        sliceKey: sliceKeySettings(settings),
        clock: options.clock,
        logger: options.logger,
      });
    const store = options.store ?? new FileSliceStore(settings.dataDir, options.logger);
    return new SliceClient({ ...options, settings, channel, store });
  }

  /** A new, unsubmitted slice. The project defaults to the configured one. */
  createSlice(name: string, projectId?: string, keys?: SliceKeyPair): Slice {
    const project = projectId ?? this.settings?.projectId;
    if (!project) {
      throw new InvalidStateError(`Slice "${name}" needs a project id; none is configured`, name);
    }
    return new Slice({ name, projectId: project, keys, catalog: this.catalog });
  }

  /**
   * Validate the topology and hand it to the orchestrator. The first
   * snapshot is merged right away; waiting is a separate step.
   */
  async submit(slice: Slice, options: SubmitOptions = {}): Promise<AggregateResult> {
    if (slice.state !== SliceState.Unsubmitted) {
      throw new InvalidStateError(`Slice "${slice.name}" was already submitted (state ${slice.state})`, slice.name);
    }
    this.assertValid(slice);

    const leaseEnd = toIso(options.leaseEnd);
    if (options.leaseEnd !== undefined && leaseEnd === undefined) {
      throw new InvalidSpecError(`Invalid lease end: ${String(options.leaseEnd)}`, slice.name);
    }
    const keys = await this.keysFor(slice);
    const request: SliceRequest = {
      name: slice.name,
      projectId: slice.projectId,
      sliceKey: keys.publicKey,
      leaseEnd,
      topology: slice.graph.toRequest(),
    };

    this.log.info('Submitting slice', {
      slice: slice.name,
      nodes: request.topology.nodes.length,
      networkServices: request.topology.networkServices.length,
    });
    const result = await this.call('Slice submission', options.signal, (call) => this.adapter.submit(request, call));

    slice.keys ??= keys;
    slice.graph.markSubmitted();
    slice.transitionTo(SliceState.Submitted);
    slice.updateLifecycle({ sliceId: result.sliceId });
    this.publish('slice.submitted', slice, { leaseEnd: request.leaseEnd });

    return this.tracked(slice, () => this.reconciler.reconcile(slice, result.snapshot));
  }

  /**
   * Change a submitted slice once it has settled. `changes` runs against the
   * reopened graph and may add or remove entities; the resulting topology
   * replaces the one at the orchestrator. The graph is put back as it was
   * when the changes, the validation or the call fail. The first snapshot
   * is merged; polling resumes with wait().
   */
  async modify(
    slice: Slice,
    changes: (graph: TopologyGraph) => void,
    options: { signal?: AbortSignal } = {},
  ): Promise<AggregateResult> {
    const sliceId = slice.requireSliceId();
    if (slice.state !== SliceState.Stable && slice.state !== SliceState.Failed) {
      throw new InvalidStateError(
        `Slice "${slice.name}" can only be modified once it is Stable or Failed (state ${slice.state})`,
        slice.name,
      );
    }
    if (slice.isPolling()) {
      throw new InvalidStateError(`Slice "${slice.name}" is being polled`, slice.name);
    }

    const before = memberNames(slice.graph);
    const undo = slice.graph.reopen();
    let snapshot: TopologySnapshot;
    try {
      changes(slice.graph);
      this.assertValid(slice);
      const keys = await this.keysFor(slice);
      const request: SliceRequest = {
        name: slice.name,
        projectId: slice.projectId,
        sliceKey: keys.publicKey,
        topology: slice.graph.toRequest(),
      };
      this.log.info('Modifying slice', {
        slice: slice.name,
        sliceId,
        nodes: request.topology.nodes.length,
        networkServices: request.topology.networkServices.length,
      });
      snapshot = await this.call('Slice modification', options.signal, (call) =>
        this.adapter.modify(sliceId, request, call),
      );
    } catch (err) {
      undo();
      throw err;
    }

    slice.graph.markSubmitted();
    const after = memberNames(slice.graph);
    this.publish('slice.modified', slice, {
      added: after.filter((name) => !before.includes(name)),
      removed: before.filter((name) => !after.includes(name)),
    });
    return this.tracked(slice, () => {
      if (slice.state === SliceState.Failed) slice.transitionTo(SliceState.Pending);
      return this.reconciler.reconcile(slice, snapshot);
    });
  }

  /** One query and merge, without waiting. */
  async refresh(slice: Slice, options: { scope?: StabilityScope; signal?: AbortSignal } = {}): Promise<AggregateResult> {
    const sliceId = slice.requireSliceId();
    const snapshot = await this.call('Slice query', options.signal, (call) => this.adapter.query(sliceId, call));
    return this.tracked(slice, () => this.reconciler.reconcile(slice, snapshot, options.scope));
  }

  async wait(slice: Slice, options: WaitOptions = {}): Promise<WaitResult> {
    const before = slice.state;
    const result = await this.poller.wait(slice, { ...this.polling, ...options });
    this.announceState(slice, before);
    this.publish('slice.wait_finished', slice, {
      status: result.status,
      pollCount: result.pollCount,
      elapsedMs: result.elapsedMs,
      failedEntities: result.failedEntities,
    });
    return result;
  }

  /** Run post-boot configuration on the slice's nodes. */
  async configure(slice: Slice, options: ConfigureOptions = {}): Promise<ConfigureResult> {
    const configurator = this.configurator;
    if (!configurator) {
      throw new InvalidStateError('Configuring nodes needs a remote channel', slice.name);
    }
    const result = await configurator.configure(slice, {
      ...options,
      concurrency: options.concurrency ?? this.configureConcurrency,
    });
    for (const node of result.configured) {
      this.publish('node.configured', slice, {}, node);
    }
    for (const [node, error] of Object.entries(result.failures)) {
      this.publish('node.configuration_failed', slice, { error: error.message, errorName: error.name }, node);
    }
    return result;
  }

  /**
   * Delete the slice at the orchestrator, or only locally when it was never
   * submitted. The graph cannot be changed afterwards. A stored document of
   * the slice is removed.
   */
  async delete(slice: Slice, options: { signal?: AbortSignal } = {}): Promise<void> {
    if (isTerminalSliceState(slice.state)) return;
    const sliceId = slice.sliceId;
    if (sliceId !== undefined) {
      await this.call('Slice deletion', options.signal, (call) => this.adapter.delete(sliceId, call));
    }
    const before = slice.state;
    slice.transitionTo(SliceState.Deleted);
    this.announceState(slice, before);
    this.publish('slice.deleted', slice);
    if (this.store) await this.store.delete(slice.name);
    this.log.info('Slice deleted', { slice: slice.name, sliceId });
  }

  /** Extend the lease to `leaseEnd`. */
  async renew(slice: Slice, leaseEnd: Date | string, options: { signal?: AbortSignal } = {}): Promise<void> {
    const sliceId = slice.requireSliceId();
    if (isTerminalSliceState(slice.state)) {
      throw new InvalidStateError(`Slice "${slice.name}" has been deleted`, slice.name);
    }
    const end = toIso(leaseEnd);
    if (end === undefined) throw new InvalidSpecError(`Invalid lease end: ${String(leaseEnd)}`, slice.name);
    await this.call('Lease renewal', options.signal, (call) => this.adapter.renew(sliceId, end, call));
    slice.updateLifecycle({ leaseEnd: end });
    this.publish('slice.renewed', slice, { leaseEnd: end });
    this.log.info('Slice renewed', { slice: slice.name, leaseEnd: end });
  }

  /** Persist the slice so another process can resume it. */
  async save(slice: Slice): Promise<void> {
    await this.requireStore().save(toDocument(slice));
  }

  /** Restore a saved slice without contacting the orchestrator; null when none is stored. */
  async load(sliceName: string): Promise<Slice | null> {
    const raw = await this.requireStore().load(sliceName);
    if (raw === null) return null;
    const slice = restoreSlice(raw, this.catalog);
    if (slice.name !== sliceName) {
      throw new StateFileError(`Stored document for "${sliceName}" describes slice "${slice.name}"`);
    }
    return slice;
  }

  async listSaved(): Promise<string[]> {
    return this.requireStore().list();
  }

  /** Run one command on a node of the slice. */
  async executeOn(slice: Slice, node: string, command: string, options: CommandOptions = {}): Promise<ExecResult> {
    return this.requireChannel().execute(targetOf(slice.graph, node), command, options);
  }

  async uploadTo(slice: Slice, node: string, localPath: string, remotePath: string): Promise<void> {
    await this.requireChannel().upload(targetOf(slice.graph, node), localPath, remotePath);
  }

  async downloadFrom(slice: Slice, node: string, remotePath: string, localPath: string): Promise<void> {
    await this.requireChannel().download(targetOf(slice.graph, node), remotePath, localPath);
  }

  /** Wait until every node of the slice (or the given ones) accepts SSH. */
  async waitForSsh(slice: Slice, options: WaitForSshOptions & { nodes?: string[] } = {}): Promise<WaitForSshResult> {
    const names = options.nodes ?? slice.graph.listNodes().map((n) => n.name);
    return this.requireChannel().waitForSsh(
      names.map((name) => targetOf(slice.graph, name)),
      options,
    );
  }

  private assertValid(slice: Slice): void {
    const validation = slice.graph.validate();
    if (!validation.valid) {
      throw new InvalidTopologyError(
        `Topology of slice "${slice.name}" is invalid: ${validation.errors.map((e) => e.message).join('; ')}`,
        slice.name,
        { errors: validation.errors },
      );
    }
    for (const warning of validation.warnings) {
      this.log.warn('Topology warning', { slice: slice.name, warning });
    }
  }

  private async keysFor(slice: Slice): Promise<SliceKeyPair> {
    if (slice.keys) return slice.keys;
    if (!this.sliceKeys && this.settings) {
      this.sliceKeys = await loadSliceKeys(this.settings);
    }
    if (!this.sliceKeys) {
      throw new InvalidStateError(`Slice "${slice.name}" has no key pair and none is configured`, slice.name);
    }
    return this.sliceKeys;
  }

  /** An orchestrator call under the client's timeout. Expiry is a transport failure. */
  private async call<T>(
    what: string,
    signal: AbortSignal | undefined,
    fn: (options: CallOptions) => Promise<T>,
  ): Promise<T> {
    try {
      return await executeWithTimeout(
        (callSignal) => fn({ signal: callSignal, timeoutMs: this.callTimeoutMs }),
        this.callTimeoutMs,
        signal,
        what,
      );
    } catch (err) {
      if (err instanceof TimeoutError) throw new TransportError(err.message, { cause: err });
      throw err;
    }
  }

  private tracked(slice: Slice, fn: () => AggregateResult): AggregateResult {
    const before = slice.state;
    const result = fn();
    this.announceState(slice, before);
    return result;
  }

  private announceState(slice: Slice, before: SliceState): void {
    if (slice.state === before) return;
    this.log.info('Slice state changed', { slice: slice.name, from: before, to: slice.state });
    this.publish('slice.state_changed', slice, { from: before, to: slice.state });
  }

  private publish(type: SliceEventType, slice: Slice, payload: Record<string, unknown> = {}, node?: string): void {
    this.events.publish(type, { name: slice.name, sliceId: slice.sliceId }, payload, node);
  }

  private requireStore(): SliceStateStore {
    if (!this.store) throw new InvalidStateError('No slice state store is configured');
    return this.store;
  }

  private requireChannel(): RemoteChannel {
    if (!this.channel) throw new InvalidStateError('No remote channel is configured');
    return this.channel;
  }
}

/** Names of the nodes and network services, in graph order. */
function memberNames(graph: TopologyGraph): string[] {
  return [...graph.listNodes().map((n) => n.name), ...graph.listNetworkServices().map((s) => s.name)];
}

function toIso(value: Date | string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const date = typeof value === 'string' ? new Date(value) : value;
  return Number.isNaN(date.getTime()) ? undefined : date.toISOString();
}
