/**
 * Stability Poller.
 *
 * Drives query → merge → aggregate until the slice is Stable or Failed, the
 * wait budget runs out, or the caller cancels. Budgets follow the layered
 * polling configuration: an interval between polls, a total wait budget and
 * a per-query timeout, each overridable through presets or partial configs.
 *
 * Reservation failures and timeouts come back as a status, never thrown.
 * Only exhausting the transport retry budget or an orchestrator rejection
 * is raised.
 */

import { InvalidStateError, PollingFailedError, RejectedError, TransportError } from '../domain/errors';
import { SliceState } from '../domain/reservation';
import { TopologySnapshot } from '../domain/snapshot';
import { Logger, errorContext, logger as rootLogger } from '../logger';
import { OrchestratorAdapter } from '../orchestrator/adapter';
import { Slice } from '../topology/slice';
import { BackoffPolicy, DEFAULT_BACKOFF, TimeoutError, computeBackoff, executeWithTimeout } from './backoff';
import { Clock, systemClock } from './clock';
import { FailedEntity, Reconciler, StabilityScope } from './reconciler';
import { isTerminalSliceState } from './state-machine';

export enum WaitStatus {
  Stable = 'Stable',
  Failed = 'Failed',
  TimedOut = 'TimedOut',
  Canceled = 'Canceled',
}

/** Progress info emitted after every poll. */
export interface PollProgress {
  pollCount: number;
  elapsedMs: number;
  remainingBudgetMs: number;
  state: SliceState;
  pendingEntities: string[];
}

export type PollProgressCallback = (progress: PollProgress) => void;

export interface PollingConfig {
  /** Delay between polls. Default: 10_000 (10s). */
  pollIntervalMs: number;
  /** Total wall-clock budget for the wait. Default: 1_800_000 (30 min). */
  timeoutMs: number;
  /** Per-query timeout. Default: 30_000 (30s). */
  queryTimeoutMs: number;
  /** Consecutive transport failures tolerated before giving up. Default: 5. */
  maxTransportRetries: number;
  /** Delay between transport retries. */
  backoff: BackoffPolicy;
  onProgress?: PollProgressCallback;
}

export interface WaitOptions extends Partial<PollingConfig> {
  signal?: AbortSignal;
  scope?: StabilityScope;
}

export interface WaitResult {
  status: WaitStatus;
  pollCount: number;
  elapsedMs: number;
  failedEntities: FailedEntity[];
}

export const DEFAULT_POLLING_CONFIG: Readonly<PollingConfig> = {
  pollIntervalMs: 10_000,
  timeoutMs: 1_800_000,
  queryTimeoutMs: 30_000,
  maxTransportRetries: 5,
  backoff: DEFAULT_BACKOFF,
};

/** Preset configurations for common slice sizes. */
export const POLLING_PRESETS = {
  /** Small slices on a quiet testbed. */
  fast: {
    pollIntervalMs: 5_000,
    timeoutMs: 600_000,
    queryTimeoutMs: 15_000,
    maxTransportRetries: 3,
    backoff: { strategy: 'fixed', baseMs: 2_000 },
  } satisfies PollingConfig,

  standard: {
    ...DEFAULT_POLLING_CONFIG,
  } satisfies PollingConfig,

  /** Large slices with SmartNICs, GPUs or many sites. */
  extended: {
    pollIntervalMs: 20_000,
    timeoutMs: 3_600_000,
    queryTimeoutMs: 60_000,
    maxTransportRetries: 10,
    backoff: { strategy: 'exponential', baseMs: 5_000, maxMs: 120_000 },
  } satisfies PollingConfig,
} as const;

/**
 * Merge a partial polling config with the defaults.
 * Allows callers to override only the fields they care about.
 */
export function mergePollingConfig(override?: Partial<PollingConfig>): PollingConfig {
  if (!override) return { ...DEFAULT_POLLING_CONFIG };
  return {
    pollIntervalMs: override.pollIntervalMs ?? DEFAULT_POLLING_CONFIG.pollIntervalMs,
    timeoutMs: override.timeoutMs ?? DEFAULT_POLLING_CONFIG.timeoutMs,
    queryTimeoutMs: override.queryTimeoutMs ?? DEFAULT_POLLING_CONFIG.queryTimeoutMs,
    maxTransportRetries: override.maxTransportRetries ?? DEFAULT_POLLING_CONFIG.maxTransportRetries,
    backoff: override.backoff ?? DEFAULT_POLLING_CONFIG.backoff,
    onProgress: override.onProgress,
  };
}

export interface StabilityPollerDeps {
  adapter: OrchestratorAdapter;
  reconciler?: Reconciler;
  clock?: Clock;
  logger?: Logger;
}

export class StabilityPoller {
  private readonly adapter: OrchestratorAdapter;
  private readonly reconciler: Reconciler;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(deps: StabilityPollerDeps) {
    this.adapter = deps.adapter;
    this.clock = deps.clock ?? systemClock;
    this.log = (deps.logger ?? rootLogger).child({ module: 'poller' });
    this.reconciler = deps.reconciler ?? new Reconciler(deps.logger);
  }

  async wait(slice: Slice, options: WaitOptions = {}): Promise<WaitResult> {
    const sliceId = slice.requireSliceId();
    if (isTerminalSliceState(slice.state)) {
      throw new InvalidStateError(`Slice "${slice.name}" has been deleted`, slice.name);
    }
    const { signal, scope, ...overrides } = options;
    const config = mergePollingConfig(overrides);

    slice.beginPolling();
    try {
      return await this.loop(slice, sliceId, config, scope, signal);
    } finally {
      slice.endPolling();
    }
  }

  private async loop(
    slice: Slice,
    sliceId: string,
    config: PollingConfig,
    scope: StabilityScope | undefined,
    signal: AbortSignal | undefined,
  ): Promise<WaitResult> {
    const startedAt = this.clock.now();
    const deadline = startedAt + config.timeoutMs;
    const log = this.log.child({ slice: slice.name, sliceId });
    let pollCount = 0;
    const finish = (status: WaitStatus, failedEntities: FailedEntity[] = []): WaitResult => {
      const result = { status, pollCount, elapsedMs: this.clock.now() - startedAt, failedEntities };
      log.info('Wait finished', { status, pollCount, elapsedMs: result.elapsedMs });
      return result;
    };

    for (;;) {
      if (signal?.aborted) return finish(WaitStatus.Canceled);

      const snapshot = await this.queryWithRetry(slice.name, sliceId, config, deadline, signal, log);
      if (snapshot === WaitStatus.Canceled || snapshot === WaitStatus.TimedOut) return finish(snapshot);
      pollCount++;

      const aggregate = this.reconciler.reconcile(slice, snapshot, scope);
      const now = this.clock.now();
      config.onProgress?.({
        pollCount,
        elapsedMs: now - startedAt,
        remainingBudgetMs: Math.max(0, deadline - now),
        state: aggregate.state,
        pendingEntities: aggregate.pendingEntities,
      });
      log.debug('Poll merged', { pollCount, state: aggregate.state, pending: aggregate.pendingEntities.length });

      if (aggregate.state === SliceState.Stable) return finish(WaitStatus.Stable);
      if (aggregate.state === SliceState.Failed) return finish(WaitStatus.Failed, aggregate.failedEntities);

      if (now + config.pollIntervalMs > deadline) return finish(WaitStatus.TimedOut);
      await this.clock.sleep(config.pollIntervalMs, signal);
    }
  }

  /**
   * One poll's query, retried on transport failures. Each query gets at most
   * the remaining budget; a retry whose backoff would end past the deadline
   * is not attempted and the wait times out instead.
   */
  private async queryWithRetry(
    sliceName: string,
    sliceId: string,
    config: PollingConfig,
    deadline: number,
    signal: AbortSignal | undefined,
    log: Logger,
  ): Promise<TopologySnapshot | WaitStatus.Canceled | WaitStatus.TimedOut> {
    let failures = 0;
    for (;;) {
      const remaining = deadline - this.clock.now();
      if (remaining <= 0) return WaitStatus.TimedOut;
      const timeoutMs = Math.min(config.queryTimeoutMs, remaining);
      try {
        return await executeWithTimeout(
          (querySignal) => this.adapter.query(sliceId, { signal: querySignal, timeoutMs }),
          timeoutMs,
          signal,
          'Slice query',
        );
      } catch (err) {
        if (err instanceof RejectedError) throw err;
        if (signal?.aborted) return WaitStatus.Canceled;
        if (!(err instanceof TransportError) && !(err instanceof TimeoutError)) throw err;

        failures++;
        if (failures > config.maxTransportRetries) {
          throw new PollingFailedError(sliceName, failures, err);
        }
        const delay = computeBackoff(config.backoff, failures);
        if (this.clock.now() + delay > deadline) {
          log.warn('Slice query failed; no budget left to retry', { attempt: failures, ...errorContext(err) });
          return WaitStatus.TimedOut;
        }
        log.warn('Slice query failed, retrying', { attempt: failures, delayMs: delay, ...errorContext(err) });
        await this.clock.sleep(delay, signal);
        if (signal?.aborted) return WaitStatus.Canceled;
      }
    }
  }
}
