import { InvalidStateError, PollingFailedError, RejectedError } from '../../src/domain/errors';
import { SliceState } from '../../src/domain/reservation';
import { TopologySnapshot } from '../../src/domain/snapshot';
import { createVirtualClock } from '../../src/engine/clock';
import {
  DEFAULT_POLLING_CONFIG,
  POLLING_PRESETS,
  PollProgress,
  StabilityPoller,
  WaitStatus,
  mergePollingConfig,
} from '../../src/engine/poller';
import { Reconciler } from '../../src/engine/reconciler';
import { OrchestratorAdapter } from '../../src/orchestrator/adapter';
import { SimulatedOrchestrator } from '../../src/orchestrator/simulated';
import { Slice } from '../../src/topology/slice';
import { TEST_KEYS, pairSlice } from '../helpers/slices';

async function submitTo(orchestrator: OrchestratorAdapter, slice: Slice = pairSlice()): Promise<Slice> {
  const { snapshot } = await orchestrator.submit({
    name: slice.name,
    projectId: slice.projectId,
    sliceKey: TEST_KEYS.publicKey,
    topology: slice.graph.toRequest(),
  });
  slice.graph.markSubmitted();
  slice.transitionTo(SliceState.Submitted);
  new Reconciler().reconcile(slice, snapshot);
  return slice;
}

function queries(orchestrator: SimulatedOrchestrator): number {
  return orchestrator.calls.filter((c) => c.startsWith('query:')).length;
}

describe('mergePollingConfig', () => {
  test('returns defaults when no override is given', () => {
    expect(mergePollingConfig()).toEqual(DEFAULT_POLLING_CONFIG);
  });

  test('overrides only the given fields', () => {
    const config = mergePollingConfig({ pollIntervalMs: 1_000 });
    expect(config.pollIntervalMs).toBe(1_000);
    expect(config.timeoutMs).toBe(DEFAULT_POLLING_CONFIG.timeoutMs);
    expect(config.backoff).toEqual(DEFAULT_POLLING_CONFIG.backoff);
  });

  test('presets are complete configs', () => {
    expect(mergePollingConfig(POLLING_PRESETS.fast)).toEqual(POLLING_PRESETS.fast);
    expect(mergePollingConfig(POLLING_PRESETS.extended).maxTransportRetries).toBe(10);
  });
});

describe('StabilityPoller', () => {
  test('returns Stable after exactly the polls it takes to reach Active', async () => {
    const orchestrator = new SimulatedOrchestrator({ provisioningPolls: 3 });
    const clock = createVirtualClock();
    const slice = await submitTo(orchestrator);
    expect(slice.state).toBe(SliceState.Pending);

    const poller = new StabilityPoller({ adapter: orchestrator, clock });
    const result = await poller.wait(slice, { pollIntervalMs: 10_000 });

    expect(result).toEqual({ status: WaitStatus.Stable, pollCount: 3, elapsedMs: 20_000, failedEntities: [] });
    expect(queries(orchestrator)).toBe(3);
    expect(clock.sleeps).toEqual([10_000, 10_000]);
    expect(slice.state).toBe(SliceState.Stable);
    expect(slice.isPolling()).toBe(false);
  });

  test('reports progress after every poll', async () => {
    const orchestrator = new SimulatedOrchestrator({ provisioningPolls: 2 });
    const slice = await submitTo(orchestrator);
    const progress: PollProgress[] = [];
    const poller = new StabilityPoller({ adapter: orchestrator, clock: createVirtualClock() });
    await poller.wait(slice, { pollIntervalMs: 5_000, timeoutMs: 60_000, onProgress: (p) => progress.push(p) });

    expect(progress.map((p) => [p.pollCount, p.state, p.remainingBudgetMs])).toEqual([
      [1, SliceState.Pending, 60_000],
      [2, SliceState.Stable, 55_000],
    ]);
    expect(progress[0].pendingEntities).toContain('n1');
  });

  test('a failed entity ends the wait with Failed, not an exception', async () => {
    const orchestrator = new SimulatedOrchestrator();
    const slice = await submitTo(orchestrator);
    orchestrator.failEntity(slice.requireSliceId(), 'n2', 'Insufficient resources');

    const poller = new StabilityPoller({ adapter: orchestrator, clock: createVirtualClock() });
    const result = await poller.wait(slice);

    expect(result.status).toBe(WaitStatus.Failed);
    expect(result.pollCount).toBe(1);
    expect(result.failedEntities).toEqual([{ kind: 'node', name: 'n2', errorMessage: 'Insufficient resources' }]);
    expect(slice.state).toBe(SliceState.Failed);
  });

  test('times out once the next poll would exceed the budget', async () => {
    const orchestrator = new SimulatedOrchestrator({ provisioningPolls: 100 });
    const slice = await submitTo(orchestrator);
    const poller = new StabilityPoller({ adapter: orchestrator, clock: createVirtualClock() });
    const result = await poller.wait(slice, { pollIntervalMs: 10_000, timeoutMs: 25_000 });

    expect(result.status).toBe(WaitStatus.TimedOut);
    expect(result.pollCount).toBe(3);
    expect(result.elapsedMs).toBe(20_000);
    expect(slice.state).toBe(SliceState.Pending);
  });

  test('recovers when a query succeeds within the retry budget', async () => {
    const orchestrator = new SimulatedOrchestrator({ provisioningPolls: 1 });
    const clock = createVirtualClock();
    const slice = await submitTo(orchestrator);
    orchestrator.failNextCalls(5);

    const poller = new StabilityPoller({ adapter: orchestrator, clock });
    const result = await poller.wait(slice, { maxTransportRetries: 5 });

    expect(result.status).toBe(WaitStatus.Stable);
    expect(result.pollCount).toBe(1);
    expect(queries(orchestrator)).toBe(6);
    expect(clock.sleeps).toEqual([2_000, 4_000, 8_000, 16_000, 32_000]);
  });

  test('raises PollingFailedError when the retry budget is exceeded', async () => {
    const orchestrator = new SimulatedOrchestrator();
    const slice = await submitTo(orchestrator);
    orchestrator.failNextCalls(6);

    const poller = new StabilityPoller({ adapter: orchestrator, clock: createVirtualClock() });
    const err = await poller.wait(slice, { maxTransportRetries: 5 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PollingFailedError);
    expect(err instanceof PollingFailedError && err.message).toBe(
      'Polling slice "pair" failed after 6 consecutive transport errors',
    );
    expect(slice.isPolling()).toBe(false);
    expect(slice.state).toBe(SliceState.Pending);
  });

  test('transport retries stop when their backoff would outlast the budget', async () => {
    const orchestrator = new SimulatedOrchestrator({ provisioningPolls: 1 });
    const clock = createVirtualClock();
    const slice = await submitTo(orchestrator);
    orchestrator.failNextCalls(4);

    const poller = new StabilityPoller({ adapter: orchestrator, clock });
    const result = await poller.wait(slice, { timeoutMs: 10_000 });

    expect(result).toEqual({ status: WaitStatus.TimedOut, pollCount: 0, elapsedMs: 6_000, failedEntities: [] });
    expect(clock.sleeps).toEqual([2_000, 4_000]);
    expect(queries(orchestrator)).toBe(3);
    expect(slice.state).toBe(SliceState.Pending);
    expect(slice.isPolling()).toBe(false);
  });

  test('each query is given no more than the remaining budget', async () => {
    const orchestrator = new SimulatedOrchestrator({ provisioningPolls: 1 });
    const slice = await submitTo(orchestrator);
    const timeouts: Array<number | undefined> = [];
    const recording: OrchestratorAdapter = {
      submit: (request, options) => orchestrator.submit(request, options),
      query: (sliceId, options) => {
        timeouts.push(options?.timeoutMs);
        return orchestrator.query(sliceId, options);
      },
      delete: (sliceId, options) => orchestrator.delete(sliceId, options),
      renew: (sliceId, leaseEnd, options) => orchestrator.renew(sliceId, leaseEnd, options),
      modify: (sliceId, request, options) => orchestrator.modify(sliceId, request, options),
    };

    const poller = new StabilityPoller({ adapter: recording, clock: createVirtualClock() });
    await poller.wait(slice, { timeoutMs: 5_000, queryTimeoutMs: 30_000 });
    expect(timeouts).toEqual([5_000]);
  });

  test('a query that hangs past its timeout counts as a transport failure', async () => {
    const orchestrator = new SimulatedOrchestrator();
    const slice = await submitTo(orchestrator);
    const hanging: OrchestratorAdapter = {
      submit: (request, options) => orchestrator.submit(request, options),
      query: () => new Promise<TopologySnapshot>(() => undefined),
      delete: (sliceId, options) => orchestrator.delete(sliceId, options),
      renew: (sliceId, leaseEnd, options) => orchestrator.renew(sliceId, leaseEnd, options),
      modify: (sliceId, request, options) => orchestrator.modify(sliceId, request, options),
    };

    const poller = new StabilityPoller({ adapter: hanging, clock: createVirtualClock() });
    await expect(poller.wait(slice, { queryTimeoutMs: 10, maxTransportRetries: 0 })).rejects.toThrow(
      'Polling slice "pair" failed after 1 consecutive transport errors',
    );
  });

  test('an orchestrator rejection is raised at once', async () => {
    const orchestrator = new SimulatedOrchestrator();
    const slice = pairSlice();
    slice.graph.markSubmitted();
    slice.transitionTo(SliceState.Submitted);
    slice.updateLifecycle({ sliceId: 'slice_missing' });

    const poller = new StabilityPoller({ adapter: orchestrator, clock: createVirtualClock() });
    await expect(poller.wait(slice)).rejects.toThrow(RejectedError);
    expect(queries(orchestrator)).toBe(1);
  });

  test('cancellation stops the loop with Canceled', async () => {
    const orchestrator = new SimulatedOrchestrator({ provisioningPolls: 100 });
    const slice = await submitTo(orchestrator);
    const controller = new AbortController();
    const poller = new StabilityPoller({ adapter: orchestrator, clock: createVirtualClock() });

    const result = await poller.wait(slice, {
      signal: controller.signal,
      onProgress: (p) => {
        if (p.pollCount === 2) controller.abort();
      },
    });

    expect(result.status).toBe(WaitStatus.Canceled);
    expect(result.pollCount).toBe(2);
    expect(queries(orchestrator)).toBe(2);
  });

  test('only one wait may poll a slice at a time', async () => {
    const orchestrator = new SimulatedOrchestrator({ provisioningPolls: 2 });
    const slice = await submitTo(orchestrator);
    const poller = new StabilityPoller({ adapter: orchestrator, clock: createVirtualClock() });

    const first = poller.wait(slice);
    await expect(poller.wait(slice)).rejects.toThrow(InvalidStateError);
    await expect(first).resolves.toMatchObject({ status: WaitStatus.Stable });
  });

  test('an unsubmitted slice cannot be waited on', async () => {
    const poller = new StabilityPoller({ adapter: new SimulatedOrchestrator(), clock: createVirtualClock() });
    await expect(poller.wait(pairSlice())).rejects.toThrow('Slice "pair" has not been submitted');
  });

  test('a deleted slice cannot be waited on', async () => {
    const orchestrator = new SimulatedOrchestrator();
    const slice = await submitTo(orchestrator);
    slice.transitionTo(SliceState.Deleted);
    const poller = new StabilityPoller({ adapter: orchestrator, clock: createVirtualClock() });
    await expect(poller.wait(slice)).rejects.toThrow('Slice "pair" has been deleted');
    expect(queries(orchestrator)).toBe(0);
  });
});
