import { TimeoutError, computeBackoff, executeWithTimeout } from '../../src/engine/backoff';
import { createVirtualClock } from '../../src/engine/clock';

describe('computeBackoff', () => {
  test('fixed strategy repeats the base delay', () => {
    const policy = { strategy: 'fixed' as const, baseMs: 10_000 };
    expect([1, 2, 5].map((n) => computeBackoff(policy, n))).toEqual([10_000, 10_000, 10_000]);
  });

  test('exponential strategy doubles up to the cap', () => {
    const policy = { strategy: 'exponential' as const, baseMs: 1_000, maxMs: 5_000 };
    expect([1, 2, 3, 4, 5].map((n) => computeBackoff(policy, n))).toEqual([1_000, 2_000, 4_000, 5_000, 5_000]);
  });
});

describe('executeWithTimeout', () => {
  test('resolves with the function result', async () => {
    await expect(executeWithTimeout(async () => 42, 1_000)).resolves.toBe(42);
  });

  test('rejects with TimeoutError and aborts the inner signal', async () => {
    let inner: AbortSignal | undefined;
    const never = (signal: AbortSignal) => {
      inner = signal;
      return new Promise<never>(() => undefined);
    };
    const err = await executeWithTimeout(never, 20, undefined, 'Slice query').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TimeoutError);
    expect(err instanceof Error && err.message).toBe('Slice query timed out after 20ms');
    expect(inner?.aborted).toBe(true);
  });

  test('propagates a parent abort to the inner signal', async () => {
    const parent = new AbortController();
    parent.abort();
    const seen = await executeWithTimeout(async (signal) => signal.aborted, 1_000, parent.signal);
    expect(seen).toBe(true);
  });
});

describe('virtual clock', () => {
  test('records sleeps and moves time', async () => {
    const clock = createVirtualClock(100);
    await clock.sleep(50);
    clock.advance(25);
    expect(clock.now()).toBe(175);
    expect(clock.sleeps).toEqual([50]);
  });

  test('an aborted sleep records the request but does not move time', async () => {
    const clock = createVirtualClock();
    const controller = new AbortController();
    controller.abort();
    await clock.sleep(1_000, controller.signal);
    expect(clock.now()).toBe(0);
    expect(clock.sleeps).toEqual([1_000]);
  });
});
