/**
 * Injectable time source.
 *
 * The poller and the remote channel read time and sleep only through a
 * Clock, so tests can drive them with a virtual clock instead of real
 * delays.
 */

export interface Clock {
  /** Milliseconds since an arbitrary origin. */
  now(): number;
  /** Resolve after `ms`, or early when `signal` aborts. Never rejects. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    }),
};

/** A clock whose time only moves when something sleeps on it. */
export interface VirtualClock extends Clock {
  /** Every requested sleep duration, in call order. */
  readonly sleeps: readonly number[];
  advance(ms: number): void;
}

export function createVirtualClock(startMs = 0): VirtualClock {
  let current = startMs;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => current,
    advance(ms: number) {
      current += ms;
    },
    async sleep(ms: number, signal?: AbortSignal) {
      sleeps.push(ms);
      if (signal?.aborted) return;
      current += ms;
    },
  };
}
