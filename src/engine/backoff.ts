/**
 * Retry delays and per-call timeouts shared by the poller and the remote
 * channel.
 */

export type BackoffStrategy = 'fixed' | 'exponential';

export interface BackoffPolicy {
  strategy: BackoffStrategy;
  baseMs: number;
  /** Upper bound for exponential delays. */
  maxMs?: number;
}

export const DEFAULT_BACKOFF: Readonly<BackoffPolicy> = {
  strategy: 'exponential',
  baseMs: 2_000,
  maxMs: 60_000,
};

/** Delay before retry number `attempt` (1-based). */
export function computeBackoff(policy: BackoffPolicy, attempt: number): number {
  if (policy.strategy === 'fixed') return policy.baseMs;
  const delay = policy.baseMs * Math.pow(2, Math.max(0, attempt - 1));
  return policy.maxMs !== undefined ? Math.min(delay, policy.maxMs) : delay;
}

export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number, what = 'Operation') {
    super(`${what} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Run `fn` with its own abort signal, aborted after `timeoutMs` or when
 * `parent` aborts. Rejects with TimeoutError on expiry.
 */
export async function executeWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
  what?: string,
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort();
  if (parent?.aborted) controller.abort();
  parent?.addEventListener('abort', onParentAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(timeoutMs, what));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), expiry]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
