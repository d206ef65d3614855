export type RetryPolicy = {
  baseDelayMs: number;
  maxDelayMs: number;
  maxAttempts: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  baseDelayMs: 200,
  maxDelayMs: 5_000,
  maxAttempts: 5,
};

export function resolveRetryPolicy(partial: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy = { ...DEFAULT_RETRY_POLICY, ...partial };
  if (!Number.isFinite(policy.baseDelayMs) || policy.baseDelayMs < 0) {
    throw new Error(`invalid baseDelayMs: ${policy.baseDelayMs}`);
  }
  if (!Number.isFinite(policy.maxDelayMs) || policy.maxDelayMs < policy.baseDelayMs) {
    throw new Error(`invalid maxDelayMs: ${policy.maxDelayMs}`);
  }
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new Error(`invalid maxAttempts: ${policy.maxAttempts}`);
  }
  return policy;
}

/**
 * Delay before retry number `failedAttempts` (1-based): `base * 2^(n-1)`, capped.
 */
export function backoffDelay(policy: RetryPolicy, failedAttempts: number): number {
  const exp = Math.max(0, failedAttempts - 1);
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** exp);
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<boolean>;

/**
 * Resolves true after `ms`, or false as soon as `signal` aborts.
 */
export const sleep: Sleep = (ms, signal) => {
  if (!Number.isFinite(ms) || ms < 0) throw new Error(`invalid sleep: ${ms}`);
  if (signal?.aborted) return Promise.resolve(false);
  if (ms === 0) return Promise.resolve(true);

  return new Promise((resolve) => {
    let done = false;
    const timer = setTimeout(() => {
      if (done) return;
      done = true;
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);

    const onAbort = () => {
      if (done) return;
      done = true;
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      resolve(false);
    };

    signal?.addEventListener("abort", onAbort);
  });
};

export type TimeoutScope = {
  signal: AbortSignal;
  dispose: () => void;
};

/**
 * Signal that aborts after `ms` or when `parent` aborts, whichever is first.
 */
export function timeoutSignal(ms: number, parent?: AbortSignal): TimeoutScope {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new Error(`timed out after ${ms}ms`)), ms);
  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent) {
    if (parent.aborted) controller.abort(parent.reason);
    else parent.addEventListener("abort", onParentAbort, { once: true });
  }
  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}
