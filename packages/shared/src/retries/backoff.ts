export type BackoffOptions = {
  baseMs?: number;
  factor?: number;
  maxMs?: number;
  jitterRatio?: number;
  random?: () => number;
};

const DEFAULT_BACKOFF: Required<Omit<BackoffOptions, 'random'>> = {
  baseMs: 1_000,
  factor: 2,
  maxMs: 30_000,
  jitterRatio: 0.2
};

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(Math.max(value, min), max);
}

export function computeExponentialBackoff(attempt: number, options: BackoffOptions = {}): number {
  const normalizedAttempt = Math.max(1, Math.floor(attempt));

  const {
    baseMs = DEFAULT_BACKOFF.baseMs,
    factor = DEFAULT_BACKOFF.factor,
    maxMs = DEFAULT_BACKOFF.maxMs,
    jitterRatio = DEFAULT_BACKOFF.jitterRatio,
    random
  } = options;

  const rawDelay = baseMs * Math.pow(factor, normalizedAttempt - 1);
  const cappedDelay = clamp(rawDelay, baseMs, maxMs);

  if (jitterRatio <= 0) {
    return Math.round(cappedDelay);
  }

  const randomFn = typeof random === 'function' ? random : Math.random;
  const jitterSpan = cappedDelay * jitterRatio;
  const jitter = (randomFn() * 2 - 1) * jitterSpan;
  const jittered = clamp(cappedDelay + jitter, baseMs, maxMs);

  return Math.round(jittered);
}

export type RetryAttemptInfo = {
  attempt: number;
  delayMs: number;
  error: unknown;
};

export type RetryOptions = {
  retries: number;
  backoff?: BackoffOptions;
  signal?: AbortSignal;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (info: RetryAttemptInfo) => void;
};

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('Operation aborted');
}

function sleep(delayMs: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new Error('Operation aborted'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, delayMs);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs `operation` up to `retries + 1` times. The attempt number handed to the
 * operation starts at 1. Aborting `signal` stops the loop between attempts and
 * rejects with the abort reason.
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const maxAttempts = Math.max(0, Math.floor(options.retries)) + 1;
  let attempt = 1;

  for (;;) {
    try {
      return await operation(attempt);
    } catch (error) {
      const retryable = options.shouldRetry ? options.shouldRetry(error) : true;
      if (attempt >= maxAttempts || !retryable || options.signal?.aborted) {
        throw error;
      }
      const delayMs = computeExponentialBackoff(attempt, options.backoff);
      options.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs, options.signal);
      attempt += 1;
    }
  }
}
