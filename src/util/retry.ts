export type RetryPolicy = {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
  jitter: boolean;
};

type BackoffOptions = Partial<RetryPolicy> & {
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  sleep?: (ms: number) => Promise<void>;
};

/** Three attempts, waiting 2s then 4s, never more than 10s. */
export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  maxAttempts: 3,
  initialDelayMs: 2_000,
  maxDelayMs: 10_000,
  factor: 2,
  jitter: false,
});

export const NO_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  maxAttempts: 1,
  initialDelayMs: 0,
  maxDelayMs: 0,
  factor: 1,
  jitter: false,
});

const wait = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export const computeDelay = (policy: RetryPolicy, attempt: number, random: () => number = Math.random): number => {
  const exponentialDelay = policy.initialDelayMs * policy.factor ** (attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, policy.maxDelayMs);

  return policy.jitter
    ? Math.round(cappedDelay / 2 + random() * (cappedDelay / 2))
    : Math.round(cappedDelay);
};

export const exponentialBackoff = async <T>(
  action: (attempt: number) => Promise<T>,
  options: BackoffOptions = {},
): Promise<T> => {
  const {
    onRetry,
    shouldRetry,
    sleep = wait,
    ...overrides
  } = options;
  const policy: RetryPolicy = {
    maxAttempts: 5,
    initialDelayMs: 500,
    maxDelayMs: 30_000,
    factor: 2,
    jitter: true,
    ...overrides,
  };
  const maxAttempts = Math.max(1, Math.trunc(policy.maxAttempts));

  let attempt = 0;

  // eslint-disable-next-line no-constant-condition
  while (true) {
    attempt += 1;

    try {
      return await action(attempt);
    } catch (error) {
      if (attempt >= maxAttempts) {
        throw error;
      }

      if (typeof shouldRetry === 'function' && !shouldRetry(error, attempt)) {
        throw error;
      }

      const delay = computeDelay(policy, attempt);

      if (typeof onRetry === 'function') {
        try {
          onRetry(error, attempt, delay);
        } catch (hookError) {
          console.warn('Retry hook threw an error.', hookError);
        }
      }

      await sleep(delay);
    }
  }
};

export type { BackoffOptions };
