export type SleepFn = (ms: number) => Promise<void>;

export const defaultSleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface PollOptions {
  /** Maximum number of checks before giving up */
  attempts: number;
  /** Delay between two checks */
  intervalMs: number;
  sleep?: SleepFn;
}

export type PollResult<T> =
  | { status: 'ready'; value: T; attempts: number }
  | { status: 'timeout'; attempts: number };

/**
 * Run `check` until it yields a value or the attempt budget is spent.
 * `undefined` means "not ready yet"; thrown errors propagate immediately.
 * There is no sleep after the final attempt.
 */
export async function poll<T>(
  check: (attempt: number) => Promise<T | undefined>,
  options: PollOptions,
): Promise<PollResult<T>> {
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    const value = await check(attempt);
    if (value !== undefined) {
      return { status: 'ready', value, attempts: attempt };
    }
    if (attempt < options.attempts) {
      await sleep(options.intervalMs);
    }
  }

  return { status: 'timeout', attempts: options.attempts };
}
