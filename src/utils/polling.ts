/**
 * Polling Utilities
 */

export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface PollOptions {
  timeoutMs: number;
  intervalMs: number;
  sleeper?: Sleeper;
}

/**
 * Calls `read` until `done` accepts its value or the timeout budget is spent.
 * The budget is counted in intervals, so a fake sleeper needs no clock.
 */
export async function pollUntil<T>(
  read: () => Promise<T>,
  done: (value: T) => boolean,
  options: PollOptions
): Promise<{ met: boolean; last: T; attempts: number }> {
  const sleeper = options.sleeper ?? sleep;
  const maxAttempts = Math.max(1, Math.floor(options.timeoutMs / Math.max(options.intervalMs, 1)) + 1);
  let attempts = 0;

  for (;;) {
    const last = await read();
    attempts++;
    if (done(last)) {
      return { met: true, last, attempts };
    }
    if (attempts >= maxAttempts) {
      return { met: false, last, attempts };
    }
    await sleeper(options.intervalMs);
  }
}
