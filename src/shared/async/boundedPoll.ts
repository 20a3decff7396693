import type { ClockPort } from '@/ports/ClockPort';

export type PollOptions<T> = {
  intervalMs: number;
  timeoutMs: number;
  clock: ClockPort;
  /** Returns a value to stop polling, or undefined to keep going. */
  probe: (attempt: number) => Promise<T | undefined>;
  signal?: AbortSignal;
};

export type PollResult<T> =
  | { kind: 'matched'; value: T; attempts: number; elapsedMs: number }
  | { kind: 'timeout'; attempts: number; elapsedMs: number }
  | { kind: 'cancelled'; attempts: number; elapsedMs: number };

/**
 * Calls `probe` until it yields a value, the timeout elapses or the signal
 * aborts. A timeout is only reported once `timeoutMs` has fully elapsed, and the
 * probe always runs once more at the deadline.
 */
export async function boundedPoll<T>(options: PollOptions<T>): Promise<PollResult<T>> {
  const { clock, signal } = options;
  const intervalMs = Math.max(0, options.intervalMs);
  const timeoutMs = Math.max(0, options.timeoutMs);
  const startedAt = clock.now();
  let attempts = 0;

  for (;;) {
    if (signal?.aborted) {
      return { kind: 'cancelled', attempts, elapsedMs: clock.now() - startedAt };
    }
    attempts += 1;
    const value = await options.probe(attempts);
    const elapsedMs = clock.now() - startedAt;
    if (signal?.aborted) {
      return { kind: 'cancelled', attempts, elapsedMs };
    }
    if (value !== undefined) {
      return { kind: 'matched', value, attempts, elapsedMs };
    }
    if (elapsedMs >= timeoutMs) {
      return { kind: 'timeout', attempts, elapsedMs };
    }
    await clock.sleep(Math.min(intervalMs, timeoutMs - elapsedMs), signal);
  }
}
