import type { ClockPort } from '@/ports/ClockPort';

export type TimedResult<T> = { kind: 'settled'; value: T } | { kind: 'timeout' };

/**
 * Races `promise` against a clock-driven deadline. The losing sleep is
 * aborted so no timer outlives the call.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  clock: ClockPort,
): Promise<TimedResult<T>> {
  const deadline = new AbortController();
  const settled = promise.then((value): TimedResult<T> => ({ kind: 'settled', value }));
  const expired = clock
    .sleep(timeoutMs, deadline.signal)
    .then((): TimedResult<T> => ({ kind: 'timeout' }));
  try {
    return await Promise.race([settled, expired]);
  } finally {
    deadline.abort();
  }
}
