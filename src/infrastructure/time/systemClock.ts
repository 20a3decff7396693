import { setTimeout as delay } from 'node:timers/promises';
import type { ClockPort } from '@/ports/ClockPort';

export const systemClock: ClockPort = {
  now: () => performance.now(),
  sleep: async (ms, signal) => {
    if (signal?.aborted || ms <= 0) {
      return;
    }
    try {
      await delay(ms, undefined, { signal });
    } catch (error) {
      if (!(error instanceof Error && error.name === 'AbortError')) {
        throw error;
      }
    }
  },
};
