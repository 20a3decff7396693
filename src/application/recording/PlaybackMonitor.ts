import type { ClockPort } from '@/ports/ClockPort';
import type { MonitorReason, MonitorResult, PlayerState } from '@/domain/recording/types';
import { sameTrack } from '@/domain/recording/trackHandle';
import { boundedPoll } from '@/shared/async/boundedPoll';
import { errorMessage } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';

export interface PlayerStateSource {
  getState(): Promise<PlayerState>;
}

export type MonitorOptions = {
  trackHandle: string;
  expectedDurationSec: number;
  /** Hard bound past the expected duration for a stuck or misreporting player. */
  safetyMarginSec: number;
  pollIntervalMs: number;
  /** Distance from the expected end that counts as "ended" (reporting lag). */
  endThresholdSec: number;
  /** Extra capture after a detected end, to keep the true tail. */
  graceMs: number;
  signal?: AbortSignal;
};

type EndReason = Extract<MonitorReason, 'stopped' | 'end-threshold' | 'track-changed'>;

const GRACE_REASONS = new Set<EndReason>(['stopped', 'end-threshold']);

/**
 * Watches playback until the track ends. Never throws: the hard bound
 * `expectedDuration + safetyMargin` always ends the loop.
 */
export class PlaybackMonitor {
  private readonly log = createLogger('Recorder', 'Monitor');

  constructor(
    private readonly player: PlayerStateSource,
    private readonly clock: ClockPort,
  ) {}

  public async runUntilTrackEnd(options: MonitorOptions): Promise<MonitorResult> {
    const { signal } = options;
    const hardLimitMs = Math.max(0, (options.expectedDurationSec + options.safetyMarginSec) * 1000);
    const endPositionSec = options.expectedDurationSec - options.endThresholdSec;
    const startedAt = this.clock.now();
    let seenPlaying = false;
    let lastPositionSec: number | null = null;

    const result = await boundedPoll<EndReason>({
      intervalMs: options.pollIntervalMs,
      timeoutMs: hardLimitMs,
      clock: this.clock,
      signal,
      probe: async () => {
        const state = await this.readState();
        if (state.positionSec !== null) {
          lastPositionSec = state.positionSec;
        }
        if (state.status === 'Playing') {
          seenPlaying = true;
        }
        this.log.spam('playback poll', { status: state.status, position: state.positionSec });

        if (state.trackId !== null && !sameTrack(state.trackId, options.trackHandle)) {
          return 'track-changed';
        }
        if (seenPlaying && (state.status === 'Paused' || state.status === 'Stopped')) {
          return 'stopped';
        }
        if (state.positionSec !== null && state.positionSec > 0 && state.positionSec >= endPositionSec) {
          return 'end-threshold';
        }
        return undefined;
      },
    });

    let reason: MonitorReason;
    if (result.kind === 'matched') {
      reason = result.value;
      this.log.info('track end detected', { reason, position: lastPositionSec });
      if (GRACE_REASONS.has(result.value)) {
        const remainingMs = hardLimitMs - (this.clock.now() - startedAt);
        await this.clock.sleep(Math.max(0, Math.min(options.graceMs, remainingMs)), signal);
      }
    } else if (result.kind === 'cancelled') {
      reason = 'cancelled';
    } else {
      reason = 'safety-timeout';
      this.log.warn('track end not detected; hard bound reached', {
        expectedDurationSec: options.expectedDurationSec,
        position: lastPositionSec,
      });
    }

    return {
      reason: signal?.aborted ? 'cancelled' : reason,
      elapsedMs: this.clock.now() - startedAt,
      polls: result.attempts,
      lastPositionSec,
    };
  }

  private async readState(): Promise<PlayerState> {
    try {
      return await this.player.getState();
    } catch (error) {
      this.log.debug('player state read failed', { message: errorMessage(error) });
      return { status: 'Unknown', positionSec: null, trackId: null };
    }
  }
}
