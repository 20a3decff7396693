import type { ClockPort } from '@/ports/ClockPort';
import type { PlayerControlPort } from '@/ports/PlayerControlPort';
import type { PlaybackStatus, PlayerState } from '@/domain/recording/types';
import { failure, success, type Outcome } from '@/domain/recording/errors';
import { sameTrack } from '@/domain/recording/trackHandle';
import { boundedPoll } from '@/shared/async/boundedPoll';
import { withTimeout } from '@/shared/async/withTimeout';
import { bestEffort, errorMessage } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';

export type PlayerTiming = {
  probeTimeoutMs: number;
  relaunchDelayMs: number;
  startupTimeoutMs: number;
  startupPollMs: number;
  activateSettleMs: number;
  openSettleMs: number;
  pauseSettleMs: number;
  seekSettleMs: number;
  trackLoadPollMs: number;
  pauseConfirmPollMs: number;
};

/** MPRIS placeholder used for SetPosition when the current track id cannot be read. */
export const PLACEHOLDER_TRACK_PATH = '/org/mpris/MediaPlayer2/Track/0';

const KNOWN_STATUSES = new Set<PlaybackStatus>(['Playing', 'Paused', 'Stopped']);

export function parsePlaybackStatus(raw: string | null | undefined): PlaybackStatus {
  const trimmed = (raw ?? '').trim();
  for (const status of KNOWN_STATUSES) {
    if (status.toLowerCase() === trimmed.toLowerCase()) {
      return status;
    }
  }
  return 'Unknown';
}

/**
 * Drives the player through its remote-control protocol. Commands carry no
 * acknowledgment, so every transition is confirmed by a later poll.
 */
export class PlayerController {
  private readonly log = createLogger('Recorder', 'Player');

  constructor(
    private readonly control: PlayerControlPort,
    private readonly clock: ClockPort,
    private readonly timing: PlayerTiming,
  ) {}

  /**
   * Makes sure the player answers on its control endpoint, relaunching it once
   * when the process is missing or unresponsive.
   */
  public async ensureRunning(signal?: AbortSignal): Promise<Outcome<'reused' | 'launched'>> {
    const running = await bestEffort(() => this.control.isProcessRunning(), {
      fallback: false,
      onError: 'debug',
      log: this.log,
      label: 'player process probe failed',
    });
    if (running && (await this.isResponsive())) {
      this.log.debug('reusing running player');
      return success('reused');
    }

    this.log.info('player not responding; relaunching', { running });
    await bestEffort(() => this.control.terminateProcess(), {
      fallback: undefined,
      onError: 'debug',
      log: this.log,
      label: 'stale player termination failed',
    });
    await this.clock.sleep(this.timing.relaunchDelayMs, signal);
    if (signal?.aborted) {
      return failure('Cancelled', 'cancelled while relaunching player');
    }

    try {
      await this.control.launchProcess();
    } catch (error) {
      return failure('PlayerUnresponsive', `player launch failed: ${errorMessage(error)}`);
    }

    const result = await boundedPoll({
      intervalMs: this.timing.startupPollMs,
      timeoutMs: this.timing.startupTimeoutMs,
      clock: this.clock,
      signal,
      probe: async () => ((await this.isResponsive()) ? true : undefined),
    });
    if (result.kind === 'cancelled') {
      return failure('Cancelled', 'cancelled while waiting for player startup');
    }
    if (result.kind === 'timeout') {
      return failure('PlayerUnresponsive', 'player control endpoint never responded', {
        timeoutMs: this.timing.startupTimeoutMs,
      });
    }
    this.log.info('player launched', { elapsedMs: Math.round(result.elapsedMs) });
    return success('launched');
  }

  /** Makes the player the active output device. Does not select a track. */
  public async activate(signal?: AbortSignal): Promise<void> {
    await this.send('Play', () => this.control.play());
    await this.clock.sleep(this.timing.activateSettleMs, signal);
  }

  /**
   * Loads `trackHandle` and leaves it paused at zero. Each command is followed
   * by a settle delay; the order open, pause, seek matters.
   */
  public async open(trackHandle: string, signal?: AbortSignal): Promise<void> {
    await this.send('OpenUri', () => this.control.openUri(trackHandle));
    await this.clock.sleep(this.timing.openSettleMs, signal);
    if (signal?.aborted) return;

    await this.send('Pause', () => this.control.pause());
    await this.clock.sleep(this.timing.pauseSettleMs, signal);
    if (signal?.aborted) return;

    const trackPath = await this.readTrackId();
    await this.send('SetPosition', () =>
      this.control.setPosition(trackPath ?? PLACEHOLDER_TRACK_PATH, 0),
    );
    await this.clock.sleep(this.timing.seekSettleMs, signal);
  }

  /** Succeeds only when the last observed track id is the requested one. */
  public async waitForLoad(
    trackHandle: string,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<Outcome<string>> {
    let lastSeen: string | null = null;
    const result = await boundedPoll({
      intervalMs: this.timing.trackLoadPollMs,
      timeoutMs,
      clock: this.clock,
      signal,
      probe: async () => {
        lastSeen = await this.readTrackId();
        this.log.spam('track load poll', { current: lastSeen, expected: trackHandle });
        return lastSeen !== null && sameTrack(lastSeen, trackHandle) ? lastSeen : undefined;
      },
    });
    if (result.kind === 'matched') {
      return success(result.value);
    }
    if (result.kind === 'cancelled') {
      return failure('Cancelled', 'cancelled while waiting for track load');
    }
    return failure('TrackLoadTimeout', 'track did not load', {
      expected: trackHandle,
      current: lastSeen,
      timeoutMs,
    });
  }

  /** Confirms the loaded track sits paused below one second. */
  public async waitForPausedAtZero(
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<Outcome<PlayerState>> {
    let last: PlayerState | null = null;
    const result = await boundedPoll({
      intervalMs: this.timing.pauseConfirmPollMs,
      timeoutMs,
      clock: this.clock,
      signal,
      probe: async () => {
        const state = await this.getState();
        last = state;
        const atZero = state.positionSec !== null && state.positionSec < 1;
        return state.status === 'Paused' && atZero ? state : undefined;
      },
    });
    if (result.kind === 'matched') {
      return success(result.value);
    }
    if (result.kind === 'cancelled') {
      return failure('Cancelled', 'cancelled while confirming pause');
    }
    return failure('TrackLoadTimeout', 'track not paused at position zero', {
      timeoutMs,
      last,
    });
  }

  /** Snapshot of the player; unreadable properties degrade to Unknown/null. */
  public async getState(): Promise<PlayerState> {
    const [status, positionUs, trackId] = await Promise.all([
      this.readProperty('PlaybackStatus', () => this.control.readPlaybackStatus()),
      this.readProperty('Position', () => this.control.readPositionUs()),
      this.readProperty('Metadata', () => this.control.readTrackId()),
    ]);
    return {
      status: parsePlaybackStatus(status),
      positionSec: typeof positionUs === 'number' && Number.isFinite(positionUs) ? positionUs / 1_000_000 : null,
      trackId,
    };
  }

  public async resume(): Promise<void> {
    await this.send('Play', () => this.control.play());
  }

  private async isResponsive(): Promise<boolean> {
    const status = await this.readProperty('PlaybackStatus', () => this.control.readPlaybackStatus());
    return status !== null;
  }

  private readTrackId(): Promise<string | null> {
    return this.readProperty('Metadata', () => this.control.readTrackId());
  }

  /** Bounded property read; a timeout or failure yields null. */
  private async readProperty<T>(name: string, read: () => Promise<T>): Promise<T | null> {
    return bestEffort<T | null>(
      async () => {
        const result = await withTimeout(read(), this.timing.probeTimeoutMs, this.clock);
        if (result.kind === 'timeout') {
          throw new Error(`${name} read timed out`);
        }
        return result.value;
      },
      { fallback: null, onError: 'debug', log: this.log, label: 'player property read failed', context: { name } },
    );
  }

  /** Commands are fire-and-forget; a failed send is logged and confirmed (or not) by polling. */
  private async send(command: string, fn: () => Promise<void>): Promise<void> {
    this.log.debug('player command', { command });
    await bestEffort(fn, {
      fallback: undefined,
      onError: 'warn',
      log: this.log,
      label: 'player command failed',
      context: { command },
    });
  }
}
