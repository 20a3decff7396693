import type { RecordingPhase } from '@/domain/recording/types';

const FORWARD: Record<RecordingPhase, RecordingPhase | null> = {
  Idle: 'PlayerReady',
  PlayerReady: 'TrackLoading',
  TrackLoading: 'TrackLoaded',
  TrackLoaded: 'SinkDiscovered',
  SinkDiscovered: 'Rerouted',
  Rerouted: 'Capturing',
  Capturing: 'Monitoring',
  Monitoring: 'Stopped',
  Stopped: 'Transcoding',
  Transcoding: 'Done',
  Done: null,
  Failed: null,
  Cancelled: null,
};

export function isTerminalPhase(phase: RecordingPhase): boolean {
  return phase === 'Done' || phase === 'Failed' || phase === 'Cancelled';
}

/**
 * Phases advance strictly in order; Failed and Cancelled are reachable from
 * every non-terminal phase.
 */
export function canTransition(from: RecordingPhase, to: RecordingPhase): boolean {
  if (isTerminalPhase(from)) {
    return false;
  }
  if (to === 'Failed' || to === 'Cancelled') {
    return true;
  }
  return FORWARD[from] === to;
}

export class PhaseTransitionError extends Error {
  constructor(
    public readonly from: RecordingPhase,
    public readonly to: RecordingPhase,
  ) {
    super(`illegal recording transition ${from} -> ${to}`);
    this.name = 'PhaseTransitionError';
  }
}

/** Tracks the phase of one request and the path it took. */
export class RecordingStateMachine {
  private current: RecordingPhase = 'Idle';
  private readonly visited: RecordingPhase[] = ['Idle'];

  public get phase(): RecordingPhase {
    return this.current;
  }

  public get history(): RecordingPhase[] {
    return [...this.visited];
  }

  /** Last phase before a terminal one (the phase a failure happened in). */
  public get lastActivePhase(): RecordingPhase {
    for (let i = this.visited.length - 1; i >= 0; i -= 1) {
      if (!isTerminalPhase(this.visited[i])) {
        return this.visited[i];
      }
    }
    return 'Idle';
  }

  public transition(to: RecordingPhase): void {
    if (!canTransition(this.current, to)) {
      throw new PhaseTransitionError(this.current, to);
    }
    this.current = to;
    this.visited.push(to);
  }
}
