import type { RecordingErrorKind } from '@/domain/recording/errors';

/** One capture job for one track. Frozen on creation. */
export type TrackRequest = Readonly<{
  trackHandle: string;
  destinationPath: string;
  expectedDurationSec: number;
  verbose: boolean;
}>;

export function createTrackRequest(input: {
  trackHandle: string;
  destinationPath: string;
  expectedDurationSec: number;
  verbose?: boolean;
}): TrackRequest {
  return Object.freeze({
    trackHandle: input.trackHandle,
    destinationPath: input.destinationPath,
    expectedDurationSec: input.expectedDurationSec,
    verbose: input.verbose ?? false,
  });
}

export type PlaybackStatus = 'Stopped' | 'Paused' | 'Playing' | 'Unknown';

export type PlayerState = {
  status: PlaybackStatus;
  /** Null when the position could not be read. */
  positionSec: number | null;
  trackId: string | null;
};

export type SinkHandle = {
  id: string;
  label: string;
};

export type TrimDecision =
  | { kind: 'none'; reason: 'no-silence' | 'empty-window' | 'analysis-failed' }
  | {
      kind: 'window';
      startSec: number;
      /** Omitted to keep everything up to the end of the capture. */
      endSec?: number;
      leadingEndSec?: number;
      trailingStartSec?: number;
    };

export type MonitorReason =
  | 'stopped'
  | 'end-threshold'
  | 'track-changed'
  | 'safety-timeout'
  | 'cancelled';

export type MonitorResult = {
  reason: MonitorReason;
  elapsedMs: number;
  polls: number;
  lastPositionSec: number | null;
};

export type RecordingPhase =
  | 'Idle'
  | 'PlayerReady'
  | 'TrackLoading'
  | 'TrackLoaded'
  | 'SinkDiscovered'
  | 'Rerouted'
  | 'Capturing'
  | 'Monitoring'
  | 'Stopped'
  | 'Transcoding'
  | 'Done'
  | 'Failed'
  | 'Cancelled';

export type RecordingOutcome =
  | {
      status: 'done';
      request: TrackRequest;
      outputPath: string;
      bytes: number;
      durationSec?: number;
      trim: TrimDecision;
      monitor: MonitorResult;
      phases: RecordingPhase[];
    }
  | {
      status: 'failed';
      request: TrackRequest;
      /** `Unexpected` for errors outside the taxonomy (I/O, programming errors). */
      kind: Exclude<RecordingErrorKind, 'Cancelled'> | 'Unexpected';
      message: string;
      /** Last phase reached before the failure. */
      phase: RecordingPhase;
      phases: RecordingPhase[];
    }
  | {
      status: 'cancelled';
      request: TrackRequest;
      phase: RecordingPhase;
      phases: RecordingPhase[];
    };
