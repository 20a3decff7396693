import type { RecordingPhase } from '@/domain/recording/types';

export type RecordingErrorKind =
  | 'PlayerUnresponsive'
  | 'TrackLoadTimeout'
  | 'SinkNotFound'
  | 'SinkDisappeared'
  | 'RouteCreationFailed'
  | 'CaptureProcessFailure'
  | 'TranscodeFailure'
  | 'Cancelled';

export class RecordingError extends Error {
  public readonly kind: RecordingErrorKind;
  public readonly context: Record<string, unknown>;

  constructor(kind: RecordingErrorKind, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'RecordingError';
    this.kind = kind;
    this.context = context;
  }
}

/**
 * Wraps an error outside the taxonomy once cleanup has run, keeping the phase
 * the recording had reached.
 */
export class UnexpectedRecordingError extends Error {
  constructor(
    public readonly phase: RecordingPhase,
    public readonly phases: RecordingPhase[],
    cause: unknown,
  ) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = 'UnexpectedRecordingError';
  }
}

export function isRecordingError(error: unknown): error is RecordingError {
  return error instanceof RecordingError;
}

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: RecordingError };

export function success<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function failure<T>(
  kind: RecordingErrorKind,
  message: string,
  context?: Record<string, unknown>,
): Outcome<T> {
  return { ok: false, error: new RecordingError(kind, message, context) };
}

/** Returns the value of a successful outcome, throws its error otherwise. */
export function unwrap<T>(outcome: Outcome<T>): T {
  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.value;
}
