import type { RecordingOutcome, TrackRequest } from '@/domain/recording/types';
import { UnexpectedRecordingError } from '@/domain/recording/errors';
import type { RecordingOrchestrator } from '@/application/recording/RecordingOrchestrator';
import { errorMessage } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';

export type JobSummary = {
  outcomes: RecordingOutcome[];
  done: number;
  failed: number;
  cancelled: number;
  /** Handles never started because the job was cancelled first. */
  skipped: string[];
};

function unexpectedOutcome(request: TrackRequest, error: unknown): RecordingOutcome {
  const reached = error instanceof UnexpectedRecordingError ? error : null;
  return {
    status: 'failed',
    request,
    kind: 'Unexpected',
    message: errorMessage(error),
    phase: reached?.phase ?? 'Idle',
    phases: reached?.phases ?? [],
  };
}

/**
 * Records several tracks strictly one after another. A failed track does not
 * stop the job; a cancellation does.
 */
export class RecordingJob {
  private readonly log = createLogger('Recorder', 'Job');

  constructor(private readonly orchestrator: Pick<RecordingOrchestrator, 'record'>) {}

  public async run(requests: readonly TrackRequest[], signal?: AbortSignal): Promise<JobSummary> {
    const summary: JobSummary = { outcomes: [], done: 0, failed: 0, cancelled: 0, skipped: [] };

    for (const [index, request] of requests.entries()) {
      if (signal?.aborted) {
        summary.skipped.push(...requests.slice(index).map((entry) => entry.trackHandle));
        break;
      }
      this.log.info('recording track', {
        track: request.trackHandle,
        position: `${index + 1}/${requests.length}`,
      });

      let outcome: RecordingOutcome;
      try {
        outcome = await this.orchestrator.record(request, signal);
      } catch (error) {
        this.log.error('track aborted by an unexpected error', {
          track: request.trackHandle,
          message: errorMessage(error),
        });
        outcome = unexpectedOutcome(request, error);
      }
      summary.outcomes.push(outcome);
      if (outcome.status === 'done') {
        summary.done += 1;
        this.log.info('track saved', { path: outcome.outputPath, bytes: outcome.bytes });
      } else if (outcome.status === 'failed') {
        summary.failed += 1;
        this.log.warn('track failed; continuing with next', {
          track: request.trackHandle,
          kind: outcome.kind,
        });
      } else {
        summary.cancelled += 1;
        summary.skipped.push(...requests.slice(index + 1).map((entry) => entry.trackHandle));
        break;
      }
    }

    this.log.info('job finished', {
      done: summary.done,
      failed: summary.failed,
      cancelled: summary.cancelled,
      skipped: summary.skipped.length,
    });
    return summary;
  }
}
