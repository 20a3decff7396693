import type { SilenceInterval, SilenceReport } from '@/ports/SilenceAnalyzerPort';
import type { TrimDecision } from '@/domain/recording/types';

export type TrimPolicyOptions = {
  epsilonSec: number;
  edgeToleranceSec: number;
};

const roundMs = (value: number): number => Math.round(value * 1000) / 1000;

/** First interval that starts at the beginning of the capture. */
export function findLeadingSilence(
  intervals: SilenceInterval[],
  edgeToleranceSec: number,
): SilenceInterval | undefined {
  const first = intervals[0];
  if (!first || first.startSec > edgeToleranceSec) {
    return undefined;
  }
  return first;
}

/** Last interval that runs into the end of the capture. */
export function findTrailingSilence(
  report: SilenceReport,
  edgeToleranceSec: number,
): SilenceInterval | undefined {
  const last = report.intervals[report.intervals.length - 1];
  if (!last) {
    return undefined;
  }
  if (last.endSec === undefined) {
    return last;
  }
  if (report.durationSec !== undefined && last.endSec >= report.durationSec - edgeToleranceSec) {
    return last;
  }
  return undefined;
}

/**
 * Derives the encode window from a silence report. A leading bound only counts
 * when it ends after zero, a trailing bound only when it starts after zero.
 */
export function decideTrim(report: SilenceReport, options: TrimPolicyOptions): TrimDecision {
  const leading = findLeadingSilence(report.intervals, options.edgeToleranceSec);
  const trailing = findTrailingSilence(report, options.edgeToleranceSec);

  const leadingEndSec = leading?.endSec !== undefined && leading.endSec > 0 ? leading.endSec : undefined;
  const trailingStartSec =
    trailing && trailing !== leading && trailing.startSec > 0 ? trailing.startSec : undefined;

  if (leadingEndSec === undefined && trailingStartSec === undefined) {
    return { kind: 'none', reason: 'no-silence' };
  }

  const startSec = leadingEndSec === undefined ? 0 : roundMs(leadingEndSec + options.epsilonSec);
  const endSec = trailingStartSec === undefined ? undefined : roundMs(trailingStartSec);

  if (endSec !== undefined && endSec <= startSec) {
    return { kind: 'none', reason: 'empty-window' };
  }

  return {
    kind: 'window',
    startSec,
    endSec,
    leadingEndSec,
    trailingStartSec,
  };
}
