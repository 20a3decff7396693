import type { SilenceAnalyzerPort, SilenceReport } from '@/ports/SilenceAnalyzerPort';
import type { TrimDecision } from '@/domain/recording/types';
import { decideTrim } from '@/domain/recording/trimPolicy';
import { errorMessage } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';

export type SilenceTrimmerOptions = {
  epsilonSec: number;
  edgeToleranceSec: number;
};

export class SilenceTrimmer {
  private readonly log = createLogger('Recorder', 'Trimmer');

  constructor(
    private readonly analyzer: SilenceAnalyzerPort,
    private readonly options: SilenceTrimmerOptions,
  ) {}

  /** A failed analysis means "encode everything", not a failed request. */
  public async analyze(
    rawPath: string,
    noiseFloorDb: number,
    minSilenceSec: number,
  ): Promise<TrimDecision> {
    let report: SilenceReport;
    try {
      report = await this.analyzer.detect(rawPath, noiseFloorDb, minSilenceSec);
    } catch (error) {
      this.log.warn('silence analysis failed; encoding full capture', {
        rawPath,
        message: errorMessage(error),
      });
      return { kind: 'none', reason: 'analysis-failed' };
    }

    const decision = decideTrim(report, this.options);
    this.log.debug('silence analysis', {
      intervals: report.intervals.length,
      durationSec: report.durationSec,
      decision,
    });
    return decision;
  }
}
