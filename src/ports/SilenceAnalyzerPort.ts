export type SilenceInterval = {
  startSec: number;
  /** Missing when the silence runs to the end of the input. */
  endSec?: number;
};

export type SilenceReport = {
  intervals: SilenceInterval[];
  /** Media duration of the analyzed input, when the analyzer reports it. */
  durationSec?: number;
};

export interface SilenceAnalyzerPort {
  detect(inputPath: string, noiseFloorDb: number, minSilenceSec: number): Promise<SilenceReport>;
}
