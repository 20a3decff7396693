import type { SilenceAnalyzerPort, SilenceInterval, SilenceReport } from '@/ports/SilenceAnalyzerPort';
import { execCommand, type CommandRunner } from '@/shared/process/commandRunner';
import { createLogger } from '@/shared/logging/logger';

const SILENCE_START = /silence_start:\s*(-?\d+(?:\.\d+)?)/;
const SILENCE_END = /silence_end:\s*(-?\d+(?:\.\d+)?)/;
const DURATION = /Duration:\s*(\d+):(\d{2}):(\d{2}(?:\.\d+)?)/;
const PROCESSED = /time=(\d+):(\d{2}):(\d{2}(?:\.\d+)?)/g;

const toSeconds = (hours: string, minutes: string, seconds: string): number =>
  Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds);

export function parseDuration(output: string): number | undefined {
  const match = DURATION.exec(output);
  if (!match) {
    return undefined;
  }
  const [, hours, minutes, seconds] = match;
  return toSeconds(hours, minutes, seconds);
}

/** Position of the final progress report, written even under `-nostats`. */
export function parseProcessedTime(output: string): number | undefined {
  let last: number | undefined;
  for (const [, hours, minutes, seconds] of output.matchAll(PROCESSED)) {
    last = toSeconds(hours, minutes, seconds);
  }
  return last;
}

/**
 * Turns `silencedetect` log lines into intervals. A start without a matching
 * end means the silence runs to the end of the input.
 *
 * Captures written by a killed recorder often report `Duration: N/A`; the
 * length then comes from the last progress report, or failing that from the
 * last `silence_end`.
 */
export function parseSilenceLog(output: string): SilenceReport {
  const intervals: SilenceInterval[] = [];
  let open: SilenceInterval | null = null;

  for (const line of output.split('\n')) {
    const start = SILENCE_START.exec(line);
    if (start) {
      if (open) intervals.push(open);
      open = { startSec: Math.max(0, Number(start[1])) };
      continue;
    }
    const end = SILENCE_END.exec(line);
    if (end && open) {
      intervals.push({ startSec: open.startSec, endSec: Number(end[1]) });
      open = null;
    }
  }
  if (open) intervals.push(open);

  const lastEnd = intervals.reduce<number | undefined>(
    (latest, interval) =>
      interval.endSec === undefined ? latest : Math.max(latest ?? 0, interval.endSec),
    undefined,
  );
  return { intervals, durationSec: parseDuration(output) ?? parseProcessedTime(output) ?? lastEnd };
}

export class FfmpegSilenceAnalyzer implements SilenceAnalyzerPort {
  private readonly log = createLogger('Audio', 'Silence');
  private readonly run: CommandRunner;

  constructor(
    private readonly ffmpegPath: string,
    run?: CommandRunner,
  ) {
    this.run = run ?? execCommand;
  }

  public async detect(
    inputPath: string,
    noiseFloorDb: number,
    minSilenceSec: number,
  ): Promise<SilenceReport> {
    const { stderr } = await this.run(this.ffmpegPath, [
      '-hide_banner',
      '-nostats',
      '-i',
      inputPath,
      '-af',
      `silencedetect=noise=${noiseFloorDb}dB:d=${minSilenceSec}`,
      '-f',
      'null',
      '-',
    ]);
    const report = parseSilenceLog(stderr);
    this.log.debug('silence analysis', {
      intervals: report.intervals.length,
      durationSec: report.durationSec,
    });
    return report;
  }
}
