import { parseFile } from 'music-metadata';
import type { EncodeRequest, EncodeResult, EncoderPort } from '@/ports/EncoderPort';
import { execCommand, type CommandRunner } from '@/shared/process/commandRunner';
import { bestEffort } from '@/shared/bestEffort';
import { fileSize } from '@/shared/utils/file';
import { createLogger } from '@/shared/logging/logger';

export type DurationReader = (filePath: string) => Promise<number | undefined>;

const readDuration: DurationReader = async (filePath) => {
  const metadata = await parseFile(filePath, { duration: true });
  return metadata.format.duration;
};

export function buildEncodeArgs(request: EncodeRequest): string[] {
  const args = ['-hide_banner', '-loglevel', request.verbose ? 'info' : 'error', '-y', '-i', request.inputPath];
  if (request.window) {
    args.push('-ss', String(request.window.startSec));
    if (request.window.durationSec !== undefined) {
      args.push('-t', String(request.window.durationSec));
    }
  }
  args.push('-acodec', 'libmp3lame', '-b:a', `${request.bitrateKbps}k`, request.outputPath);
  return args;
}

/** MP3 encoding through ffmpeg/libmp3lame; seeks after `-i` for sample-accurate trims. */
export class FfmpegEncoder implements EncoderPort {
  private readonly log = createLogger('Audio', 'Encoder');
  private readonly run: CommandRunner;
  private readonly duration: DurationReader;

  constructor(
    private readonly ffmpegPath: string,
    options: { run?: CommandRunner; readDuration?: DurationReader } = {},
  ) {
    this.run = options.run ?? execCommand;
    this.duration = options.readDuration ?? readDuration;
  }

  public async encode(request: EncodeRequest): Promise<EncodeResult> {
    const args = buildEncodeArgs(request);
    this.log.debug('encoding', { input: request.inputPath, output: request.outputPath });
    const { stderr } = await this.run(this.ffmpegPath, args);
    if (request.verbose && stderr.trim()) {
      this.log.info(`[ffmpeg] ${stderr.trim()}`);
    }

    const bytes = (await fileSize(request.outputPath)) ?? 0;
    const durationSec = await bestEffort(() => this.duration(request.outputPath), {
      fallback: undefined,
      onError: 'debug',
      log: this.log,
      label: 'duration probe failed',
      context: { path: request.outputPath },
    });
    return { bytes, durationSec };
  }
}
