import type { CaptureFormat, CaptureProcess, CapturerPort, ProcessExit } from '@/ports/CapturerPort';
import { spawnProcess, type ChildProcessLike, type SpawnFn } from '@/shared/process/spawnProcess';
import { createLogger } from '@/shared/logging/logger';

export function buildPwRecordArgs(targetId: string, outputPath: string, format: CaptureFormat): string[] {
  return [
    `--latency=${format.latencyMs}ms`,
    `--volume=${format.volume.toFixed(1)}`,
    `--format=${format.sampleFormat}`,
    '--channel-map',
    format.channelMap,
    '--rate',
    String(format.sampleRate),
    `--quality=${format.quality}`,
    `--target=${targetId}`,
    outputPath,
  ];
}

class ChildCaptureProcess implements CaptureProcess {
  public readonly exited: Promise<ProcessExit>;
  private finished = false;

  constructor(private readonly child: ChildProcessLike) {
    this.exited = new Promise<ProcessExit>((resolve) => {
      child.once('exit', (code, signal) => {
        this.finished = true;
        resolve({ code, signal });
      });
      child.once('error', (error) => {
        this.finished = true;
        resolve({ code: null, signal: null, error });
      });
    });
  }

  public get pid(): number | undefined {
    return this.child.pid;
  }

  public isRunning(): boolean {
    return !this.finished && this.child.exitCode === null && this.child.signalCode === null;
  }

  public kill(signal: NodeJS.Signals): void {
    if (this.isRunning()) {
      this.child.kill(signal);
    }
  }
}

/** Captures one sink input into a file with PipeWire's `pw-record`. */
export class PwRecordCapturer implements CapturerPort {
  private readonly log = createLogger('Audio', 'PwRecord');
  private readonly spawn: SpawnFn;

  constructor(
    private readonly command = 'pw-record',
    spawn?: SpawnFn,
  ) {
    this.spawn = spawn ?? spawnProcess;
  }

  public start(targetId: string, outputPath: string, format: CaptureFormat): CaptureProcess {
    const args = buildPwRecordArgs(targetId, outputPath, format);
    this.log.debug('starting capture', { command: this.command, args: args.join(' ') });
    const child = this.spawn(this.command, args, { stdio: ['ignore', 'ignore', 'pipe'] });
    child.stderr?.on('data', (data: Buffer) => {
      const message = data.toString().trim();
      if (message) this.log.debug(`[pw-record] ${message}`);
    });
    return new ChildCaptureProcess(child);
  }
}
