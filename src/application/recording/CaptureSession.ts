import type { CaptureFormat, CaptureProcess, CapturerPort, ProcessExit } from '@/ports/CapturerPort';
import type { ClockPort } from '@/ports/ClockPort';
import type { SinkHandle } from '@/domain/recording/types';
import { failure, success, type Outcome } from '@/domain/recording/errors';
import { withTimeout } from '@/shared/async/withTimeout';
import { errorMessage } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';

export type CaptureSessionOptions = {
  format: CaptureFormat;
  /** Delay after spawn before the capture counts as started. */
  preRollMs: number;
  stopTimeoutMs: number;
};

export type CaptureStopResult = {
  exit: ProcessExit | null;
  signals: NodeJS.Signals[];
};

/** One running capture and the raw file it writes. */
export class CaptureHandle {
  private stopping = false;

  constructor(
    public readonly sink: SinkHandle,
    public readonly outputPath: string,
    public readonly process: CaptureProcess,
  ) {}

  public get exited(): Promise<ProcessExit> {
    return this.process.exited;
  }

  /** True once stop() has begun; an exit after this point is expected. */
  public get isStopping(): boolean {
    return this.stopping;
  }

  public markStopping(): void {
    this.stopping = true;
  }
}

/**
 * Owns the single capture process of the system. Only one handle may be
 * active at a time.
 */
export class CaptureSession {
  private readonly log = createLogger('Recorder', 'Capture');
  private active: CaptureHandle | null = null;

  constructor(
    private readonly capturer: CapturerPort,
    private readonly clock: ClockPort,
    private readonly options: CaptureSessionOptions,
  ) {}

  public get current(): CaptureHandle | null {
    return this.active;
  }

  public async start(sink: SinkHandle, outputPath: string): Promise<Outcome<CaptureHandle>> {
    if (this.active) {
      return failure('CaptureProcessFailure', 'a capture is already running', {
        outputPath: this.active.outputPath,
      });
    }

    let proc: CaptureProcess;
    try {
      proc = this.capturer.start(sink.id, outputPath, this.options.format);
    } catch (error) {
      return failure('CaptureProcessFailure', `capture spawn failed: ${errorMessage(error)}`, {
        target: sink.id,
      });
    }

    const handle = new CaptureHandle(sink, outputPath, proc);
    this.active = handle;
    this.log.info('capture started', { pid: proc.pid, target: sink.id, outputPath });

    // Pre-roll: the capture must be live before playback resumes.
    const early = await withTimeout(proc.exited, this.options.preRollMs, this.clock);
    if (early.kind === 'settled') {
      this.active = null;
      const exit = early.value;
      return failure(
        'CaptureProcessFailure',
        exit.error ? `capture failed to start: ${exit.error.message}` : 'capture exited during pre-roll',
        { code: exit.code, signal: exit.signal },
      );
    }
    return success(handle);
  }

  /**
   * Stops the capture: SIGTERM, bounded wait, then SIGKILL. Never leaves the
   * process running and never throws.
   */
  public async stop(handle: CaptureHandle | null | undefined): Promise<CaptureStopResult> {
    if (!handle) {
      return { exit: null, signals: [] };
    }
    handle.markStopping();
    const signals: NodeJS.Signals[] = [];
    let exit: ProcessExit | null = null;

    try {
      if (handle.process.isRunning()) {
        signals.push('SIGTERM');
        handle.process.kill('SIGTERM');
        const graceful = await withTimeout(handle.exited, this.options.stopTimeoutMs, this.clock);
        if (graceful.kind === 'settled') {
          exit = graceful.value;
        } else {
          this.log.warn('capture ignored SIGTERM; killing', { pid: handle.process.pid });
          signals.push('SIGKILL');
          handle.process.kill('SIGKILL');
          const forced = await withTimeout(handle.exited, this.options.stopTimeoutMs, this.clock);
          exit = forced.kind === 'settled' ? forced.value : null;
        }
      } else {
        const done = await withTimeout(handle.exited, 0, this.clock);
        exit = done.kind === 'settled' ? done.value : null;
      }
    } catch (error) {
      this.log.warn('capture stop failed', { pid: handle.process.pid, message: errorMessage(error) });
    } finally {
      if (this.active === handle) {
        this.active = null;
      }
    }

    this.log.info('capture stopped', {
      pid: handle.process.pid,
      code: exit?.code ?? null,
      signal: exit?.signal ?? null,
      escalated: signals.includes('SIGKILL'),
    });
    return { exit, signals };
  }
}
