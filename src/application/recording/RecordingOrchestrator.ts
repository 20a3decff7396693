import path from 'node:path';
import type { ClockPort } from '@/ports/ClockPort';
import type { ProcessExit } from '@/ports/CapturerPort';
import type { EncoderPort, EncodeWindow } from '@/ports/EncoderPort';
import type { StoragePort } from '@/ports/StoragePort';
import type { EncoderConfig, SilenceConfig, TimingConfig } from '@/domain/config/types';
import {
  RecordingError,
  UnexpectedRecordingError,
  isRecordingError,
  unwrap,
} from '@/domain/recording/errors';
import { RecordingStateMachine } from '@/domain/recording/stateMachine';
import { rawCapturePath } from '@/domain/recording/trackHandle';
import type {
  MonitorResult,
  RecordingOutcome,
  RecordingPhase,
  TrackRequest,
  TrimDecision,
} from '@/domain/recording/types';
import type { CaptureHandle, CaptureSession } from '@/application/recording/CaptureSession';
import type { PlaybackMonitor } from '@/application/recording/PlaybackMonitor';
import type { PlayerController } from '@/application/recording/PlayerController';
import type { SilenceTrimmer } from '@/application/recording/SilenceTrimmer';
import type { RerouteHandle, SinkRouter } from '@/application/recording/SinkRouter';
import { errorMessage } from '@/shared/bestEffort';
import { createLogger, type ComponentLogger, type LogContext } from '@/shared/logging/logger';

export type OrchestratorDeps = {
  player: PlayerController;
  sinkRouter: SinkRouter;
  capture: CaptureSession;
  monitor: PlaybackMonitor;
  trimmer: SilenceTrimmer;
  encoder: EncoderPort;
  storage: StoragePort;
  clock: ClockPort;
};

export type OrchestratorSettings = {
  buildDir: string;
  timing: Pick<
    TimingConfig,
    | 'trackLoadTimeoutMs'
    | 'pauseConfirmTimeoutMs'
    | 'sinkDiscoveryTimeoutMs'
    | 'monitorPollMs'
    | 'endThresholdSec'
    | 'safetyMarginSec'
    | 'graceMs'
  >;
  silence: Pick<SilenceConfig, 'noiseFloorDb' | 'minSilenceSec'>;
  encoder: Pick<EncoderConfig, 'minBytesPerSecond'>;
};

/** Everything one request owns; nothing here outlives the request. */
type RecordingContext = {
  request: TrackRequest;
  machine: RecordingStateMachine;
  rawPath: string;
  route: RerouteHandle | null;
  capture: CaptureHandle | null;
  encodeStarted: boolean;
  completed: boolean;
  log: ComponentLogger;
};

export function encodeWindowFor(trim: TrimDecision): EncodeWindow | undefined {
  if (trim.kind === 'none') {
    return undefined;
  }
  if (trim.endSec === undefined) {
    return { startSec: trim.startSec };
  }
  return {
    startSec: trim.startSec,
    durationSec: Math.round((trim.endSec - trim.startSec) * 1000) / 1000,
  };
}

/**
 * Sequences one track capture: load and pause at zero, mute by rerouting,
 * capture while playing, then trim and encode. Every exit path stops the
 * capture, releases the silent route and removes temporary files; the player
 * itself is left running for the next track.
 */
export class RecordingOrchestrator {
  private readonly log = createLogger('Recorder', 'Orchestrator');
  private inFlight = false;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly settings: OrchestratorSettings,
  ) {}

  public get busy(): boolean {
    return this.inFlight;
  }

  public async record(request: TrackRequest, signal?: AbortSignal): Promise<RecordingOutcome> {
    if (this.inFlight) {
      throw new Error('a recording is already in progress');
    }
    this.inFlight = true;
    const ctx: RecordingContext = {
      request,
      machine: new RecordingStateMachine(),
      rawPath: rawCapturePath(this.settings.buildDir, request.trackHandle),
      route: null,
      capture: null,
      encodeStarted: false,
      completed: false,
      log: this.log.child(request.trackHandle),
    };

    try {
      return await this.execute(ctx, signal);
    } catch (error) {
      if (!isRecordingError(error)) {
        const phase = ctx.machine.phase;
        ctx.log.error('unexpected recording error', { phase, message: errorMessage(error) });
        ctx.machine.transition('Failed');
        throw new UnexpectedRecordingError(phase, ctx.machine.history, error);
      }
      return this.toTerminalOutcome(ctx, error);
    } finally {
      await this.cleanup(ctx);
      this.inFlight = false;
    }
  }

  private async execute(ctx: RecordingContext, signal?: AbortSignal): Promise<RecordingOutcome> {
    const { player, sinkRouter, capture, storage } = this.deps;
    const { request } = ctx;
    const { timing } = this.settings;

    this.progress(ctx, 'recording requested', {
      destination: request.destinationPath,
      expectedDurationSec: request.expectedDurationSec,
    });

    unwrap(await player.ensureRunning(signal));
    this.advance(ctx, 'PlayerReady');
    this.checkpoint(signal);

    await player.activate(signal);
    this.checkpoint(signal);
    this.advance(ctx, 'TrackLoading');
    await player.open(request.trackHandle, signal);
    this.checkpoint(signal);
    unwrap(await player.waitForLoad(request.trackHandle, timing.trackLoadTimeoutMs, signal));
    const paused = unwrap(await player.waitForPausedAtZero(timing.pauseConfirmTimeoutMs, signal));
    this.progress(ctx, 'track loaded and paused', { position: paused.positionSec });
    this.advance(ctx, 'TrackLoaded');

    const sink = unwrap(await sinkRouter.discoverSink(timing.sinkDiscoveryTimeoutMs, signal));
    this.advance(ctx, 'SinkDiscovered');
    this.checkpoint(signal);

    ctx.route = unwrap(await sinkRouter.createSilentRoute());
    unwrap(await sinkRouter.reroute(sink, ctx.route));
    this.advance(ctx, 'Rerouted');
    this.checkpoint(signal);

    await this.prepareDirectory(path.dirname(ctx.rawPath), 'CaptureProcessFailure');
    ctx.capture = unwrap(await capture.start(sink, ctx.rawPath));
    this.advance(ctx, 'Capturing');
    this.checkpoint(signal);

    await player.resume();
    this.advance(ctx, 'Monitoring');
    const monitor = await this.monitorCapture(ctx, ctx.capture, signal);
    this.progress(ctx, 'playback finished', {
      reason: monitor.reason,
      elapsedMs: Math.round(monitor.elapsedMs),
      position: monitor.lastPositionSec,
    });

    await capture.stop(ctx.capture);
    ctx.capture = null;
    await sinkRouter.release(ctx.route);
    ctx.route = null;
    this.advance(ctx, 'Stopped');

    const trim = await this.deps.trimmer.analyze(
      ctx.rawPath,
      this.settings.silence.noiseFloorDb,
      this.settings.silence.minSilenceSec,
    );
    this.checkpoint(signal);
    this.advance(ctx, 'Transcoding');
    const encoded = await this.transcode(ctx, trim);

    await storage.remove(ctx.rawPath);
    ctx.completed = true;
    this.advance(ctx, 'Done');
    ctx.log.info('recording saved', { path: request.destinationPath, bytes: encoded.bytes });

    return {
      status: 'done',
      request,
      outputPath: request.destinationPath,
      bytes: encoded.bytes,
      durationSec: encoded.durationSec,
      trim,
      monitor,
      phases: ctx.machine.history,
    };
  }

  /**
   * Runs the monitor while watching the capture process; an exit that stop()
   * did not ask for ends monitoring and fails the request.
   */
  private async monitorCapture(
    ctx: RecordingContext,
    handle: CaptureHandle,
    signal?: AbortSignal,
  ): Promise<MonitorResult> {
    const monitorAbort = new AbortController();
    const forwardAbort = (): void => monitorAbort.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });
    const watch: { exit: ProcessExit | null } = { exit: null };
    void handle.exited.then((exit) => {
      if (!handle.isStopping) {
        watch.exit = exit;
        monitorAbort.abort();
      }
    });

    let result: MonitorResult;
    try {
      result = await this.deps.monitor.runUntilTrackEnd({
        trackHandle: ctx.request.trackHandle,
        expectedDurationSec: ctx.request.expectedDurationSec,
        safetyMarginSec: this.settings.timing.safetyMarginSec,
        pollIntervalMs: this.settings.timing.monitorPollMs,
        endThresholdSec: this.settings.timing.endThresholdSec,
        graceMs: this.settings.timing.graceMs,
        signal: monitorAbort.signal,
      });
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }

    if (watch.exit) {
      throw new RecordingError('CaptureProcessFailure', 'capture exited during playback', {
        code: watch.exit.code,
        signal: watch.exit.signal,
      });
    }
    this.checkpoint(signal);
    return result;
  }

  private async transcode(
    ctx: RecordingContext,
    trim: TrimDecision,
  ): Promise<{ bytes: number; durationSec?: number }> {
    const { request } = ctx;
    await this.prepareDirectory(path.dirname(request.destinationPath), 'TranscodeFailure');
    const window = encodeWindowFor(trim);
    this.progress(ctx, 'encoding', { window: window ?? 'full' });

    ctx.encodeStarted = true;
    let durationSec: number | undefined;
    try {
      const result = await this.deps.encoder.encode({
        inputPath: ctx.rawPath,
        outputPath: request.destinationPath,
        bitrateKbps: 320,
        window,
        verbose: request.verbose,
      });
      durationSec = result.durationSec;
    } catch (error) {
      throw new RecordingError('TranscodeFailure', `encoder failed: ${errorMessage(error)}`);
    }

    const bytes = (await this.deps.storage.size(request.destinationPath)) ?? 0;
    const minBytes = Math.floor(request.expectedDurationSec * this.settings.encoder.minBytesPerSecond);
    if (bytes <= 0 || bytes < minBytes) {
      throw new RecordingError('TranscodeFailure', 'encoded file is empty or undersized', {
        bytes,
        minBytes,
      });
    }
    return { bytes, durationSec };
  }

  private async prepareDirectory(
    dir: string,
    kind: 'CaptureProcessFailure' | 'TranscodeFailure',
  ): Promise<void> {
    try {
      await this.deps.storage.ensureDir(dir);
    } catch (error) {
      throw new RecordingError(kind, `cannot create ${dir}: ${errorMessage(error)}`);
    }
  }

  private toTerminalOutcome(ctx: RecordingContext, error: RecordingError): RecordingOutcome {
    const phase = ctx.machine.phase;
    if (error.kind === 'Cancelled') {
      ctx.machine.transition('Cancelled');
      ctx.log.warn('recording cancelled', { phase });
      return { status: 'cancelled', request: ctx.request, phase, phases: ctx.machine.history };
    }
    ctx.machine.transition('Failed');
    ctx.log.error('recording failed', { kind: error.kind, phase, message: error.message, ...error.context });
    return {
      status: 'failed',
      request: ctx.request,
      kind: error.kind,
      message: error.message,
      phase,
      phases: ctx.machine.history,
    };
  }

  /** Idempotent; runs on every exit path before the outcome is returned. */
  private async cleanup(ctx: RecordingContext): Promise<void> {
    if (ctx.capture) {
      await this.deps.capture.stop(ctx.capture);
      ctx.capture = null;
    }
    if (ctx.route) {
      await this.deps.sinkRouter.release(ctx.route);
      ctx.route = null;
    }
    await this.deps.storage.remove(ctx.rawPath);
    if (ctx.encodeStarted && !ctx.completed) {
      ctx.log.debug('removing partial output', { path: ctx.request.destinationPath });
      await this.deps.storage.remove(ctx.request.destinationPath);
    }
  }

  private advance(ctx: RecordingContext, phase: RecordingPhase): void {
    ctx.machine.transition(phase);
    ctx.log.spam('phase', { phase });
  }

  private checkpoint(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new RecordingError('Cancelled', 'recording cancelled');
    }
  }

  private progress(ctx: RecordingContext, message: string, context?: LogContext): void {
    ctx.log.log(ctx.request.verbose ? 'info' : 'debug', message, context);
  }
}
