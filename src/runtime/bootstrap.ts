import path from 'node:path';
import { loadConfig, resolveLogging, type AppConfig } from '@/config';
import { createLogger, logManager } from '@/shared/logging/logger';
import type { RecorderConfig } from '@/domain/config/types';
import type { ClockPort } from '@/ports/ClockPort';
import type { ConfigPort } from '@/ports/ConfigPort';
import { ConfigRepository } from '@/application/config/configRepository';
import { CaptureSession } from '@/application/recording/CaptureSession';
import { PlaybackMonitor } from '@/application/recording/PlaybackMonitor';
import { PlayerController } from '@/application/recording/PlayerController';
import { RecordingJob } from '@/application/recording/RecordingJob';
import { RecordingOrchestrator } from '@/application/recording/RecordingOrchestrator';
import { SilenceTrimmer } from '@/application/recording/SilenceTrimmer';
import { SinkRouter } from '@/application/recording/SinkRouter';
import { runPreflight, type PreflightReport, type RequiredTool } from '@/application/recording/preflight';
import { ConfigAdapter } from '@/adapters/config/ConfigAdapter';
import { StorageAdapter } from '@/adapters/storage/StorageAdapter';
import { MprisPlayerControl } from '@/adapters/player/mprisPlayerControl';
import { PulseAudioRouting } from '@/adapters/audio/pulseAudioRouting';
import { PwRecordCapturer } from '@/adapters/capture/pwRecordCapturer';
import { resolveFfmpegPath } from '@/adapters/encoder/ffmpegBinary';
import { FfmpegEncoder } from '@/adapters/encoder/ffmpegEncoder';
import { FfmpegSilenceAnalyzer } from '@/adapters/encoder/ffmpegSilenceAnalyzer';
import { ShellToolProbe } from '@/adapters/system/toolProbe';
import { systemClock } from '@/infrastructure/time/systemClock';

export type Runtime = {
  app: AppConfig;
  config: RecorderConfig;
  orchestrator: RecordingOrchestrator;
  job: RecordingJob;
  preflight: () => Promise<PreflightReport>;
};

export function requiredTools(config: RecorderConfig, ffmpegPath: string): RequiredTool[] {
  const launch = config.player.launchCommand[0] ?? config.player.processName;
  return [
    { name: 'pw-record', command: config.capture.command },
    { name: 'pactl', command: 'pactl' },
    { name: 'dbus-send', command: 'dbus-send' },
    { name: 'pgrep', command: 'pgrep' },
    { name: 'pkill', command: 'pkill' },
    { name: 'player', command: launch },
    { name: 'ffmpeg', command: ffmpegPath },
  ];
}

/** Wires the recording pipeline from stored configuration. */
export function buildRecorder(config: RecorderConfig, clock: ClockPort = systemClock) {
  const { timing } = config;
  const storage = new StorageAdapter();
  const ffmpegPath = resolveFfmpegPath(config.encoder.ffmpegPath);

  const player = new PlayerController(
    new MprisPlayerControl({ player: config.player, commandTimeoutMs: timing.probeTimeoutMs }),
    clock,
    timing,
  );
  const sinkRouter = new SinkRouter(
    new PulseAudioRouting({ commandTimeoutMs: timing.probeTimeoutMs }),
    clock,
    {
      signature: config.player.sinkSignature,
      silentSinkName: config.routing.silentSinkName,
      silentSinkDescription: config.routing.silentSinkDescription,
      pollIntervalMs: timing.sinkPollMs,
    },
  );
  const capture = new CaptureSession(new PwRecordCapturer(config.capture.command), clock, {
    format: {
      sampleFormat: 'f32',
      channelMap: 'stereo',
      sampleRate: 44100,
      quality: 15,
      latencyMs: config.capture.latencyMs,
      volume: config.capture.volume,
    },
    preRollMs: timing.preRollMs,
    stopTimeoutMs: timing.captureStopTimeoutMs,
  });

  const orchestrator = new RecordingOrchestrator(
    {
      player,
      sinkRouter,
      capture,
      monitor: new PlaybackMonitor(player, clock),
      trimmer: new SilenceTrimmer(new FfmpegSilenceAnalyzer(ffmpegPath), config.silence),
      encoder: new FfmpegEncoder(ffmpegPath),
      storage,
      clock,
    },
    {
      buildDir: path.resolve(config.paths.buildDir),
      timing,
      silence: config.silence,
      encoder: config.encoder,
    },
  );

  return { orchestrator, ffmpegPath };
}

export async function createRuntime(env: NodeJS.ProcessEnv = process.env): Promise<Runtime> {
  const app = loadConfig(env);
  const configPort: ConfigPort = new ConfigAdapter(
    new ConfigRepository(new StorageAdapter(), app.env.configPath),
  );
  const config = await configPort.load();
  logManager.configure(resolveLogging(app, config.logging));

  const log = createLogger('Recorder');
  log.debug('configuration loaded', { env: app.env.nodeEnv, path: app.env.configPath });

  const { orchestrator, ffmpegPath } = buildRecorder(config);
  const probe = new ShellToolProbe();

  return {
    app,
    config,
    orchestrator,
    job: new RecordingJob(orchestrator),
    preflight: () => runPreflight(probe, requiredTools(config, ffmpegPath)),
  };
}
