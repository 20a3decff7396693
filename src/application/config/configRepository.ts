import type { StoragePort } from '@/ports/StoragePort';
import type {
  CaptureConfig,
  EncoderConfig,
  LoggingConfig,
  PathsConfig,
  PlayerConfig,
  RecorderConfig,
  RoutingConfig,
  SilenceConfig,
  TimingConfig,
} from '@/domain/config/types';
import { isLogLevel } from '@/types/logLevel';

/**
 * Configuration backed by a JSON file on disk. A missing file is written with
 * defaults; invalid values fall back to defaults on load.
 */
export class ConfigRepository {
  constructor(
    private readonly storage: StoragePort,
    private readonly configPath: string,
  ) {}

  public async load(): Promise<RecorderConfig> {
    const loaded = await this.storage.readJson(this.configPath);
    if (loaded === undefined) {
      const config = defaultConfig();
      await this.storage.writeJson(this.configPath, config);
      return config;
    }
    return normalizeConfig(loaded);
  }
}

export function defaultConfig(): RecorderConfig {
  return {
    player: {
      busName: 'org.mpris.MediaPlayer2.spotify',
      objectPath: '/org/mpris/MediaPlayer2',
      launchCommand: ['spotify'],
      processName: 'spotify',
      sinkSignature: 'Spotify',
    },
    routing: {
      silentSinkName: 'track_recorder_silent',
      silentSinkDescription: 'Track-Recorder-Silent',
    },
    capture: {
      command: 'pw-record',
      latencyMs: 20,
      volume: 1,
    },
    silence: {
      noiseFloorDb: -30,
      minSilenceSec: 0.5,
      epsilonSec: 0.1,
      edgeToleranceSec: 0.05,
    },
    encoder: {
      ffmpegPath: '',
      minBytesPerSecond: 20 * 1024,
    },
    timing: {
      probeTimeoutMs: 2000,
      relaunchDelayMs: 500,
      startupTimeoutMs: 15000,
      startupPollMs: 500,
      activateSettleMs: 1000,
      openSettleMs: 2000,
      pauseSettleMs: 500,
      seekSettleMs: 500,
      trackLoadTimeoutMs: 30000,
      trackLoadPollMs: 1000,
      pauseConfirmTimeoutMs: 5000,
      pauseConfirmPollMs: 250,
      sinkDiscoveryTimeoutMs: 60000,
      sinkPollMs: 500,
      preRollMs: 500,
      monitorPollMs: 1000,
      endThresholdSec: 2,
      safetyMarginSec: 5,
      graceMs: 2000,
      captureStopTimeoutMs: 2000,
    },
    paths: {
      buildDir: 'songs_build',
    },
    logging: {
      level: 'info',
      json: false,
    },
  };
}

type Source = Record<string, unknown>;

function asRecord(value: unknown): Source {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

function pickString(source: Source, key: string, fallback: string): string {
  const value = source[key];
  return typeof value === 'string' && value.trim() ? value.trim() : fallback;
}

function pickNumber(
  source: Source,
  key: string,
  fallback: number,
  range: { min?: number; max?: number } = {},
): number {
  const value = source[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return fallback;
  }
  if (range.min !== undefined && value < range.min) return fallback;
  if (range.max !== undefined && value > range.max) return fallback;
  return value;
}

function pickBoolean(source: Source, key: string, fallback: boolean): boolean {
  const value = source[key];
  return typeof value === 'boolean' ? value : fallback;
}

function normalizePlayer(raw: unknown, defaults: PlayerConfig): PlayerConfig {
  const src = asRecord(raw);
  const command = Array.isArray(src.launchCommand)
    ? src.launchCommand.filter((part): part is string => typeof part === 'string' && part.length > 0)
    : [];
  return {
    busName: pickString(src, 'busName', defaults.busName),
    objectPath: pickString(src, 'objectPath', defaults.objectPath),
    launchCommand: command.length > 0 ? command : defaults.launchCommand,
    processName: pickString(src, 'processName', defaults.processName),
    sinkSignature: pickString(src, 'sinkSignature', defaults.sinkSignature),
  };
}

function normalizeRouting(raw: unknown, defaults: RoutingConfig): RoutingConfig {
  const src = asRecord(raw);
  return {
    silentSinkName: pickString(src, 'silentSinkName', defaults.silentSinkName),
    silentSinkDescription: pickString(src, 'silentSinkDescription', defaults.silentSinkDescription),
  };
}

function normalizeCapture(raw: unknown, defaults: CaptureConfig): CaptureConfig {
  const src = asRecord(raw);
  return {
    command: pickString(src, 'command', defaults.command),
    latencyMs: pickNumber(src, 'latencyMs', defaults.latencyMs, { min: 1, max: 1000 }),
    volume: pickNumber(src, 'volume', defaults.volume, { min: 0, max: 1 }),
  };
}

function normalizeSilence(raw: unknown, defaults: SilenceConfig): SilenceConfig {
  const src = asRecord(raw);
  return {
    noiseFloorDb: pickNumber(src, 'noiseFloorDb', defaults.noiseFloorDb, { max: 0 }),
    minSilenceSec: pickNumber(src, 'minSilenceSec', defaults.minSilenceSec, { min: 0.01 }),
    epsilonSec: pickNumber(src, 'epsilonSec', defaults.epsilonSec, { min: 0, max: 5 }),
    edgeToleranceSec: pickNumber(src, 'edgeToleranceSec', defaults.edgeToleranceSec, { min: 0, max: 5 }),
  };
}

function normalizeEncoder(raw: unknown, defaults: EncoderConfig): EncoderConfig {
  const src = asRecord(raw);
  return {
    ffmpegPath: typeof src.ffmpegPath === 'string' ? src.ffmpegPath.trim() : defaults.ffmpegPath,
    minBytesPerSecond: pickNumber(src, 'minBytesPerSecond', defaults.minBytesPerSecond, { min: 0 }),
  };
}

function normalizeTiming(raw: unknown, defaults: TimingConfig): TimingConfig {
  const src = asRecord(raw);
  // Timeouts and poll intervals must be positive; waits and margins may be zero.
  const positive = (key: keyof TimingConfig): number => pickNumber(src, key, defaults[key], { min: 1 });
  const wait = (key: keyof TimingConfig): number => pickNumber(src, key, defaults[key], { min: 0 });
  return {
    probeTimeoutMs: positive('probeTimeoutMs'),
    relaunchDelayMs: wait('relaunchDelayMs'),
    startupTimeoutMs: positive('startupTimeoutMs'),
    startupPollMs: positive('startupPollMs'),
    activateSettleMs: wait('activateSettleMs'),
    openSettleMs: wait('openSettleMs'),
    pauseSettleMs: wait('pauseSettleMs'),
    seekSettleMs: wait('seekSettleMs'),
    trackLoadTimeoutMs: positive('trackLoadTimeoutMs'),
    trackLoadPollMs: positive('trackLoadPollMs'),
    pauseConfirmTimeoutMs: positive('pauseConfirmTimeoutMs'),
    pauseConfirmPollMs: positive('pauseConfirmPollMs'),
    sinkDiscoveryTimeoutMs: positive('sinkDiscoveryTimeoutMs'),
    sinkPollMs: positive('sinkPollMs'),
    preRollMs: wait('preRollMs'),
    monitorPollMs: positive('monitorPollMs'),
    endThresholdSec: wait('endThresholdSec'),
    safetyMarginSec: wait('safetyMarginSec'),
    graceMs: wait('graceMs'),
    captureStopTimeoutMs: positive('captureStopTimeoutMs'),
  };
}

function normalizePaths(raw: unknown, defaults: PathsConfig): PathsConfig {
  const src = asRecord(raw);
  return { buildDir: pickString(src, 'buildDir', defaults.buildDir) };
}

function normalizeLogging(raw: unknown, defaults: LoggingConfig): LoggingConfig {
  const src = asRecord(raw);
  return {
    level: isLogLevel(src.level) ? src.level : defaults.level,
    json: pickBoolean(src, 'json', defaults.json),
  };
}

export function normalizeConfig(raw: unknown): RecorderConfig {
  const defaults = defaultConfig();
  const src = asRecord(raw);
  return {
    player: normalizePlayer(src.player, defaults.player),
    routing: normalizeRouting(src.routing, defaults.routing),
    capture: normalizeCapture(src.capture, defaults.capture),
    silence: normalizeSilence(src.silence, defaults.silence),
    encoder: normalizeEncoder(src.encoder, defaults.encoder),
    timing: normalizeTiming(src.timing, defaults.timing),
    paths: normalizePaths(src.paths, defaults.paths),
    logging: normalizeLogging(src.logging, defaults.logging),
  };
}
