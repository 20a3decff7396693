import type { LogLevel } from '@/types/logLevel';

export interface RecorderConfig {
  player: PlayerConfig;
  routing: RoutingConfig;
  capture: CaptureConfig;
  silence: SilenceConfig;
  encoder: EncoderConfig;
  timing: TimingConfig;
  paths: PathsConfig;
  logging: LoggingConfig;
}

export interface PlayerConfig {
  /** MPRIS bus name, e.g. "org.mpris.MediaPlayer2.spotify". */
  busName: string;
  objectPath: string;
  /** Command and arguments used to (re)launch the player. */
  launchCommand: string[];
  /** Process name matched by pgrep/pkill. */
  processName: string;
  /** Prefix of the stream label that identifies the player's audio route. */
  sinkSignature: string;
}

export interface RoutingConfig {
  silentSinkName: string;
  silentSinkDescription: string;
}

export interface CaptureConfig {
  /** The format itself is fixed: f32 stereo at 44100 Hz. */
  command: string;
  latencyMs: number;
  volume: number;
}

export interface SilenceConfig {
  noiseFloorDb: number;
  minSilenceSec: number;
  /** Offset added past the detected leading silence. */
  epsilonSec: number;
  /** How close to an edge an interval must be to count as leading/trailing. */
  edgeToleranceSec: number;
}

export interface EncoderConfig {
  /** Absolute ffmpeg path; empty to use the bundled binary. */
  ffmpegPath: string;
  /** Output smaller than expectedDuration * this is treated as a failed encode. */
  minBytesPerSecond: number;
}

export interface TimingConfig {
  probeTimeoutMs: number;
  relaunchDelayMs: number;
  startupTimeoutMs: number;
  startupPollMs: number;
  activateSettleMs: number;
  openSettleMs: number;
  pauseSettleMs: number;
  seekSettleMs: number;
  trackLoadTimeoutMs: number;
  trackLoadPollMs: number;
  pauseConfirmTimeoutMs: number;
  pauseConfirmPollMs: number;
  sinkDiscoveryTimeoutMs: number;
  sinkPollMs: number;
  preRollMs: number;
  monitorPollMs: number;
  endThresholdSec: number;
  safetyMarginSec: number;
  graceMs: number;
  captureStopTimeoutMs: number;
}

export interface PathsConfig {
  /** Directory for raw captures, relative to the working directory unless absolute. */
  buildDir: string;
}

export interface LoggingConfig {
  level: LogLevel;
  json: boolean;
}
