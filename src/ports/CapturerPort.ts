export type CaptureFormat = {
  sampleFormat: 'f32';
  channelMap: 'stereo';
  sampleRate: 44100;
  /** Highest pw-record resampler quality. */
  quality: 15;
  latencyMs: number;
  volume: number;
};

export type ProcessExit = {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be spawned at all. */
  error?: Error;
};

export interface CaptureProcess {
  readonly pid: number | undefined;
  /** Settles once, when the process exits or fails to spawn. */
  readonly exited: Promise<ProcessExit>;
  isRunning(): boolean;
  kill(signal: NodeJS.Signals): void;
}

export interface CapturerPort {
  start(targetId: string, outputPath: string, format: CaptureFormat): CaptureProcess;
}
