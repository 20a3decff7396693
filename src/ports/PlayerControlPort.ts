/**
 * Remote-control surface of the media player (MPRIS). Commands are
 * fire-and-forget: a resolved promise only means the command was sent.
 */
export interface PlayerControlPort {
  isProcessRunning(): Promise<boolean>;
  terminateProcess(): Promise<void>;
  launchProcess(): Promise<void>;

  play(): Promise<void>;
  pause(): Promise<void>;
  openUri(uri: string): Promise<void>;
  setPosition(trackPath: string, positionUs: number): Promise<void>;

  /** Raw `PlaybackStatus` string, e.g. "Playing". */
  readPlaybackStatus(): Promise<string>;
  /** Elapsed position in microseconds. */
  readPositionUs(): Promise<number>;
  /** `mpris:trackid` of the loaded track, or null when the player reports none. */
  readTrackId(): Promise<string | null>;
}
