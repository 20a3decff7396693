import type { PlayerControlPort } from '@/ports/PlayerControlPort';
import type { PlayerConfig } from '@/domain/config/types';
import { CommandError, execCommand, type CommandRunner } from '@/shared/process/commandRunner';
import { spawnProcess, type SpawnFn } from '@/shared/process/spawnProcess';
import { createLogger } from '@/shared/logging/logger';

const PLAYER_INTERFACE = 'org.mpris.MediaPlayer2.Player';
const PROPERTIES_GET = 'org.freedesktop.DBus.Properties.Get';

/** `variant string "Playing"` */
export function parseVariantString(reply: string): string | null {
  const match = /variant\s+string\s+"([^"]*)"/.exec(reply);
  return match ? match[1] : null;
}

/** `variant int64 1234567`; players differ in the integer type they report. */
export function parseVariantInteger(reply: string): number | null {
  const match = /variant\s+(?:u?int(?:16|32|64)|double)\s+(-?\d+(?:\.\d+)?)/.exec(reply);
  if (!match) {
    return null;
  }
  const value = Number(match[1]);
  return Number.isFinite(value) ? value : null;
}

/** Pulls `mpris:trackid` out of a Metadata dict reply. */
export function parseTrackIdFromMetadata(reply: string): string | null {
  const match =
    /string\s+"mpris:trackid"\s*\)?\s*variant\s+(?:string|object path)\s+"([^"]*)"/.exec(reply);
  const value = match?.[1].trim();
  return value ? value : null;
}

/**
 * SetPosition takes a D-Bus object path. Track ids reported as URIs
 * (`spotify:track:abc`) are mapped onto the path form the player accepts.
 */
export function toObjectPath(trackId: string): string {
  if (trackId.startsWith('/')) {
    return trackId;
  }
  const segments = trackId
    .split(':')
    .filter(Boolean)
    .map((segment) => segment.replace(/[^A-Za-z0-9_]/g, '_'));
  return `/${segments.join('/')}`;
}

export type MprisPlayerControlOptions = {
  player: PlayerConfig;
  commandTimeoutMs: number;
  run?: CommandRunner;
  spawn?: SpawnFn;
};

/** MPRIS over `dbus-send`, process control over `pgrep`/`pkill`. */
export class MprisPlayerControl implements PlayerControlPort {
  private readonly log = createLogger('Player', 'Mpris');
  private readonly player: PlayerConfig;
  private readonly commandTimeoutMs: number;
  private readonly run: CommandRunner;
  private readonly spawn: SpawnFn;

  constructor(options: MprisPlayerControlOptions) {
    this.player = options.player;
    this.commandTimeoutMs = options.commandTimeoutMs;
    this.run = options.run ?? execCommand;
    this.spawn = options.spawn ?? spawnProcess;
  }

  public async isProcessRunning(): Promise<boolean> {
    try {
      await this.run('pgrep', ['-x', this.player.processName], { timeoutMs: this.commandTimeoutMs });
      return true;
    } catch (error) {
      // pgrep exits 1 when nothing matches.
      if (error instanceof CommandError && error.exitCode === 1) {
        return false;
      }
      throw error;
    }
  }

  public async terminateProcess(): Promise<void> {
    try {
      await this.run('pkill', ['-x', this.player.processName], { timeoutMs: this.commandTimeoutMs });
    } catch (error) {
      if (error instanceof CommandError && error.exitCode === 1) {
        return;
      }
      throw error;
    }
  }

  public async launchProcess(): Promise<void> {
    const [command, ...args] = this.player.launchCommand;
    if (!command) {
      throw new Error('player launch command is empty');
    }
    this.log.info('launching player', { command: [command, ...args].join(' ') });
    const child = this.spawn(command, args, { detached: true, stdio: 'ignore' });
    child.once('error', (error) => {
      this.log.error('player process error', { command, message: error.message });
    });
    child.unref();
  }

  public async play(): Promise<void> {
    await this.call('Play');
  }

  public async pause(): Promise<void> {
    await this.call('Pause');
  }

  public async openUri(uri: string): Promise<void> {
    await this.call('OpenUri', `string:${uri}`);
  }

  public async setPosition(trackPath: string, positionUs: number): Promise<void> {
    await this.call(
      'SetPosition',
      `objpath:${toObjectPath(trackPath)}`,
      `int64:${Math.max(0, Math.round(positionUs))}`,
    );
  }

  public async readPlaybackStatus(): Promise<string> {
    const reply = await this.getProperty('PlaybackStatus');
    const status = parseVariantString(reply);
    if (status === null) {
      throw new Error('unexpected PlaybackStatus reply');
    }
    return status;
  }

  public async readPositionUs(): Promise<number> {
    const reply = await this.getProperty('Position');
    const position = parseVariantInteger(reply);
    if (position === null) {
      throw new Error('unexpected Position reply');
    }
    return position;
  }

  public async readTrackId(): Promise<string | null> {
    return parseTrackIdFromMetadata(await this.getProperty('Metadata'));
  }

  private baseArgs(): string[] {
    return ['--print-reply', `--dest=${this.player.busName}`, this.player.objectPath];
  }

  private async call(method: string, ...args: string[]): Promise<void> {
    await this.run('dbus-send', [...this.baseArgs(), `${PLAYER_INTERFACE}.${method}`, ...args], {
      timeoutMs: this.commandTimeoutMs,
    });
  }

  private async getProperty(name: string): Promise<string> {
    const { stdout } = await this.run(
      'dbus-send',
      [...this.baseArgs(), PROPERTIES_GET, `string:${PLAYER_INTERFACE}`, `string:${name}`],
      { timeoutMs: this.commandTimeoutMs },
    );
    return stdout;
  }
}
