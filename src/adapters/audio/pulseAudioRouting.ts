import type { AudioRoute, AudioRoutingPort } from '@/ports/AudioRoutingPort';
import { execCommand, type CommandRunner } from '@/shared/process/commandRunner';
import { createLogger } from '@/shared/logging/logger';

const HEADER = /^Sink Input #(\d+)\s*$/;
const PROPERTY = /^\s*([\w.]+)\s*=\s*"(.*)"\s*$/;

/**
 * Parses `LANG=C pactl list sink-inputs`. Streams without a `media.name`
 * are labelled with an empty string so they still show up as candidates.
 */
export function parseSinkInputs(output: string): AudioRoute[] {
  const routes: AudioRoute[] = [];
  let current: AudioRoute | null = null;

  for (const line of output.split('\n')) {
    const header = HEADER.exec(line.trim());
    if (header) {
      current = { id: header[1], label: '' };
      routes.push(current);
      continue;
    }
    if (!current) continue;
    const property = PROPERTY.exec(line);
    if (!property) continue;
    const [, key, value] = property;
    if (key === 'media.name') {
      current.label = value;
    } else if (key === 'application.name') {
      current.application = value;
    }
  }
  return routes;
}

/** Module ids are printed alone on stdout by `pactl load-module`. */
export function parseModuleId(output: string): string {
  const id = output.trim();
  return /^\d+$/.test(id) ? id : '';
}

export type PulseAudioRoutingOptions = {
  commandTimeoutMs: number;
  run?: CommandRunner;
};

/** Routing through `pactl`, which works against both PulseAudio and pipewire-pulse. */
export class PulseAudioRouting implements AudioRoutingPort {
  private readonly log = createLogger('Audio', 'Pactl');
  private readonly run: CommandRunner;

  constructor(private readonly options: PulseAudioRoutingOptions) {
    this.run = options.run ?? execCommand;
  }

  public async listRoutes(): Promise<AudioRoute[]> {
    const stdout = await this.pactl(['list', 'sink-inputs']);
    const routes = parseSinkInputs(stdout);
    this.log.spam('sink inputs', { count: routes.length });
    return routes;
  }

  public async createNullSink(sinkName: string, description: string): Promise<string> {
    const stdout = await this.pactl([
      'load-module',
      'module-null-sink',
      `sink_name=${sinkName}`,
      `sink_properties=device.description=${description}`,
    ]);
    return parseModuleId(stdout);
  }

  public async moveRoute(routeId: string, sinkName: string): Promise<void> {
    await this.pactl(['move-sink-input', routeId, sinkName]);
  }

  public async destroyModule(moduleId: string): Promise<void> {
    await this.pactl(['unload-module', moduleId]);
  }

  private async pactl(args: string[]): Promise<string> {
    const { stdout } = await this.run('pactl', args, {
      timeoutMs: this.options.commandTimeoutMs,
      env: { LANG: 'C', LC_ALL: 'C' },
    });
    return stdout;
  }
}
