import type { AudioRoute, AudioRoutingPort } from '@/ports/AudioRoutingPort';
import type { ClockPort } from '@/ports/ClockPort';
import type { SinkHandle } from '@/domain/recording/types';
import { failure, success, type Outcome } from '@/domain/recording/errors';
import { boundedPoll } from '@/shared/async/boundedPoll';
import { bestEffort, errorMessage } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';

export type SinkRouterOptions = {
  /** Case-insensitive prefix of the route label that identifies the player. */
  signature: string;
  silentSinkName: string;
  silentSinkDescription: string;
  pollIntervalMs: number;
};

/** A silent destination owned by one capture. Released at most once. */
export class RerouteHandle {
  private released = false;

  constructor(
    public readonly moduleId: string,
    public readonly sinkName: string,
  ) {}

  public get isReleased(): boolean {
    return this.released;
  }

  /** Marks the handle released; returns false when it already was. */
  public markReleased(): boolean {
    if (this.released) {
      return false;
    }
    this.released = true;
    return true;
  }
}

export function matchesSignature(route: AudioRoute, signature: string): boolean {
  const needle = signature.trim().toLowerCase();
  if (!needle) {
    return false;
  }
  const labels = [route.label, route.application ?? ''];
  return labels.some((label) => label.trim().toLowerCase().startsWith(needle));
}

/** Picks the player's route from a listing; the last (newest) match wins. */
export function selectPlayerRoute(routes: AudioRoute[], signature: string): AudioRoute | undefined {
  const matches = routes.filter((route) => matchesSignature(route, signature));
  return matches[matches.length - 1];
}

export class SinkRouter {
  private readonly log = createLogger('Recorder', 'SinkRouter');

  constructor(
    private readonly routing: AudioRoutingPort,
    private readonly clock: ClockPort,
    private readonly options: SinkRouterOptions,
  ) {}

  public async discoverSink(timeoutMs: number, signal?: AbortSignal): Promise<Outcome<SinkHandle>> {
    let lastCount = 0;
    const result = await boundedPoll({
      intervalMs: this.options.pollIntervalMs,
      timeoutMs,
      clock: this.clock,
      signal,
      probe: async (attempt) => {
        const routes = await this.listRoutes();
        lastCount = routes.length;
        const route = selectPlayerRoute(routes, this.options.signature);
        if (!route && attempt % 4 === 0) {
          this.log.debug('still waiting for player audio route', { attempt, routes: routes.length });
        }
        return route ? { id: route.id, label: route.label } : undefined;
      },
    });

    if (result.kind === 'matched') {
      this.log.info('found player audio route', { id: result.value.id, label: result.value.label });
      return success(result.value);
    }
    if (result.kind === 'cancelled') {
      return failure('Cancelled', 'cancelled while discovering audio route');
    }
    return failure('SinkNotFound', 'no audio route matched the player', {
      signature: this.options.signature,
      timeoutMs,
      routes: lastCount,
    });
  }

  public async createSilentRoute(): Promise<Outcome<RerouteHandle>> {
    const { silentSinkName, silentSinkDescription } = this.options;
    try {
      const moduleId = (await this.routing.createNullSink(silentSinkName, silentSinkDescription)).trim();
      if (!moduleId) {
        return failure('RouteCreationFailed', 'sound server returned no module id', {
          sinkName: silentSinkName,
        });
      }
      this.log.debug('created silent route', { moduleId, sinkName: silentSinkName });
      return success(new RerouteHandle(moduleId, silentSinkName));
    } catch (error) {
      return failure('RouteCreationFailed', `silent route rejected: ${errorMessage(error)}`, {
        sinkName: silentSinkName,
      });
    }
  }

  /**
   * Moves the player's stream onto the silent route. The discovered sink may be
   * stale by now, so it is verified first and again after a failed move.
   */
  public async reroute(sink: SinkHandle, route: RerouteHandle): Promise<Outcome<void>> {
    if (!(await this.isListed(sink))) {
      return failure('SinkDisappeared', 'audio route vanished before reroute', { id: sink.id });
    }
    try {
      await this.routing.moveRoute(sink.id, route.sinkName);
    } catch (error) {
      if (!(await this.isListed(sink))) {
        return failure('SinkDisappeared', 'audio route vanished during reroute', { id: sink.id });
      }
      return failure('RouteCreationFailed', `reroute rejected: ${errorMessage(error)}`, {
        id: sink.id,
        sinkName: route.sinkName,
      });
    }
    this.log.debug('rerouted player to silent route', { id: sink.id, sinkName: route.sinkName });
    return success(undefined);
  }

  /** Destroys the silent route. Safe to call repeatedly; never throws. */
  public async release(route: RerouteHandle | null | undefined): Promise<void> {
    if (!route || !route.markReleased()) {
      return;
    }
    await bestEffort(() => this.routing.destroyModule(route.moduleId), {
      fallback: undefined,
      onError: 'debug',
      log: this.log,
      label: 'silent route release failed',
      context: { moduleId: route.moduleId },
    });
    this.log.debug('released silent route', { moduleId: route.moduleId });
  }

  private async isListed(sink: SinkHandle): Promise<boolean> {
    const routes = await this.listRoutes();
    return routes.some((route) => route.id === sink.id);
  }

  private listRoutes(): Promise<AudioRoute[]> {
    return bestEffort(() => this.routing.listRoutes(), {
      fallback: [],
      onError: 'debug',
      log: this.log,
      label: 'audio route listing failed',
    });
  }
}
