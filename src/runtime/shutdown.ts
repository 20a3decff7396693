import { createLogger } from '@/shared/logging/logger';

export type SignalTarget = {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
};

export type ShutdownOptions = {
  /** Hard exit if cleanup has not finished this long after the first signal. */
  forceExitMs?: number;
  exit?: (code: number) => void;
  processLike?: SignalTarget;
};

/**
 * First SIGINT/SIGTERM aborts the running job so it can clean up; a second
 * signal or the watchdog exits immediately. Returns an unregister function.
 */
export function registerShutdownHandlers(
  controller: AbortController,
  options: ShutdownOptions = {},
  log = createLogger('Recorder', 'Shutdown'),
): () => void {
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const target: SignalTarget = options.processLike ?? process;
  let forceExit: NodeJS.Timeout | null = null;

  const shutdown = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      log.warn('second signal received; exiting now', { signal });
      exit(130);
      return;
    }
    log.warn('stopping: cleaning up the current recording', { signal });
    controller.abort();

    // Force-exit watchdog so Ctrl+C cannot hang forever if cleanup never resolves.
    forceExit = setTimeout(() => {
      log.warn('shutdown timed out; forcing exit');
      exit(1);
    }, options.forceExitMs ?? 15000);
    forceExit.unref();
  };

  target.on('SIGINT', shutdown);
  target.on('SIGTERM', shutdown);

  return () => {
    target.off('SIGINT', shutdown);
    target.off('SIGTERM', shutdown);
    if (forceExit) {
      clearTimeout(forceExit);
      forceExit = null;
    }
  };
}
