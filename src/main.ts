import { promises as fs } from 'node:fs';
import path from 'node:path';
import { createLogger } from '@/shared/logging/logger';
import { errorMessage, safeJsonParse } from '@/shared/bestEffort';
import { parseJobManifest } from '@/application/recording/jobManifest';
import { createRuntime } from '@/runtime/bootstrap';
import { registerShutdownHandlers } from '@/runtime/shutdown';

const log = createLogger('Recorder');

async function main(argv: string[]): Promise<number> {
  const manifestArg = argv[2];
  if (!manifestArg) {
    log.error('usage: track-recorder <manifest.json>');
    return 2;
  }

  const runtime = await createRuntime();
  const manifestPath = path.resolve(manifestArg);
  const raw = safeJsonParse<unknown>(await fs.readFile(manifestPath, 'utf-8'), undefined, {
    onError: 'warn',
    log,
    label: 'manifest is not valid json',
    context: { path: manifestPath },
  });
  const manifest = parseJobManifest(raw);
  manifest.issues.forEach((issue) => {
    log.warn('skipping manifest entry', { index: issue.index, reason: issue.message });
  });
  if (manifest.requests.length === 0) {
    log.error('no valid tracks in manifest', { path: manifestPath });
    return 2;
  }

  const preflight = await runtime.preflight();
  if (!preflight.ok) {
    log.error('required tools are missing', { missing: preflight.missing.join(', ') });
    return 3;
  }

  const controller = new AbortController();
  const unregister = registerShutdownHandlers(controller);
  try {
    const summary = await runtime.job.run(manifest.requests, controller.signal);
    if (summary.cancelled > 0 || controller.signal.aborted) {
      return 130;
    }
    return summary.failed > 0 ? 1 : 0;
  } finally {
    unregister();
  }
}

main(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    log.error('fatal error', { message: errorMessage(error) });
    process.exitCode = 1;
  });
