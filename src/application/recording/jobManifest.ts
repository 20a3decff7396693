import { createTrackRequest, type TrackRequest } from '@/domain/recording/types';

export type ManifestIssue = {
  index: number;
  message: string;
};

export type ParsedManifest = {
  requests: TrackRequest[];
  issues: ManifestIssue[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

/**
 * Validates a job manifest:
 *
 *   { "verbose": false, "tracks": [{ "trackHandle": "...", "destinationPath": "...",
 *     "expectedDurationSec": 180 }] }
 *
 * Invalid entries are reported by index and left out; the rest keep their order.
 */
export function parseJobManifest(raw: unknown): ParsedManifest {
  if (!isRecord(raw) || !Array.isArray(raw.tracks)) {
    return { requests: [], issues: [{ index: -1, message: 'manifest must contain a "tracks" array' }] };
  }
  const defaultVerbose = raw.verbose === true;
  const requests: TrackRequest[] = [];
  const issues: ManifestIssue[] = [];

  raw.tracks.forEach((entry: unknown, index: number) => {
    if (!isRecord(entry)) {
      issues.push({ index, message: 'entry is not an object' });
      return;
    }
    const trackHandle = nonEmptyString(entry.trackHandle);
    const destinationPath = nonEmptyString(entry.destinationPath);
    const duration = entry.expectedDurationSec;
    if (!trackHandle) {
      issues.push({ index, message: 'trackHandle is required' });
      return;
    }
    if (!destinationPath) {
      issues.push({ index, message: 'destinationPath is required' });
      return;
    }
    if (typeof duration !== 'number' || !Number.isFinite(duration) || duration <= 0) {
      issues.push({ index, message: 'expectedDurationSec must be a positive number' });
      return;
    }
    requests.push(
      createTrackRequest({
        trackHandle,
        destinationPath,
        expectedDurationSec: duration,
        verbose: typeof entry.verbose === 'boolean' ? entry.verbose : defaultVerbose,
      }),
    );
  });

  return { requests, issues };
}
