import path from 'node:path';

/**
 * Last segment of a track handle or MPRIS track id:
 * `spotify:track:abc` and `/com/spotify/track/abc` both yield `abc`.
 */
export function trackIdOf(handle: string): string {
  const trimmed = handle.trim();
  const segments = trimmed.split(/[:/]/).filter(Boolean);
  return segments.length > 0 ? segments[segments.length - 1] : trimmed;
}

export function sameTrack(left: string | null | undefined, right: string): boolean {
  if (!left) {
    return false;
  }
  return trackIdOf(left) === trackIdOf(right);
}

/** Temporary capture path for a handle under the build directory. */
export function rawCapturePath(buildDir: string, handle: string): string {
  const safe = trackIdOf(handle).replace(/[^A-Za-z0-9._-]/g, '_') || 'capture';
  return path.join(buildDir, `${safe}.wav`);
}
