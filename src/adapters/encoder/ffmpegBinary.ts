import ffmpegInstaller from '@ffmpeg-installer/ffmpeg';

/** Configured path first, then the bundled binary, then whatever `ffmpeg` is on PATH. */
export function resolveFfmpegPath(configured?: string): string {
  const explicit = configured?.trim();
  if (explicit) {
    return explicit;
  }
  const bundled: unknown = ffmpegInstaller.path;
  return typeof bundled === 'string' && bundled ? bundled : 'ffmpeg';
}
