import { execFile } from 'node:child_process';

export type CommandOptions = {
  timeoutMs?: number;
  env?: Record<string, string>;
};

export type CommandResult = {
  stdout: string;
  stderr: string;
};

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

export class CommandError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number | string | null,
    public readonly stderr: string,
    public readonly timedOut: boolean,
  ) {
    super(message);
    this.name = 'CommandError';
  }
}

function lastLine(text: string): string {
  const lines = text.split('\n').map((line) => line.trim()).filter(Boolean);
  return lines[lines.length - 1] ?? '';
}

/**
 * Runs an external tool without a shell and resolves with its output.
 * Rejects with a CommandError on spawn failure, non-zero exit or timeout.
 */
export const execCommand: CommandRunner = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      {
        encoding: 'utf8',
        timeout: options.timeoutMs ?? 0,
        maxBuffer: 16 * 1024 * 1024,
        env: options.env ? { ...process.env, ...options.env } : process.env,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr });
          return;
        }
        const code: unknown = error.code;
        const exitCode = typeof code === 'number' || typeof code === 'string' ? code : null;
        const timedOut = error.killed === true && error.signal === 'SIGTERM';
        if (code === 'ENOENT') {
          reject(new CommandError(`${command} not found`, command, 'ENOENT', stderr, false));
          return;
        }
        const detail = lastLine(stderr) || error.message;
        reject(
          new CommandError(
            timedOut ? `${command} timed out` : `${command} failed: ${detail}`,
            command,
            exitCode,
            stderr,
            timedOut,
          ),
        );
      },
    );
  });
