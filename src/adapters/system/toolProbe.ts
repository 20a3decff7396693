import { constants, promises as fs } from 'node:fs';
import path from 'node:path';
import type { ToolProbePort } from '@/ports/ToolProbePort';
import { CommandError, execCommand, type CommandRunner } from '@/shared/process/commandRunner';

export class ShellToolProbe implements ToolProbePort {
  private readonly run: CommandRunner;

  constructor(run?: CommandRunner) {
    this.run = run ?? execCommand;
  }

  public async isAvailable(command: string): Promise<boolean> {
    if (path.isAbsolute(command)) {
      try {
        await fs.access(command, constants.X_OK);
        return true;
      } catch {
        return false;
      }
    }
    try {
      // `command` is a shell builtin; the name is passed as a positional argument.
      await this.run('sh', ['-c', 'command -v "$1"', 'sh', command], { timeoutMs: 2000 });
      return true;
    } catch (error) {
      if (error instanceof CommandError && !error.timedOut) {
        return false;
      }
      throw error;
    }
  }
}
