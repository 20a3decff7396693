import { spawn, type SpawnOptions } from 'node:child_process';
import type { Readable } from 'node:stream';

/** The slice of ChildProcess the adapters rely on; tests provide their own. */
export interface ChildProcessLike {
  readonly pid?: number;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  readonly stderr: Readable | null;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
  unref(): void;
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildProcessLike;

export const spawnProcess: SpawnFn = (command, args, options) => spawn(command, args, options);
