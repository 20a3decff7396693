export interface ToolProbePort {
  /** Resolves true when `command` can be executed (on PATH or as an absolute path). */
  isAvailable(command: string): Promise<boolean>;
}
