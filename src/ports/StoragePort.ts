export interface StoragePort {
  /** Parsed JSON, or undefined when the file is missing or unreadable. */
  readJson(path: string): Promise<unknown>;
  writeJson(path: string, data: unknown): Promise<void>;
  ensureDir(path: string): Promise<void>;
  /** Size in bytes, or null when the file does not exist. */
  size(path: string): Promise<number | null>;
  remove(path: string): Promise<void>;
}
