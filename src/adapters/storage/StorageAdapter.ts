import { promises as fs } from 'node:fs';
import type { StoragePort } from '@/ports/StoragePort';
import { ensureDir, fileSize, readJson, writeJson } from '@/shared/utils/file';
import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';

export class StorageAdapter implements StoragePort {
  private readonly log = createLogger('Core', 'Storage');

  public readJson(filePath: string): Promise<unknown> {
    return readJson(filePath);
  }

  public async writeJson(filePath: string, data: unknown): Promise<void> {
    await writeJson(filePath, data);
  }

  public async ensureDir(dirPath: string): Promise<void> {
    await ensureDir(dirPath);
  }

  public size(filePath: string): Promise<number | null> {
    return fileSize(filePath);
  }

  /** Missing files are not an error; other failures are logged and swallowed. */
  public async remove(filePath: string): Promise<void> {
    try {
      await fs.rm(filePath, { force: true });
    } catch (error) {
      this.log.warn('failed to remove file', { filePath, message: errorMessage(error) });
    }
  }
}
