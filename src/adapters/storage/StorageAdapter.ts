import { promises as fs } from 'node:fs';
import path from 'node:path';
import { errorMessage } from '@/domain/errors';
import type { StoragePort, StorageReadOptions } from '@/ports/StoragePort';
import { safeJsonParse } from '@/shared/bestEffort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * JSON documents on the local disk. Writes land in a temp file first and
 * are renamed over the target.
 */
export class StorageAdapter implements StoragePort {
  constructor(private readonly log: ComponentLogger = createLogger('Storage')) {}

  public async readJson<T>(filePath: string, fallback: T, options?: StorageReadOptions): Promise<T> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        this.log.warn('failed to read json', { filePath, message: errorMessage(error) });
      } else if (options?.writeIfMissing) {
        await this.writeJson(filePath, fallback);
      }
      return fallback;
    }
    return safeJsonParse<T>(raw, fallback, {
      onError: 'warn',
      log: this.log,
      label: 'invalid json; using defaults',
      context: { filePath },
    });
  }

  public async writeJson(filePath: string, data: unknown): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const tempPath = `${filePath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
    await fs.rename(tempPath, filePath);
  }
}
