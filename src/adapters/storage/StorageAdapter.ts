import { promises as fs } from 'node:fs';
import type { JsonReadResult, StoragePort } from '@/ports/StoragePort';
import { errorMessage } from '@/shared/logging/logger';
import { writeJsonAtomic } from '@/shared/utils/file';

export class StorageAdapter implements StoragePort {
  public async readJson(filePath: string): Promise<JsonReadResult> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return { kind: 'missing' };
      }
      return { kind: 'invalid', reason: errorMessage(error) };
    }
    try {
      const value: unknown = JSON.parse(content);
      return { kind: 'ok', value };
    } catch (error) {
      return { kind: 'invalid', reason: `not valid JSON: ${errorMessage(error)}` };
    }
  }

  public async writeJson(filePath: string, data: unknown): Promise<void> {
    await writeJsonAtomic(filePath, data);
  }
}
