import { z } from 'zod';
import { PersistenceError } from '@/domain/errors';
import type { PersistedSession } from '@/domain/session/types';
import type { SessionStorePort } from '@/ports/SessionStorePort';
import type { StoragePort } from '@/ports/StoragePort';
import { createLogger, errorMessage } from '@/shared/logging/logger';

const persistedSessionSchema = z.object({
  stationId: z.string().trim().min(1),
  mode: z.enum(['curated', 'world']),
  station: z
    .object({
      name: z.string(),
      streamUrl: z.string().min(1),
      imageUrl: z.string().optional(),
    })
    .optional(),
});

/**
 * Last station/mode record kept in a small JSON file.
 */
export class FileSessionStore implements SessionStorePort {
  private readonly log = createLogger('Session', 'Store');

  constructor(
    private readonly storage: StoragePort,
    private readonly filePath: string,
  ) {}

  public async load(): Promise<PersistedSession | null> {
    const read = await this.storage.readJson(this.filePath);
    if (read.kind === 'missing') {
      return null;
    }
    if (read.kind === 'invalid') {
      this.log.warn('session state unreadable', { filePath: this.filePath, reason: read.reason });
      return null;
    }
    const parsed = persistedSessionSchema.safeParse(read.value);
    if (!parsed.success) {
      this.log.warn('ignoring malformed session state', {
        filePath: this.filePath,
        issues: parsed.error.issues.map((issue) => issue.path.join('.') || issue.message),
      });
      return null;
    }
    return parsed.data;
  }

  public async save(session: PersistedSession): Promise<void> {
    try {
      await this.storage.writeJson(this.filePath, session);
    } catch (error) {
      throw new PersistenceError(this.filePath, `failed to write session state: ${errorMessage(error)}`);
    }
  }
}
