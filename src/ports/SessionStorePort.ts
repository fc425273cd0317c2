import type { PersistedSession } from '@/domain/session/types';

export interface SessionStorePort {
  /** Returns null when nothing usable is stored; never throws. */
  load(): Promise<PersistedSession | null>;
  /** Throws PersistenceError when the record cannot be written. */
  save(session: PersistedSession): Promise<void>;
}
