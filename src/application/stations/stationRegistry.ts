import { createStation, type StationDescriptor, type StationMode } from '@/domain/station/types';
import type { PersistedSession } from '@/domain/session/types';
import type { StationDirectoryPort } from '@/ports/StationDirectoryPort';
import { createLogger } from '@/shared/logging/logger';

export interface StationRegistryOptions {
  random?: () => number;
}

/**
 * Ordered curated list with a wrapping cursor, plus the world-radio working set.
 * Each mode keeps its own state across mode switches.
 */
export class StationRegistry {
  private readonly log = createLogger('Stations', 'Registry');
  private readonly random: () => number;
  private curated: readonly StationDescriptor[];
  private mode: StationMode = 'curated';
  private cursor = 0;
  private worldSet: readonly StationDescriptor[] = [];
  private worldCurrent: StationDescriptor | null = null;
  private lookupSeq = 0;

  constructor(
    curated: readonly StationDescriptor[],
    private readonly directory: StationDirectoryPort,
    options: StationRegistryOptions = {},
  ) {
    if (curated.length === 0) {
      throw new Error('station list is empty');
    }
    this.curated = curated;
    this.random = options.random ?? Math.random;
  }

  public getMode(): StationMode {
    return this.mode;
  }

  public getCursor(): number {
    return this.cursor;
  }

  public curatedStations(): readonly StationDescriptor[] {
    return this.curated;
  }

  public current(): StationDescriptor | null {
    return this.mode === 'curated' ? this.curated[this.cursor] : this.worldCurrent;
  }

  public find(stationId: string): StationDescriptor | null {
    return (
      this.curated.find((station) => station.id === stationId) ??
      this.worldSet.find((station) => station.id === stationId) ??
      null
    );
  }

  /**
   * Curated: advances the cursor. World: a fresh directory pick. Resolves to null
   * when a newer world lookup superseded this one.
   */
  public async next(): Promise<StationDescriptor | null> {
    return this.mode === 'curated' ? this.move(1) : this.pickWorld();
  }

  public async previous(): Promise<StationDescriptor | null> {
    return this.mode === 'curated' ? this.move(-1) : this.pickWorld();
  }

  /**
   * Enters a mode. Entering world mode without a working set performs a lookup.
   */
  public async setMode(mode: StationMode): Promise<StationDescriptor | null> {
    this.enterMode(mode);
    if (mode === 'world' && !this.worldCurrent) {
      return this.pickWorld();
    }
    return this.current();
  }

  /** Switches the mode flag only; no lookup. */
  public enterMode(mode: StationMode): void {
    if (mode !== this.mode) {
      this.log.info('mode switched', { from: this.mode, to: mode });
      this.mode = mode;
    }
  }

  /**
   * Seeds mode and position from a persisted session. An unknown curated id falls
   * back to the first entry.
   */
  public restore(session: PersistedSession | null): void {
    if (!session) {
      return;
    }
    this.mode = session.mode;
    if (session.mode === 'curated') {
      const index = this.curated.findIndex((station) => station.id === session.stationId);
      if (index < 0) {
        this.log.warn('persisted station no longer listed; using first entry', {
          stationId: session.stationId,
        });
      }
      this.cursor = Math.max(0, index);
      return;
    }
    if (session.station) {
      const station = createStation({
        id: session.stationId,
        name: session.station.name,
        streamUrl: session.station.streamUrl,
        imageUrl: session.station.imageUrl,
        source: 'world',
      });
      this.worldSet = [station];
      this.worldCurrent = station;
    }
  }

  /**
   * Replaces the curated list (e.g. after name hydration). The cursor follows the
   * current station by id, or returns to the first entry.
   */
  public replaceCurated(stations: readonly StationDescriptor[]): void {
    if (stations.length === 0) {
      throw new Error('station list is empty');
    }
    const currentId = this.curated[this.cursor]?.id;
    this.curated = stations;
    this.cursor = Math.max(0, stations.findIndex((station) => station.id === currentId));
  }

  private move(delta: number): StationDescriptor {
    const size = this.curated.length;
    this.cursor = (((this.cursor + delta) % size) + size) % size;
    return this.curated[this.cursor];
  }

  private async pickWorld(): Promise<StationDescriptor | null> {
    const seq = ++this.lookupSeq;
    const stations = await this.directory.lookup();
    if (seq !== this.lookupSeq) {
      this.log.debug('world lookup superseded', { seq });
      return null;
    }
    if (stations.length === 0) {
      throw new Error('world directory returned no stations');
    }
    const previousId = this.worldCurrent?.id;
    const candidates =
      stations.length > 1 && previousId
        ? stations.filter((station) => station.id !== previousId)
        : stations;
    const pool = candidates.length > 0 ? candidates : stations;
    const index = Math.min(pool.length - 1, Math.floor(this.random() * pool.length));
    this.worldSet = stations;
    this.worldCurrent = pool[index];
    this.log.info('world station picked', { stationId: this.worldCurrent.id, name: this.worldCurrent.name });
    return this.worldCurrent;
  }
}
