import type { StationDescriptor } from '@/domain/station/types';

export interface StationDirectoryPort {
  /** A set of playable world-radio stations; an empty list when the directory has none. */
  lookup(): Promise<StationDescriptor[]>;
}
