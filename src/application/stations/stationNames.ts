import { createStation, type StationDescriptor } from '@/domain/station/types';

/**
 * Fills in display names from the upstream station list for curated entries that
 * only carry an id. Entries with an explicit name or a fixed URL stay as they are.
 */
export function hydrateStationNames(
  stations: readonly StationDescriptor[],
  upstream: ReadonlyArray<{ id: string; name: string }>,
): StationDescriptor[] {
  const names = new Map(upstream.map((entry) => [entry.id, entry.name.trim()]));
  return stations.map((station) => {
    const name = names.get(station.id);
    if (!name || station.name !== station.id || station.streamUrl) {
      return station;
    }
    return createStation({ ...station, name });
  });
}

export function needsNameHydration(stations: readonly StationDescriptor[]): boolean {
  return stations.some((station) => !station.streamUrl && station.name === station.id);
}
