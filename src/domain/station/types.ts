import { z } from 'zod';

export type StationMode = 'curated' | 'world';

export const STATION_MODES: readonly StationMode[] = ['curated', 'world'];

/**
 * A playable station. `streamUrl` is a fixed stream that bypasses upstream
 * resolution; curated entries without one are resolved through the upstream API.
 */
export interface StationDescriptor {
  readonly id: string;
  readonly name: string;
  readonly streamUrl?: string;
  readonly imageUrl?: string;
  readonly source: StationMode;
}

export function isStationMode(value: unknown): value is StationMode {
  return value === 'curated' || value === 'world';
}

export function createStation(input: {
  id: string;
  name?: string;
  streamUrl?: string;
  imageUrl?: string;
  source: StationMode;
}): StationDescriptor {
  const id = input.id.trim();
  const streamUrl = input.streamUrl?.trim();
  const imageUrl = input.imageUrl?.trim();
  return Object.freeze({
    id,
    name: input.name?.trim() || id,
    ...(streamUrl ? { streamUrl } : {}),
    ...(imageUrl ? { imageUrl } : {}),
    source: input.source,
  });
}

export function stationLabel(station: Pick<StationDescriptor, 'id' | 'name'>): string {
  return station.name || station.id || 'Station';
}

const stationFileSchema = z.array(
  z.object({
    id: z.string().trim().min(1, 'id is required'),
    name: z.string().optional(),
    stream_url: z.string().optional(),
    image_url: z.string().optional(),
  }),
);

export type StationFileEntry = z.input<typeof stationFileSchema>[number];

/**
 * Validates the curated station file. Throws when the document is not a list or an
 * entry lacks an id; duplicate ids keep the first occurrence.
 */
export function parseStationFile(raw: unknown): StationDescriptor[] {
  const parsed = stationFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
    throw new Error(`invalid station file (${issues.join(', ')})`);
  }
  const seen = new Set<string>();
  const stations: StationDescriptor[] = [];
  for (const entry of parsed.data) {
    if (seen.has(entry.id)) {
      continue;
    }
    seen.add(entry.id);
    stations.push(
      createStation({
        id: entry.id,
        name: entry.name,
        streamUrl: entry.stream_url,
        imageUrl: entry.image_url,
        source: 'curated',
      }),
    );
  }
  return stations;
}
