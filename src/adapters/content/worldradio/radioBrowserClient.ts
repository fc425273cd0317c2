import { createStation, type StationDescriptor } from '@/domain/station/types';
import type { ClockPort } from '@/ports/ClockPort';
import type { FetchLike } from '@/ports/HttpPort';
import type { StationDirectoryPort } from '@/ports/StationDirectoryPort';
import { systemClock } from '@/shared/time/systemClock';
import { globalFetch, withTimeout } from '@/shared/http';
import { createLogger } from '@/shared/logging/logger';

const REQUEST_TIMEOUT_MS = 10_000;

type RadioBrowserStation = {
  stationuuid?: unknown;
  name?: unknown;
  url_resolved?: unknown;
  url?: unknown;
  favicon?: unknown;
};

export interface RadioBrowserClientOptions {
  baseUrl: string;
  countryCode: string | null;
  limit: number;
  /** Results are reused for this long before the directory is queried again. */
  cacheTtlMs: number;
  fetch?: FetchLike;
  clock?: ClockPort;
}

/**
 * World-radio lookup against a radio-browser directory mirror.
 */
export class RadioBrowserClient implements StationDirectoryPort {
  private readonly log = createLogger('Upstream', 'WorldRadio');
  private readonly fetchImpl: FetchLike;
  private readonly clock: ClockPort;
  private cache: StationDescriptor[] = [];
  private fetchedAt = 0;

  constructor(private readonly options: RadioBrowserClientOptions) {
    this.fetchImpl = options.fetch ?? globalFetch;
    this.clock = options.clock ?? systemClock;
  }

  public async lookup(): Promise<StationDescriptor[]> {
    if (this.cache.length > 0 && this.clock.now() - this.fetchedAt < this.options.cacheTtlMs) {
      return this.cache;
    }
    const url = new URL(`${this.options.baseUrl}/stations/search`);
    url.searchParams.set('limit', String(this.options.limit));
    url.searchParams.set('hidebroken', 'true');
    if (this.options.countryCode) {
      url.searchParams.set('countrycode', this.options.countryCode);
    }
    const res = await this.fetchImpl(
      url,
      withTimeout({ method: 'GET', headers: { 'User-Agent': 'tunedeck/0.1' } }, REQUEST_TIMEOUT_MS),
    );
    if (!res.ok) {
      throw new Error(`directory request failed: HTTP ${res.status}`);
    }
    const payload: unknown = await res.json();
    const stations = parseDirectoryStations(payload);
    this.log.debug('directory lookup', { count: stations.length });
    if (stations.length > 0) {
      this.cache = stations;
      this.fetchedAt = this.clock.now();
    }
    return stations.length > 0 ? stations : this.cache;
  }
}

const asText = (value: unknown): string => (typeof value === 'string' ? value.trim() : '');

export function parseDirectoryStations(payload: unknown): StationDescriptor[] {
  if (!Array.isArray(payload)) {
    throw new Error('directory returned an unexpected payload');
  }
  const stations: StationDescriptor[] = [];
  for (const item of payload) {
    if (!item || typeof item !== 'object') {
      continue;
    }
    const entry: RadioBrowserStation = item;
    const name = asText(entry.name);
    const streamUrl = asText(entry.url_resolved) || asText(entry.url);
    if (!name || !streamUrl) {
      continue;
    }
    stations.push(
      createStation({
        id: asText(entry.stationuuid) || name,
        name,
        streamUrl,
        imageUrl: asText(entry.favicon),
        source: 'world',
      }),
    );
  }
  return stations;
}
