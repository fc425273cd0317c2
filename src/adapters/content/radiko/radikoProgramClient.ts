import type { FetchLike } from '@/ports/HttpPort';
import type { ProgramEntry, ProgramGuidePort, StationListPort } from '@/ports/ProgramGuidePort';
import { globalFetch, withTimeout } from '@/shared/http';
import { extractElements, extractTag } from '@/shared/xml';
import { broadcastDateKey, parseJstTimestamp } from '@/adapters/content/radiko/broadcastTime';

const SCHEDULE_URL = 'https://radiko.jp/v3/program/station/date/{date}/{station}.xml';
const NOW_ON_AIR_URL = 'https://radiko.jp/v3/feed/pc/noa/{station}.xml';
const STATION_LIST_URL = 'https://radiko.jp/v3/station/list/{area}.xml';

export interface RadikoProgramClientOptions {
  fetch?: FetchLike;
  scheduleUrl?: string;
  nowOnAirUrl?: string;
  stationListUrl?: string;
}

/**
 * Program guide, now-on-air feed and per-area station list. These endpoints need no token.
 */
export class RadikoProgramClient implements ProgramGuidePort, StationListPort {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: RadikoProgramClientOptions = {}) {
    this.fetchImpl = options.fetch ?? globalFetch;
  }

  public async fetchSchedule(stationId: string, at: number): Promise<ProgramEntry[]> {
    const url = (this.options.scheduleUrl ?? SCHEDULE_URL)
      .replace('{date}', broadcastDateKey(at))
      .replace('{station}', encodeURIComponent(stationId));
    return parseSchedule(await this.getText(url));
  }

  public async fetchNowOnAir(stationId: string): Promise<string | null> {
    const url = (this.options.nowOnAirUrl ?? NOW_ON_AIR_URL).replace(
      '{station}',
      encodeURIComponent(stationId),
    );
    return parseNowOnAir(await this.getText(url));
  }

  public async fetchStationList(areaId: string): Promise<Array<{ id: string; name: string }>> {
    const url = (this.options.stationListUrl ?? STATION_LIST_URL).replace(
      '{area}',
      encodeURIComponent(areaId),
    );
    return parseStationList(await this.getText(url));
  }

  private async getText(url: string): Promise<string> {
    const res = await this.fetchImpl(url, withTimeout({ method: 'GET' }));
    if (res.status !== 200) {
      throw new Error(`HTTP ${res.status} for ${url}`);
    }
    return res.text();
  }
}

export function parseSchedule(xml: string): ProgramEntry[] {
  const programs: ProgramEntry[] = [];
  for (const prog of extractElements(xml, 'prog')) {
    const startsAt = parseJstTimestamp(prog.attributes.ft ?? '');
    const endsAt = parseJstTimestamp(prog.attributes.to ?? '');
    if (startsAt === null || endsAt === null) {
      continue;
    }
    programs.push({
      title: extractTag(prog.body, 'title') ?? '',
      imageUrl: extractTag(prog.body, 'img') || null,
      startsAt,
      endsAt,
    });
  }
  return programs;
}

export function parseNowOnAir(xml: string): string | null {
  const item = extractElements(xml, 'item')[0];
  if (!item) {
    return null;
  }
  const title = (item.attributes.title ?? extractTag(item.body, 'title') ?? '').trim();
  const artist = (item.attributes.artist ?? extractTag(item.body, 'artist') ?? '').trim();
  if (!title) {
    return null;
  }
  return artist ? `${title} / ${artist}` : title;
}

export function parseStationList(xml: string): Array<{ id: string; name: string }> {
  return extractElements(xml, 'station')
    .map((station) => ({
      id: extractTag(station.body, 'id') ?? '',
      name: extractTag(station.body, 'name') ?? '',
    }))
    .filter((station) => station.id.length > 0);
}
