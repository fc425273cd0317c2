import { extractElements, extractTag } from '@/shared/xml';

const M3U8_PATTERN = /https?:\/\/[^\s<>"]+?\.m3u8(?:\?[^\s<>"]*)?/g;

/**
 * Playlist-creation endpoints listed in a stream descriptor, live entries
 * (`areafree="0" timefree="0"`) first, document order otherwise.
 */
export function parsePlaylistCreateUrls(xml: string): string[] {
  const live: string[] = [];
  const others: string[] = [];
  for (const node of extractElements(xml, 'url')) {
    const createUrl = extractTag(node.body, 'playlist_create_url');
    if (!createUrl) {
      continue;
    }
    const isLive = node.attributes.areafree === '0' && node.attributes.timefree === '0';
    (isLive ? live : others).push(createUrl);
  }
  return [...live, ...others];
}

/**
 * Form parameter sets tried against each playlist-creation endpoint, most specific first.
 */
export function playlistParamVariants(stationId: string, lsid: string): Array<Record<string, string>> {
  return [
    { station_id: stationId, l: '15', lsid, type: 'b' },
    { station_id: stationId, l: '15', lsid },
    { station_id: stationId, lsid },
    { station_id: stationId },
  ];
}

/**
 * The stream URL in a playlist response: the first absolute m3u8 URL, or the first
 * entry of an `#EXTM3U` body resolved against the request URL.
 */
export function extractPlaylistUrl(body: string, requestUrl: string): string | null {
  const absolute = body.match(M3U8_PATTERN);
  if (absolute) {
    return absolute[0];
  }
  if (!body.includes('#EXTM3U')) {
    return null;
  }
  const entry = body
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find((line) => line.length > 0 && !line.startsWith('#'));
  if (!entry) {
    return null;
  }
  try {
    return new URL(entry, requestUrl).toString();
  } catch {
    return null;
  }
}

/**
 * Last resort: an m3u8 URL written directly in the descriptor. Bare playlist-creation
 * endpoints (`playlist.m3u8` without a station parameter) are not playable and are skipped.
 */
export function findDescriptorStreamUrl(xml: string): string | null {
  for (const candidate of xml.match(M3U8_PATTERN) ?? []) {
    if (candidate.includes('playlist.m3u8') && !candidate.includes('station_id=')) {
      continue;
    }
    return candidate;
  }
  return null;
}

/** Session-bound media lists expire quickly and must not be cached. */
export function isCacheableStreamUrl(url: string): boolean {
  return !url.includes('medialist');
}
