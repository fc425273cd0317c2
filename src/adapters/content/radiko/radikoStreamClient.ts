import { UpstreamRejectedError } from '@/domain/errors';
import type { FetchLike } from '@/ports/HttpPort';
import type { PlaylistResult, StreamDescriptorResult, StreamLookupPort } from '@/ports/StreamLookupPort';
import { safeReadText } from '@/shared/bestEffort';
import { globalFetch, withTimeout } from '@/shared/http';
import { createLogger } from '@/shared/logging/logger';

export const DEFAULT_STREAM_DESCRIPTOR_URLS = [
  'https://radiko.jp/v3/station/stream/pc_html5/{station}.xml',
  'https://radiko.jp/v3/station/stream/pc/{station}.xml',
  'http://radiko.jp/v3/station/stream/pc_html5/{station}.xml',
  'http://radiko.jp/v3/station/stream/pc/{station}.xml',
];

export interface RadikoStreamClientOptions {
  descriptorUrls?: string[];
  fetch?: FetchLike;
}

export class RadikoStreamClient implements StreamLookupPort {
  private readonly log = createLogger('Upstream', 'Stream');
  private readonly fetchImpl: FetchLike;
  private readonly descriptorUrls: string[];

  constructor(options: RadikoStreamClientOptions = {}) {
    this.fetchImpl = options.fetch ?? globalFetch;
    this.descriptorUrls = options.descriptorUrls ?? DEFAULT_STREAM_DESCRIPTOR_URLS;
  }

  public async fetchStreamDescriptor(
    stationId: string,
    headers: Record<string, string>,
  ): Promise<StreamDescriptorResult> {
    const statuses: number[] = [];
    for (const template of this.descriptorUrls) {
      const url = template.replace('{station}', encodeURIComponent(stationId));
      const res = await this.fetchImpl(url, withTimeout({ method: 'GET', headers }));
      this.log.debug('stream descriptor status', { stationId, url, status: res.status });
      if (res.status === 401) {
        throw new UpstreamRejectedError(401, `stream descriptor rejected for ${stationId}`);
      }
      if (res.status === 200) {
        return { kind: 'ok', xml: await safeReadText(res), url };
      }
      statuses.push(res.status);
    }
    if (statuses.length > 0 && statuses.every((status) => status === 404)) {
      return { kind: 'not_found' };
    }
    throw new Error(`stream descriptor unavailable for ${stationId} (HTTP ${statuses.join(', ')})`);
  }

  /**
   * POSTs the form first (the endpoint expects its parameters in the body) and
   * retries as a GET with a query string when that is refused.
   */
  public async createPlaylist(
    url: string,
    params: Record<string, string>,
    headers: Record<string, string>,
  ): Promise<PlaylistResult> {
    let res = await this.fetchImpl(
      url,
      withTimeout({
        method: 'POST',
        headers: { ...headers, 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams(params).toString(),
      }),
    );
    if (res.status !== 200) {
      this.log.debug('playlist POST refused', { url, status: res.status });
      res = await this.fetchImpl(withQuery(url, params), withTimeout({ method: 'GET', headers }));
    }
    if (res.status === 401) {
      throw new UpstreamRejectedError(401, 'playlist request rejected');
    }
    if (res.status === 403) {
      return { kind: 'forbidden', status: res.status };
    }
    if (res.status !== 200) {
      return { kind: 'failed', status: res.status };
    }
    return { kind: 'ok', body: await safeReadText(res), url: res.url || url };
  }
}

export function withQuery(url: string, extra: Record<string, string>): string {
  const target = new URL(url);
  for (const [key, value] of Object.entries(extra)) {
    target.searchParams.set(key, value);
  }
  return target.toString();
}
