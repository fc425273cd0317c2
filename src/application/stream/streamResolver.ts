import { randomBytes } from 'node:crypto';
import type { AuthToken } from '@/application/auth/authTokenManager';
import {
  extractPlaylistUrl,
  findDescriptorStreamUrl,
  isCacheableStreamUrl,
  parsePlaylistCreateUrls,
  playlistParamVariants,
} from '@/application/stream/playlist';
import { AuthUnavailableError, UpstreamRejectedError } from '@/domain/errors';
import type { StreamRef } from '@/domain/session/types';
import type { StationDescriptor } from '@/domain/station/types';
import type { StreamLookupPort } from '@/ports/StreamLookupPort';
import { createLogger, errorMessage } from '@/shared/logging/logger';

export interface TokenProvider {
  getValidToken(): Promise<AuthToken>;
  invalidate(value?: string): void;
  authHeaders(token: AuthToken): Record<string, string>;
}

export type ResolveFailure =
  | { kind: 'station_not_found'; stationId: string; message: string }
  | { kind: 'station_unresolvable'; stationId: string; message: string; cause?: unknown };

export type ResolveResult = { ok: true; stream: StreamRef } | { ok: false; failure: ResolveFailure };

export interface StreamResolverOptions {
  /** Listener-session id generator; random hex by default. */
  createSessionId?: () => string;
}

type DescriptorOutcome = { kind: 'url'; url: string } | { kind: 'forbidden' } | { kind: 'none' };

/**
 * Turns a station into a playable stream reference. Fixed URLs pass through
 * untouched; everything else goes through the upstream with a valid token.
 * There is no retry here beyond what the token manager does.
 */
export class StreamResolver {
  private readonly log = createLogger('Stream', 'Resolver');
  private readonly urlCache = new Map<string, string>();
  private readonly createSessionId: () => string;

  constructor(
    private readonly tokens: TokenProvider,
    private readonly lookup: StreamLookupPort,
    options: StreamResolverOptions = {},
  ) {
    this.createSessionId = options.createSessionId ?? (() => randomBytes(16).toString('hex'));
  }

  public async resolve(station: StationDescriptor): Promise<ResolveResult> {
    if (station.streamUrl) {
      return {
        ok: true,
        stream: {
          stationId: station.id,
          url: station.streamUrl,
          transport: station.source === 'curated' ? 'media-server' : 'player',
          headers: {},
        },
      };
    }

    let token: AuthToken;
    try {
      token = await this.tokens.getValidToken();
    } catch (error) {
      const message = error instanceof AuthUnavailableError ? 'auth unavailable' : errorMessage(error);
      return this.unresolvable(station, message, error);
    }
    const headers = this.tokens.authHeaders(token);

    try {
      const cached = this.urlCache.get(station.id);
      if (cached) {
        this.log.debug('stream url from cache', { stationId: station.id });
        return { ok: true, stream: this.playerStream(station, cached, headers) };
      }

      const descriptor = await this.lookup.fetchStreamDescriptor(station.id, headers);
      if (descriptor.kind === 'not_found') {
        return this.notFound(station, 'station unknown upstream');
      }

      const outcome = await this.resolveFromDescriptor(station.id, descriptor.xml, headers);
      if (outcome.kind === 'forbidden') {
        return this.notFound(station, 'station outside service area');
      }
      if (outcome.kind === 'none') {
        return this.unresolvable(station, 'no playable stream in descriptor');
      }
      if (isCacheableStreamUrl(outcome.url)) {
        this.urlCache.set(station.id, outcome.url);
      }
      this.log.info('stream resolved', { stationId: station.id, url: outcome.url });
      return { ok: true, stream: this.playerStream(station, outcome.url, headers) };
    } catch (error) {
      if (error instanceof UpstreamRejectedError) {
        this.tokens.invalidate(token.value);
      }
      return this.unresolvable(station, errorMessage(error), error);
    }
  }

  /** Forgets a station's cached stream URL so its next resolve asks upstream again. */
  public invalidate(stationId: string): void {
    if (this.urlCache.delete(stationId)) {
      this.log.debug('cached stream url dropped', { stationId });
    }
  }

  private async resolveFromDescriptor(
    stationId: string,
    xml: string,
    headers: Record<string, string>,
  ): Promise<DescriptorOutcome> {
    const sessionId = this.createSessionId();
    let forbidden = false;
    for (const createUrl of parsePlaylistCreateUrls(xml)) {
      for (const params of playlistParamVariants(stationId, sessionId)) {
        const result = await this.lookup.createPlaylist(createUrl, params, headers);
        if (result.kind === 'forbidden') {
          forbidden = true;
          break;
        }
        if (result.kind === 'failed') {
          this.log.debug('playlist variant refused', { stationId, createUrl, status: result.status });
          continue;
        }
        const url = extractPlaylistUrl(result.body, result.url);
        if (url) {
          return { kind: 'url', url };
        }
      }
    }
    const direct = findDescriptorStreamUrl(xml);
    if (direct) {
      return { kind: 'url', url: direct };
    }
    return forbidden ? { kind: 'forbidden' } : { kind: 'none' };
  }

  private playerStream(
    station: StationDescriptor,
    url: string,
    headers: Record<string, string>,
  ): StreamRef {
    return { stationId: station.id, url, transport: 'player', headers: { ...headers } };
  }

  private notFound(station: StationDescriptor, message: string): ResolveResult {
    this.log.warn('station not found', { stationId: station.id, message });
    return { ok: false, failure: { kind: 'station_not_found', stationId: station.id, message } };
  }

  private unresolvable(station: StationDescriptor, message: string, cause?: unknown): ResolveResult {
    this.log.warn('station unresolvable', { stationId: station.id, message });
    return {
      ok: false,
      failure: { kind: 'station_unresolvable', stationId: station.id, message, cause },
    };
  }
}
