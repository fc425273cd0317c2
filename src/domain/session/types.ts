import type { StationDescriptor, StationMode } from '@/domain/station/types';

export type PlaybackStatus = 'idle' | 'resolving' | 'playing' | 'error';

/**
 * A playable stream. `player` streams are handed to a process that attaches the
 * headers itself; `media-server` streams go to the media-server control session,
 * which cannot carry headers.
 */
export interface StreamRef {
  readonly stationId: string;
  readonly url: string;
  readonly transport: 'media-server' | 'player';
  readonly headers: Readonly<Record<string, string>>;
}

export type SessionErrorKind =
  | 'auth_unavailable'
  | 'station_unresolvable'
  | 'station_not_found'
  | 'playback_failed'
  | 'lookup_failed';

export interface SessionError {
  readonly kind: SessionErrorKind;
  readonly stationId: string | null;
  readonly stationName: string;
  readonly message: string;
}

export interface SessionSnapshot {
  readonly mode: StationMode;
  readonly station: StationDescriptor | null;
  readonly pending: StationDescriptor | null;
  readonly stream: StreamRef | null;
  readonly status: PlaybackStatus;
  readonly lastError: SessionError | null;
}

export interface PersistedStation {
  name: string;
  streamUrl: string;
  imageUrl?: string;
}

export interface PersistedSession {
  stationId: string;
  mode: StationMode;
  /** World-radio entries cannot be looked up again by id, so they carry their stream. */
  station?: PersistedStation;
}

export interface NowPlaying {
  readonly stationId: string;
  readonly title: string;
  readonly artworkUrl: string | null;
  readonly artwork: Buffer | null;
  readonly fetchedAt: number;
}

export const NOW_PLAYING_STALE_MULTIPLIER = 3;

export function isNowPlayingFresh(
  nowPlaying: NowPlaying | null,
  now: number,
  pollIntervalMs: number,
): nowPlaying is NowPlaying {
  if (!nowPlaying) {
    return false;
  }
  return now - nowPlaying.fetchedAt <= pollIntervalMs * NOW_PLAYING_STALE_MULTIPLIER;
}
