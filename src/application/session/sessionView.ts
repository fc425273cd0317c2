import type { StationMode } from '@/domain/station/types';
import { isNowPlayingFresh, type NowPlaying, type SessionSnapshot } from '@/domain/session/types';
import type { DisplayFrame } from '@/ports/DisplayPort';

export const SHUTDOWN_PROMPT_TITLE = 'Shutdown?';
export const SHUTDOWN_PROMPT_HINT = 'Press X to confirm';
export const LOADING_TITLE = 'Loading...';
export const ONLY_ONE_STATION = 'Only one station';

export interface SessionView {
  snapshot: SessionSnapshot;
  nowPlaying: NowPlaying | null;
  promptVisible: boolean;
  shuttingDown: boolean;
  notice: string | null;
  now: number;
  pollIntervalMs: number;
}

/** Label shown in place of a title when no fresh metadata exists. */
export function genericTitle(mode: StationMode): string {
  return mode === 'world' ? 'World Radio' : 'Now Playing';
}

function statusText(snapshot: SessionSnapshot): string {
  switch (snapshot.status) {
    case 'playing':
      return 'Playing';
    case 'resolving':
      return 'Tuning';
    case 'error':
      return 'Playback error';
    case 'idle':
      return 'Stopped';
  }
}

export function buildDisplayFrame(view: SessionView): DisplayFrame {
  const { snapshot } = view;
  if (view.shuttingDown) {
    return { stationName: 'Shutting down', title: '', artwork: null, statusLine: '' };
  }
  if (view.promptVisible) {
    return { stationName: SHUTDOWN_PROMPT_TITLE, title: SHUTDOWN_PROMPT_HINT, artwork: null, statusLine: '' };
  }
  const statusLine = snapshot.lastError
    ? `${snapshot.lastError.stationName}: ${snapshot.lastError.message}`
    : view.notice ?? statusText(snapshot);
  if (snapshot.pending) {
    return { stationName: snapshot.pending.name, title: LOADING_TITLE, artwork: null, statusLine };
  }
  if (!snapshot.station) {
    return { stationName: genericTitle(snapshot.mode), title: '', artwork: null, statusLine };
  }
  const nowPlaying =
    isNowPlayingFresh(view.nowPlaying, view.now, view.pollIntervalMs) &&
    view.nowPlaying.stationId === snapshot.station.id
      ? view.nowPlaying
      : null;
  return {
    stationName: snapshot.station.name,
    title: nowPlaying?.title || genericTitle(snapshot.mode),
    artwork: nowPlaying?.artwork ?? null,
    statusLine,
  };
}
