import type { StreamRef } from '@/domain/session/types';

export type BackendStatus = 'running' | 'stopped';

export type UnexpectedStopListener = (reason: string) => void;

/**
 * External player boundary. `start` resolves once the player accepted the stream
 * and rejects with a PlaybackBackendError otherwise.
 */
export interface PlaybackBackendPort {
  start(stream: StreamRef): Promise<void>;
  stop(): Promise<void>;
  status(): Promise<BackendStatus>;
  /** Title announced by the stream (ICY/MPD), when the backend can see it. */
  currentTitle(): Promise<string | null>;
  onUnexpectedStop(listener: UnexpectedStopListener): () => void;
}
