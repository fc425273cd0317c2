import type { StreamRef } from '@/domain/session/types';
import type {
  BackendStatus,
  PlaybackBackendPort,
  UnexpectedStopListener,
} from '@/ports/PlaybackBackendPort';
import { createLogger } from '@/shared/logging/logger';

/**
 * Sends media-server streams to the media-server backend and everything else to the
 * player process. At most one of the two is active at a time.
 */
export class RoutingPlaybackBackend implements PlaybackBackendPort {
  private readonly log = createLogger('Playback', 'Router');
  private readonly listeners = new Set<UnexpectedStopListener>();
  private active: PlaybackBackendPort | null = null;

  constructor(
    private readonly mediaServer: PlaybackBackendPort,
    private readonly player: PlaybackBackendPort,
  ) {
    for (const backend of [mediaServer, player]) {
      backend.onUnexpectedStop((reason) => {
        if (backend !== this.active) {
          return;
        }
        this.active = null;
        for (const listener of this.listeners) {
          listener(reason);
        }
      });
    }
  }

  public async start(stream: StreamRef): Promise<void> {
    const target = stream.transport === 'media-server' ? this.mediaServer : this.player;
    if (this.active && this.active !== target) {
      await this.active.stop();
    }
    this.log.debug('routing stream', { stationId: stream.stationId, transport: stream.transport });
    this.active = target;
    try {
      await target.start(stream);
    } catch (error) {
      this.active = null;
      throw error;
    }
  }

  public async stop(): Promise<void> {
    const active = this.active;
    this.active = null;
    await active?.stop();
  }

  public async status(): Promise<BackendStatus> {
    return this.active ? this.active.status() : 'stopped';
  }

  public async currentTitle(): Promise<string | null> {
    return this.active ? this.active.currentTitle() : null;
  }

  public onUnexpectedStop(listener: UnexpectedStopListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
