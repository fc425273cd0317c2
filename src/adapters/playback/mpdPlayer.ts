import { MpdClient, mpdQuote, responseValue, type MpdClientOptions } from '@/adapters/playback/mpdClient';
import { PlaybackBackendError } from '@/domain/errors';
import type { StreamRef } from '@/domain/session/types';
import type {
  BackendStatus,
  PlaybackBackendPort,
  UnexpectedStopListener,
} from '@/ports/PlaybackBackendPort';
import { createLogger, errorMessage } from '@/shared/logging/logger';

export interface MpdPlayerOptions extends MpdClientOptions {
  /** How often a started stream is checked for having stopped. */
  watchIntervalMs?: number;
}

/**
 * Plays fixed stream URLs through an MPD server. MPD cannot attach request headers,
 * so header-bearing streams never reach this backend.
 */
export class MpdPlayer implements PlaybackBackendPort {
  private readonly log = createLogger('Playback', 'Mpd');
  private readonly client: MpdClient;
  private readonly listeners = new Set<UnexpectedStopListener>();
  private watchTimer?: NodeJS.Timeout;
  private active: StreamRef | null = null;

  constructor(private readonly options: MpdPlayerOptions, client?: MpdClient) {
    this.client = client ?? new MpdClient(options);
  }

  public async start(stream: StreamRef): Promise<void> {
    if (Object.keys(stream.headers).length > 0) {
      throw new PlaybackBackendError('mpd cannot attach request headers');
    }
    this.stopWatch();
    try {
      await this.client.run(['clear', `add ${mpdQuote(stream.url)}`, 'play']);
    } catch (error) {
      this.active = null;
      throw new PlaybackBackendError(`mpd refused the stream: ${errorMessage(error)}`, error);
    }
    this.active = stream;
    this.log.info('mpd playing', { stationId: stream.stationId, url: stream.url });
    this.startWatch();
  }

  public async stop(): Promise<void> {
    this.stopWatch();
    const wasActive = this.active;
    this.active = null;
    if (!wasActive) {
      return;
    }
    try {
      await this.client.run(['stop']);
    } catch (error) {
      throw new PlaybackBackendError(`mpd stop failed: ${errorMessage(error)}`, error);
    }
  }

  public async status(): Promise<BackendStatus> {
    const response = await this.client.run(['status']);
    return responseValue(response, 'state') === 'play' ? 'running' : 'stopped';
  }

  public async currentTitle(): Promise<string | null> {
    if (!this.active) {
      return null;
    }
    const response = await this.client.run(['currentsong']);
    return responseValue(response, 'Title') ?? responseValue(response, 'Name');
  }

  public onUnexpectedStop(listener: UnexpectedStopListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private startWatch(): void {
    const intervalMs = this.options.watchIntervalMs ?? 5000;
    this.watchTimer = setInterval(() => {
      this.checkStillPlaying().catch((error: unknown) => {
        this.log.debug('mpd status check failed', { message: errorMessage(error) });
      });
    }, intervalMs);
    this.watchTimer.unref();
  }

  private stopWatch(): void {
    if (this.watchTimer) {
      clearInterval(this.watchTimer);
      this.watchTimer = undefined;
    }
  }

  private async checkStillPlaying(): Promise<void> {
    const stream = this.active;
    if (!stream || (await this.status()) === 'running' || this.active !== stream) {
      return;
    }
    this.active = null;
    this.stopWatch();
    this.log.warn('mpd stopped playing', { stationId: stream.stationId });
    for (const listener of this.listeners) {
      listener('mpd is no longer playing');
    }
  }
}
