import type { StationDescriptor } from '@/domain/station/types';
import type { NowPlaying } from '@/domain/session/types';
import type { ClockPort } from '@/ports/ClockPort';
import type { FetchLike } from '@/ports/HttpPort';
import type { PlaybackBackendPort } from '@/ports/PlaybackBackendPort';
import { findProgramAt, type ProgramEntry, type ProgramGuidePort } from '@/ports/ProgramGuidePort';
import { systemClock } from '@/shared/time/systemClock';
import { bestEffort } from '@/shared/bestEffort';
import { fetchBinary, globalFetch } from '@/shared/http';
import { createLogger, errorMessage } from '@/shared/logging/logger';

export interface NowPlayingUpdate {
  stationId: string;
  epoch: number;
  /** Null when the poll found neither a title nor artwork. */
  nowPlaying: NowPlaying | null;
}

export type NowPlayingListener = (update: NowPlayingUpdate) => void;

export interface MetadataPollerOptions {
  nowPlayingIntervalMs: number;
  scheduleIntervalMs: number;
  /** Upper bound for `stop()` waiting on polls already in flight. */
  stopTimeoutMs?: number;
  clock?: ClockPort;
  fetch?: FetchLike;
}

interface PollTarget {
  station: StationDescriptor;
  epoch: number;
}

interface CachedSchedule {
  programs: ProgramEntry[];
  fetchedAt: number;
}

/** Stations resolved through the upstream service have a program guide. */
export function hasProgramGuide(station: StationDescriptor): boolean {
  return station.source === 'curated' && !station.streamUrl;
}

/**
 * Periodic now-playing and schedule refresh for whatever station the controller
 * reports. Results carry the epoch of the target they were fetched for; a result
 * whose epoch is no longer current is dropped before delivery.
 */
export class MetadataPoller {
  private readonly log = createLogger('Metadata', 'Poller');
  private readonly clock: ClockPort;
  private readonly fetchImpl: FetchLike;
  private readonly schedules = new Map<string, CachedSchedule>();
  private readonly inflight = new Set<Promise<void>>();
  private target: PollTarget | null = null;
  private epoch = 0;
  private artwork: { url: string; bytes: Buffer } | null = null;
  private nowPlayingTimer?: NodeJS.Timeout;
  private scheduleTimer?: NodeJS.Timeout;

  constructor(
    private readonly guide: ProgramGuidePort,
    private readonly playback: Pick<PlaybackBackendPort, 'currentTitle'>,
    private readonly listener: NowPlayingListener,
    private readonly options: MetadataPollerOptions,
  ) {
    this.clock = options.clock ?? systemClock;
    this.fetchImpl = options.fetch ?? globalFetch;
  }

  public start(): void {
    this.clearTimers();
    this.nowPlayingTimer = setInterval(() => {
      this.track(this.pollNowPlaying());
    }, this.options.nowPlayingIntervalMs);
    this.scheduleTimer = setInterval(() => {
      this.track(this.pollSchedule(true));
    }, this.options.scheduleIntervalMs);
    this.nowPlayingTimer.unref();
    this.scheduleTimer.unref();
  }

  public async stop(): Promise<void> {
    this.clearTimers();
    this.target = null;
    this.epoch += 1;
    if (this.inflight.size === 0) {
      return;
    }
    const timeoutMs = this.options.stopTimeoutMs ?? 2000;
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });
    const settled = Promise.allSettled([...this.inflight]).then(() => 'done' as const);
    const outcome = await Promise.race([settled, timedOut]);
    clearTimeout(timer);
    if (outcome === 'timeout') {
      this.log.warn('metadata polls still running at stop', { pending: this.inflight.size, timeoutMs });
    }
  }

  /**
   * Points the poller at a station (or at nothing) and polls immediately.
   * Returns the new epoch.
   */
  public setTarget(station: StationDescriptor | null): number {
    this.epoch += 1;
    this.target = station ? { station, epoch: this.epoch } : null;
    if (station) {
      this.log.debug('metadata target changed', { stationId: station.id, epoch: this.epoch });
      this.track(this.refresh());
    }
    return this.epoch;
  }

  /** Resolves once every poll started so far has finished. */
  public async settle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  public isCurrent(update: Pick<NowPlayingUpdate, 'stationId' | 'epoch'>): boolean {
    return update.epoch === this.epoch && update.stationId === this.target?.station.id;
  }

  /** Schedule (from cache when fresh), then now-playing, unless the target changed meanwhile. */
  public async refresh(): Promise<void> {
    const epoch = this.epoch;
    await this.pollSchedule(false);
    if (epoch === this.epoch) {
      await this.pollNowPlaying();
    }
  }

  public async pollSchedule(force: boolean): Promise<void> {
    const target = this.target;
    if (!target || !hasProgramGuide(target.station)) {
      return;
    }
    const stationId = target.station.id;
    const now = this.clock.now();
    const cached = this.schedules.get(stationId);
    if (
      !force &&
      cached &&
      now - cached.fetchedAt < this.options.scheduleIntervalMs &&
      findProgramAt(cached.programs, now)
    ) {
      return;
    }
    try {
      const programs = await this.guide.fetchSchedule(stationId, now);
      this.schedules.set(stationId, { programs, fetchedAt: now });
      this.log.debug('schedule refreshed', { stationId, programs: programs.length });
    } catch (error) {
      this.log.debug('schedule unavailable', { stationId, message: errorMessage(error) });
    }
  }

  public async pollNowPlaying(): Promise<void> {
    const target = this.target;
    if (!target) {
      return;
    }
    const { station, epoch } = target;
    const now = this.clock.now();
    const program = hasProgramGuide(station)
      ? findProgramAt(this.schedules.get(station.id)?.programs ?? [], now)
      : null;
    const title = program?.title || (await this.fallbackTitle(station));
    const artworkUrl = program?.imageUrl ?? station.imageUrl ?? null;
    const artwork = artworkUrl ? await this.loadArtwork(artworkUrl) : null;
    if (!title && !artwork) {
      this.log.debug('metadata unavailable', { stationId: station.id });
      this.deliver({ stationId: station.id, epoch, nowPlaying: null });
      return;
    }
    this.deliver({
      stationId: station.id,
      epoch,
      nowPlaying: {
        stationId: station.id,
        title,
        artworkUrl,
        artwork,
        fetchedAt: now,
      },
    });
  }

  private async fallbackTitle(station: StationDescriptor): Promise<string> {
    if (hasProgramGuide(station)) {
      const announced = await bestEffort(() => this.guide.fetchNowOnAir(station.id), {
        fallback: null,
        onError: 'debug',
        label: 'now-on-air feed unavailable',
        context: { stationId: station.id },
        log: this.log,
      });
      if (announced) {
        return announced;
      }
    }
    const fromBackend = await bestEffort(() => this.playback.currentTitle(), {
      fallback: null,
      onError: 'debug',
      label: 'backend title unavailable',
      log: this.log,
    });
    return fromBackend?.trim() ?? '';
  }

  private async loadArtwork(url: string): Promise<Buffer | null> {
    if (this.artwork?.url === url) {
      return this.artwork.bytes;
    }
    try {
      const bytes = await fetchBinary(this.fetchImpl, url);
      this.artwork = { url, bytes };
      return bytes;
    } catch (error) {
      this.log.debug('artwork unavailable', { url, message: errorMessage(error) });
      return null;
    }
  }

  private deliver(update: NowPlayingUpdate): void {
    if (update.epoch !== this.epoch) {
      this.log.debug('stale metadata dropped', { stationId: update.stationId, epoch: update.epoch });
      return;
    }
    this.listener(update);
  }

  private track(task: Promise<void>): void {
    const tracked = task
      .catch((error: unknown) => {
        this.log.debug('metadata poll failed', { message: errorMessage(error) });
      })
      .finally(() => {
        this.inflight.delete(tracked);
      });
    this.inflight.add(tracked);
  }

  private clearTimers(): void {
    if (this.nowPlayingTimer) {
      clearInterval(this.nowPlayingTimer);
      this.nowPlayingTimer = undefined;
    }
    if (this.scheduleTimer) {
      clearInterval(this.scheduleTimer);
      this.scheduleTimer = undefined;
    }
  }
}
