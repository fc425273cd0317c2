import type { MetadataPoller, NowPlayingUpdate } from '@/application/metadata/metadataPoller';
import { hydrateStationNames } from '@/application/stations/stationNames';
import type { StationRegistry } from '@/application/stations/stationRegistry';
import type { ResolveFailure, ResolveResult, StreamResolver } from '@/application/stream/streamResolver';
import { buildDisplayFrame, ONLY_ONE_STATION } from '@/application/session/sessionView';
import { SerialMailbox } from '@/application/session/serialMailbox';
import { AuthUnavailableError } from '@/domain/errors';
import type {
  NowPlaying,
  PersistedSession,
  PlaybackStatus,
  SessionError,
  SessionSnapshot,
  StreamRef,
} from '@/domain/session/types';
import { stationLabel, type StationDescriptor, type StationMode } from '@/domain/station/types';
import type { UiCommand } from '@/domain/ui/types';
import type { ClockPort } from '@/ports/ClockPort';
import type { DisplayPort } from '@/ports/DisplayPort';
import type { PlaybackBackendPort } from '@/ports/PlaybackBackendPort';
import type { SessionStorePort } from '@/ports/SessionStorePort';
import { systemClock } from '@/shared/time/systemClock';
import { bestEffort } from '@/shared/bestEffort';
import { createLogger, errorMessage } from '@/shared/logging/logger';

export type SessionMessage =
  | { type: 'command'; command: UiCommand }
  | { type: 'selected'; epoch: number; station: StationDescriptor }
  | { type: 'resolved'; epoch: number; station: StationDescriptor; result: ResolveResult }
  | { type: 'lookupFailed'; epoch: number; message: string }
  | { type: 'nowPlaying'; update: NowPlayingUpdate }
  | { type: 'playbackStopped'; reason: string }
  | { type: 'stationNames'; names: ReadonlyArray<{ id: string; name: string }> };

type ResolveRequest = { epoch: number; station: StationDescriptor };

export interface SessionControllerDeps {
  registry: StationRegistry;
  resolver: Pick<StreamResolver, 'resolve' | 'invalidate'>;
  backend: PlaybackBackendPort;
  store: SessionStorePort;
  display: DisplayPort;
  /** Created by the controller so that poll results land in its mailbox. */
  createPoller: (deliver: (update: NowPlayingUpdate) => void) => Pick<
    MetadataPoller,
    'start' | 'stop' | 'setTarget' | 'isCurrent'
  >;
}

export interface SessionControllerOptions {
  nowPlayingIntervalMs: number;
  clock?: ClockPort;
  /** Invoked once after a confirmed shutdown has stopped playback and flushed state. */
  onShutdownRequested?: () => Promise<void> | void;
  /** A stream that played this long since the last automatic retry earns a new one. */
  retryResetMs?: number;
}

/**
 * Owns the session. Every input arrives as a message on one mailbox; resolves and
 * lookups run detached and post their outcome back, tagged with the switch epoch
 * they were started under. Only the newest epoch may commit.
 *
 * At most one resolve is in flight. Selections made meanwhile replace each other
 * and only the newest is resolved once the running one returns.
 */
export class SessionController {
  private readonly log = createLogger('Session', 'Controller');
  private readonly mailbox: SerialMailbox<SessionMessage>;
  private readonly poller: ReturnType<SessionControllerDeps['createPoller']>;
  private readonly clock: ClockPort;
  private readonly tasks = new Set<Promise<void>>();
  private mode: StationMode = 'curated';
  private station: StationDescriptor | null = null;
  private pending: StationDescriptor | null = null;
  private stream: StreamRef | null = null;
  private status: PlaybackStatus = 'idle';
  private lastError: SessionError | null = null;
  private nowPlaying: NowPlaying | null = null;
  private notice: string | null = null;
  private switching = false;
  private promptVisible = false;
  private shuttingDown = false;
  private switchEpoch = 0;
  private lastRetryAt: number | null = null;
  private resolving = false;
  private queuedResolve: ResolveRequest | null = null;
  private unsubscribeBackend: (() => void) | null = null;

  constructor(
    private readonly deps: SessionControllerDeps,
    private readonly options: SessionControllerOptions,
  ) {
    this.clock = options.clock ?? systemClock;
    this.mailbox = new SerialMailbox((message) => this.handle(message), this.log);
    this.poller = deps.createPoller((update) => this.post({ type: 'nowPlaying', update }));
  }

  public async start(): Promise<void> {
    const persisted = await this.deps.store.load();
    this.deps.registry.restore(persisted);
    this.mode = this.deps.registry.getMode();
    this.log.info('session restored', {
      mode: this.mode,
      stationId: persisted?.stationId ?? null,
    });
    this.unsubscribeBackend = this.deps.backend.onUnexpectedStop((reason) => {
      this.post({ type: 'playbackStopped', reason });
    });
    this.poller.start();
    const restored = this.deps.registry.current();
    if (restored) {
      this.beginSwitch(async () => restored);
    } else {
      this.beginSwitch(() => this.deps.registry.setMode(this.mode));
    }
    await this.render();
  }

  public post(message: SessionMessage): void {
    this.mailbox.post(message);
  }

  public snapshot(): SessionSnapshot {
    return {
      mode: this.mode,
      station: this.station,
      pending: this.pending,
      stream: this.stream,
      status: this.switching ? 'resolving' : this.status,
      lastError: this.lastError,
    };
  }

  /** Applies upstream display names to the curated list on the session's own loop. */
  public updateStationNames(names: ReadonlyArray<{ id: string; name: string }>): void {
    this.post({ type: 'stationNames', names });
  }

  public currentNowPlaying(): NowPlaying | null {
    return this.nowPlaying;
  }

  /** Resolves once no detached task is running and the mailbox is drained. */
  public async settle(): Promise<void> {
    for (;;) {
      await this.mailbox.idle();
      if (this.tasks.size === 0) {
        return;
      }
      await Promise.allSettled([...this.tasks]);
    }
  }

  /** Process-level stop (signal). Does not power off the host. */
  public async stop(): Promise<void> {
    this.unsubscribeBackend?.();
    this.unsubscribeBackend = null;
    await this.mailbox.idle();
    this.mailbox.close();
    await this.poller.stop();
    await this.deps.backend.stop();
  }

  private async handle(message: SessionMessage): Promise<void> {
    if (this.shuttingDown) {
      this.log.debug('message ignored during shutdown', { type: message.type });
      return;
    }
    switch (message.type) {
      case 'command':
        await this.handleCommand(message.command);
        return;
      case 'selected':
        if (message.epoch === this.switchEpoch) {
          this.pending = message.station;
          await this.render();
        }
        return;
      case 'resolved':
        await this.handleResolved(message.epoch, message.station, message.result);
        return;
      case 'lookupFailed':
        if (message.epoch !== this.switchEpoch) {
          return;
        }
        this.failSwitch({
          kind: 'lookup_failed',
          stationId: null,
          stationName: 'World Radio',
          message: message.message,
        });
        await this.render();
        return;
      case 'nowPlaying':
        await this.handleNowPlaying(message.update);
        return;
      case 'playbackStopped':
        await this.handlePlaybackStopped(message.reason);
        return;
      case 'stationNames':
        await this.handleStationNames(message.names);
        return;
    }
  }

  private async handleCommand(command: UiCommand): Promise<void> {
    this.log.debug('command', { command });
    switch (command) {
      case 'SelectNext':
      case 'SelectPrevious': {
        this.notice = null;
        const registry = this.deps.registry;
        if (registry.getMode() === 'curated' && registry.curatedStations().length === 1) {
          this.notice = ONLY_ONE_STATION;
          await this.render();
          return;
        }
        this.beginSwitch(() => (command === 'SelectNext' ? registry.next() : registry.previous()));
        await this.render();
        return;
      }
      case 'ToggleMode': {
        this.notice = null;
        const target: StationMode = this.deps.registry.getMode() === 'curated' ? 'world' : 'curated';
        this.beginSwitch(() => this.deps.registry.setMode(target));
        await this.render();
        return;
      }
      case 'ShowShutdownPrompt':
        this.promptVisible = true;
        await this.render();
        return;
      case 'DismissShutdownPrompt':
        this.promptVisible = false;
        await this.render();
        return;
      case 'ConfirmShutdown':
        await this.shutdown();
        return;
    }
  }

  /**
   * Starts a switch under a new epoch. `select` runs immediately so that a curated
   * cursor moves in command order; its lookup and the resolve continue detached.
   */
  private beginSwitch(select: () => Promise<StationDescriptor | null>): void {
    const epoch = ++this.switchEpoch;
    this.switching = true;
    this.lastError = null;
    const selection = select();
    const current = this.deps.registry.current();
    if (this.deps.registry.getMode() === 'curated' && current) {
      this.pending = current;
    }
    this.track(this.runSwitch(epoch, selection));
  }

  private async runSwitch(epoch: number, selection: Promise<StationDescriptor | null>): Promise<void> {
    let station: StationDescriptor | null;
    try {
      station = await selection;
    } catch (error) {
      this.post({ type: 'lookupFailed', epoch, message: errorMessage(error) });
      return;
    }
    if (!station) {
      this.log.debug('selection superseded', { epoch });
      return;
    }
    this.post({ type: 'selected', epoch, station });
    this.enqueueResolve({ epoch, station });
  }

  private enqueueResolve(request: ResolveRequest): void {
    if (this.resolving) {
      if (this.queuedResolve) {
        this.log.debug('queued resolve replaced', {
          stationId: this.queuedResolve.station.id,
          next: request.station.id,
        });
      }
      this.queuedResolve = request;
      return;
    }
    this.resolving = true;
    this.track(this.drainResolves(request));
  }

  private async drainResolves(first: ResolveRequest): Promise<void> {
    let request: ResolveRequest | null = first;
    try {
      while (request) {
        const { epoch, station } = request;
        let result: ResolveResult;
        try {
          result = await this.deps.resolver.resolve(station);
        } catch (error) {
          const message = errorMessage(error);
          result = {
            ok: false,
            failure: { kind: 'station_unresolvable', stationId: station.id, message, cause: error },
          };
        }
        this.post({ type: 'resolved', epoch, station, result });
        request = this.takeQueuedResolve();
      }
    } finally {
      this.resolving = false;
    }
  }

  /** A queued request whose switch was superseded since is dropped. */
  private takeQueuedResolve(): ResolveRequest | null {
    const queued = this.queuedResolve;
    this.queuedResolve = null;
    if (queued && queued.epoch !== this.switchEpoch) {
      this.log.debug('queued resolve dropped', { stationId: queued.station.id, epoch: queued.epoch });
      return null;
    }
    return queued;
  }

  private async handleResolved(
    epoch: number,
    station: StationDescriptor,
    result: ResolveResult,
  ): Promise<void> {
    if (epoch !== this.switchEpoch) {
      this.log.debug('stale resolve discarded', { stationId: station.id, epoch, current: this.switchEpoch });
      return;
    }
    if (!result.ok) {
      this.failSwitch(toSessionError(result.failure, station));
      await this.render();
      return;
    }
    this.pending = null;
    this.switching = false;
    const started = await this.play(result.stream);
    const changed = this.station?.id !== station.id;
    this.station = station;
    this.mode = station.source;
    if (changed) {
      this.nowPlaying = null;
    }
    if (started) {
      this.stream = result.stream;
      this.status = 'playing';
      this.lastError = null;
      if (changed) {
        this.lastRetryAt = null;
      }
      this.poller.setTarget(station);
      await this.persist();
    } else {
      this.stream = null;
      this.status = 'error';
      this.lastError = {
        kind: 'playback_failed',
        stationId: station.id,
        stationName: stationLabel(station),
        message: 'player failed to start',
      };
      this.deps.resolver.invalidate(station.id);
      this.poller.setTarget(null);
    }
    this.log.info('station committed', { stationId: station.id, mode: this.mode, status: this.status });
    await this.render();
  }

  /** The previous playback stays untouched; `error` only when nothing is playing. */
  private failSwitch(error: SessionError): void {
    this.log.warn('station switch failed', { ...error });
    this.pending = null;
    this.switching = false;
    this.lastError = error;
    if (!this.stream) {
      this.status = 'error';
    }
    const registry = this.deps.registry;
    if (registry.getMode() !== this.mode && this.station) {
      registry.enterMode(this.mode);
    }
  }

  /** Stop-then-start with one retry. False when the player never came up. */
  private async play(stream: StreamRef): Promise<boolean> {
    for (let attempt = 1; attempt <= 2; attempt += 1) {
      try {
        await this.deps.backend.stop();
        await this.deps.backend.start(stream);
        return true;
      } catch (error) {
        this.log.warn('playback start failed', {
          stationId: stream.stationId,
          attempt,
          message: errorMessage(error),
        });
      }
    }
    return false;
  }

  private async handleNowPlaying(update: NowPlayingUpdate): Promise<void> {
    if (!this.poller.isCurrent(update) || update.stationId !== this.station?.id) {
      this.log.debug('now playing for another station dropped', { stationId: update.stationId });
      return;
    }
    if (update.nowPlaying) {
      this.nowPlaying = update.nowPlaying;
    }
    // An empty poll keeps the last result; the render ages it out once stale.
    await this.render();
  }

  private async handlePlaybackStopped(reason: string): Promise<void> {
    if (this.status !== 'playing' || !this.stream || !this.station) {
      return;
    }
    const now = this.clock.now();
    const retryResetMs = this.options.retryResetMs ?? 60_000;
    const canRetry = this.lastRetryAt === null || now - this.lastRetryAt >= retryResetMs;
    const station = this.station;
    this.log.warn('playback stopped unexpectedly', { stationId: station.id, reason, retry: canRetry });
    this.deps.resolver.invalidate(station.id);
    if (canRetry) {
      this.lastRetryAt = now;
      this.stream = null;
      this.status = 'idle';
      this.beginSwitch(async () => station);
      await this.render();
      return;
    }
    this.stream = null;
    this.status = 'error';
    this.lastError = {
      kind: 'playback_failed',
      stationId: this.station.id,
      stationName: stationLabel(this.station),
      message: 'playback stopped',
    };
    await this.render();
  }

  private async handleStationNames(names: ReadonlyArray<{ id: string; name: string }>): Promise<void> {
    const registry = this.deps.registry;
    registry.replaceCurated(hydrateStationNames(registry.curatedStations(), names));
    this.station = this.station ? (registry.find(this.station.id) ?? this.station) : null;
    this.pending = this.pending ? (registry.find(this.pending.id) ?? this.pending) : null;
    this.log.info('station names refreshed', { stations: registry.curatedStations().length });
    await this.render();
  }

  private async shutdown(): Promise<void> {
    this.shuttingDown = true;
    this.promptVisible = false;
    this.log.info('shutdown confirmed');
    await this.render();
    await this.poller.stop();
    await bestEffort(() => this.deps.backend.stop(), {
      fallback: undefined,
      onError: 'warn',
      label: 'player stop failed during shutdown',
      log: this.log,
    });
    await this.persist();
    this.unsubscribeBackend?.();
    this.unsubscribeBackend = null;
    await this.options.onShutdownRequested?.();
  }

  private async persist(): Promise<void> {
    const session = this.persistedSession();
    if (!session) {
      return;
    }
    try {
      await this.deps.store.save(session);
    } catch (error) {
      this.log.warn('session not persisted; continuing in memory', { message: errorMessage(error) });
    }
  }

  private persistedSession(): PersistedSession | null {
    const station = this.station;
    if (!station) {
      return null;
    }
    if (station.source === 'world' && station.streamUrl) {
      return {
        stationId: station.id,
        mode: 'world',
        station: {
          name: station.name,
          streamUrl: station.streamUrl,
          ...(station.imageUrl ? { imageUrl: station.imageUrl } : {}),
        },
      };
    }
    return { stationId: station.id, mode: station.source };
  }

  private async render(): Promise<void> {
    const frame = buildDisplayFrame({
      snapshot: this.snapshot(),
      nowPlaying: this.nowPlaying,
      promptVisible: this.promptVisible,
      shuttingDown: this.shuttingDown,
      notice: this.notice,
      now: this.clock.now(),
      pollIntervalMs: this.options.nowPlayingIntervalMs,
    });
    await bestEffort(() => this.deps.display.publish(frame), {
      fallback: undefined,
      onError: 'warn',
      label: 'display publish failed',
      log: this.log,
    });
  }

  private track(task: Promise<void>): void {
    const tracked = task
      .catch((error: unknown) => {
        this.log.error('session task failed', { message: errorMessage(error) });
      })
      .finally(() => {
        this.tasks.delete(tracked);
      });
    this.tasks.add(tracked);
  }
}

function toSessionError(failure: ResolveFailure, station: StationDescriptor): SessionError {
  const kind =
    failure.kind === 'station_unresolvable' && failure.cause instanceof AuthUnavailableError
      ? 'auth_unavailable'
      : failure.kind;
  return { kind, stationId: station.id, stationName: stationLabel(station), message: failure.message };
}
