import type { AppConfig } from '@/config';
import { RadikoAuthClient } from '@/adapters/content/radiko/radikoAuthClient';
import { baseRadikoHeaders, type RadikoClientIdentity } from '@/adapters/content/radiko/radikoHeaders';
import { RadikoProgramClient } from '@/adapters/content/radiko/radikoProgramClient';
import { RadikoStreamClient } from '@/adapters/content/radiko/radikoStreamClient';
import { RadioBrowserClient } from '@/adapters/content/worldradio/radioBrowserClient';
import { ConsoleDisplay } from '@/adapters/display/consoleDisplay';
import { FramebufferDisplay } from '@/adapters/display/framebufferDisplay';
import { GpiomonButtonSource } from '@/adapters/input/gpiomonButtonSource';
import { KeyboardButtonSource } from '@/adapters/input/keyboardButtonSource';
import { FfmpegPlayer } from '@/adapters/playback/ffmpegPlayer';
import { MpdPlayer } from '@/adapters/playback/mpdPlayer';
import { RoutingPlaybackBackend } from '@/adapters/playback/routingPlaybackBackend';
import { StorageAdapter } from '@/adapters/storage/StorageAdapter';
import type { StoragePort } from '@/ports/StoragePort';
import { FileSessionStore } from '@/adapters/storage/sessionStore';
import { AuthTokenManager } from '@/application/auth/authTokenManager';
import { MetadataPoller } from '@/application/metadata/metadataPoller';
import { SessionController } from '@/application/session/sessionController';
import { needsNameHydration } from '@/application/stations/stationNames';
import { StationRegistry } from '@/application/stations/stationRegistry';
import { StreamResolver } from '@/application/stream/streamResolver';
import { ClickClassifier } from '@/application/ui/clickClassifier';
import { UiEventRouter } from '@/application/ui/uiEventRouter';
import { parseStationFile, type StationDescriptor } from '@/domain/station/types';
import type { DisplayPort } from '@/ports/DisplayPort';
import type { ButtonSourcePort } from '@/ports/ButtonSourcePort';
import { runPoweroff } from '@/runtime/poweroff';
import { stopInStages, type StoppableService } from '@/runtime/stopWithTimeout';
import { runDetached } from '@/shared/bestEffort';
import { createLogger, errorMessage, logManager } from '@/shared/logging/logger';

/** World directory answers are reused for an hour. */
const WORLD_CACHE_TTL_MS = 60 * 60 * 1000;
const SERVICE_STOP_TIMEOUT_MS = 6000;

export type Runtime = {
  start: () => Promise<void>;
  stop: () => Promise<void>;
};

export interface RuntimeHooks {
  /** Called after a confirmed shutdown finished powering off (or failed to). */
  onShutdownComplete?: () => void;
}

/**
 * Loads the curated station file. A missing or invalid file is fatal.
 */
export async function loadStations(
  stationsFile: string,
  storage: StoragePort = new StorageAdapter(),
): Promise<StationDescriptor[]> {
  const read = await storage.readJson(stationsFile);
  if (read.kind !== 'ok') {
    const reason = read.kind === 'missing' ? 'file not found' : read.reason;
    throw new Error(`station list not readable: ${stationsFile} (${reason})`);
  }
  const stations = parseStationFile(read.value);
  if (stations.length === 0) {
    throw new Error(`station list is empty: ${stationsFile}`);
  }
  return stations;
}

export function createClientIdentity(config: AppConfig): RadikoClientIdentity {
  return {
    app: config.radiko.app,
    appVersion: config.radiko.appVersion,
    device: config.radiko.device,
    user: config.radiko.user,
    cookie: config.radiko.cookie,
  };
}

export function createTokenManager(config: AppConfig): AuthTokenManager {
  const identity = createClientIdentity(config);
  const authClient = new RadikoAuthClient({
    ...identity,
    auth1Urls: config.radiko.auth1Urls,
    auth2Urls: config.radiko.auth2Urls,
  });
  return new AuthTokenManager(authClient, {
    baseHeaders: baseRadikoHeaders(identity),
    authKey: config.radiko.authKey,
    tokenTtlMs: config.radiko.tokenTtlMs,
    safetyMarginMs: config.radiko.tokenSafetyMarginMs,
    maxAttempts: config.radiko.maxAttempts,
    backoff: { baseDelayMs: config.radiko.backoffBaseMs, maxDelayMs: config.radiko.backoffMaxMs },
    tokenOverride: config.radiko.tokenOverride,
  });
}

export function createRuntime(config: AppConfig, hooks: RuntimeHooks = {}): Runtime {
  logManager.configure({ level: config.logLevel, json: config.logJson });
  const log = createLogger('Server');

  const tokens = createTokenManager(config);
  const programClient = new RadikoProgramClient();
  const resolver = new StreamResolver(tokens, new RadikoStreamClient());
  const directory = new RadioBrowserClient({
    baseUrl: config.world.baseUrl,
    countryCode: config.world.countryCode,
    limit: config.world.limit,
    cacheTtlMs: WORLD_CACHE_TTL_MS,
  });
  const backend = new RoutingPlaybackBackend(
    new MpdPlayer({ host: config.mpd.host, port: config.mpd.port }),
    new FfmpegPlayer({ binary: config.ffmpegBinary, alsaDevice: config.alsaDevice }),
  );
  const consoleDisplay = new ConsoleDisplay();
  const display: DisplayPort = config.display.device
    ? new FramebufferDisplay(
      {
        device: config.display.device,
        width: config.display.width,
        height: config.display.height,
        rotation: config.display.rotation,
        fontPath: config.display.fontPath,
      },
      consoleDisplay,
    )
    : consoleDisplay;
  const store = new FileSessionStore(new StorageAdapter(), config.stateFile);
  const classifier = new ClickClassifier({ windowMs: config.doubleClickMs });
  const router = new UiEventRouter({ shutdownConfirmMs: config.shutdownConfirmMs });
  const buttonSources: ButtonSourcePort[] = [];
  if (!config.gpioDisabled) {
    buttonSources.push(
      new GpiomonButtonSource({
        binary: config.gpiomonBinary,
        chip: config.gpioChip,
        pins: config.buttonPins,
      }),
    );
  }
  if (config.keyboardInput) {
    buttonSources.push(new KeyboardButtonSource());
  }

  let controller: SessionController | null = null;

  const onShutdownRequested = async (): Promise<void> => {
    try {
      await runPoweroff(config.poweroffCommand);
    } catch (error) {
      log.error('power-off failed', { message: errorMessage(error) });
    }
    hooks.onShutdownComplete?.();
  };

  async function hydrateNames(session: SessionController): Promise<void> {
    const token = await tokens.getValidToken();
    if (!token.areaId) {
      return;
    }
    const upstream = await programClient.fetchStationList(token.areaId);
    log.debug('upstream station list fetched', { areaId: token.areaId, stations: upstream.length });
    session.updateStationNames(upstream);
  }

  async function startServices(): Promise<void> {
    const stations = await loadStations(config.stationsFile);
    log.info('stations loaded', { count: stations.length, file: config.stationsFile });
    const session = new SessionController(
      {
        registry: new StationRegistry(stations, directory),
        resolver,
        backend,
        store,
        display,
        createPoller: (deliver) =>
          new MetadataPoller(programClient, backend, deliver, {
            nowPlayingIntervalMs: config.nowPlayingIntervalMs,
            scheduleIntervalMs: config.programRefreshMs,
          }),
      },
      {
        nowPlayingIntervalMs: config.nowPlayingIntervalMs,
        onShutdownRequested,
      },
    );
    controller = session;

    router.onCommand((command) => session.post({ type: 'command', command }));
    for (const source of buttonSources) {
      source.start((edge) => {
        log.spam('button edge', { source: source.name, button: edge.button, pressed: edge.pressed });
        const event = classifier.classify(edge);
        if (event) {
          router.handle(event);
        }
      });
    }

    tokens.start();
    await session.start();
    if (needsNameHydration(stations) && !config.radiko.tokenOverride) {
      runDetached(hydrateNames(session), log, 'station name refresh failed');
    }
    log.info('startup complete', { buttons: buttonSources.map((source) => source.name) });
  }

  async function stopServices(): Promise<void> {
    const inputs: StoppableService[] = buttonSources.map((source) => ({
      name: `buttons-${source.name}`,
      stop: () => source.stop(),
    }));
    inputs.push({ name: 'ui', stop: () => router.dispose() });
    const core: StoppableService[] = [{ name: 'auth', stop: () => tokens.stop() }];
    const session = controller;
    if (session) {
      core.push({ name: 'session', stop: () => session.stop() });
    }
    await stopInStages(
      [inputs, core, [{ name: 'display', stop: () => display.close() }]],
      SERVICE_STOP_TIMEOUT_MS,
      log,
    );
    controller = null;
  }

  return {
    start: startServices,
    stop: stopServices,
  };
}
