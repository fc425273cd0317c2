import { z } from 'zod';
import { ConfigError } from '@/domain/errors';
import { BUTTON_IDS, type ButtonId } from '@/domain/ui/types';
import { LOG_LEVELS, type LogLevel } from '@/types/logLevel';

export const ENV_PREFIX = 'TUNEDECK_';

const DEFAULT_AUTH_KEY = 'bcd151073c03b352e1ef2fd66c32209da9ca0afa';

const DEFAULT_AUTH1_URLS = [
  'https://radiko.jp/v2/api/auth1',
  'https://radiko.jp/v2/api/auth1_fms',
  'http://radiko.jp/v2/api/auth1',
  'http://radiko.jp/v2/api/auth1_fms',
];

const DEFAULT_AUTH2_URLS = [
  'https://radiko.jp/v2/api/auth2',
  'https://radiko.jp/v2/api/auth2_fms',
  'http://radiko.jp/v2/api/auth2',
  'http://radiko.jp/v2/api/auth2_fms',
];

const int = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const flag = (fallback: boolean) =>
  z
    .enum(['0', '1', 'true', 'false'])
    .default(fallback ? '1' : '0')
    .transform((value) => value === '1' || value === 'true');

const text = (fallback: string) => z.string().trim().default(fallback);

const urlList = (fallback: string[]) =>
  z
    .string()
    .default(fallback.join(','))
    .transform((value) =>
      value
        .split(',')
        .map((entry) => entry.trim())
        .filter(Boolean),
    )
    .pipe(z.array(z.string().url()).min(1));

const environmentSchema = z
  .object({
    TUNEDECK_STATIONS: text('data/stations.json'),
    TUNEDECK_STATE: text('data/state.json'),
    TUNEDECK_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    TUNEDECK_LOG_JSON: flag(false),
    TUNEDECK_DEBUG: flag(false),
    TUNEDECK_BUTTON_A: int(5, 0, 63),
    TUNEDECK_BUTTON_B: int(6, 0, 63),
    TUNEDECK_BUTTON_X: int(16, 0, 63),
    TUNEDECK_BUTTON_Y: int(24, 0, 63),
    TUNEDECK_DOUBLE_CLICK_MS: int(500, 50, 5000),
    TUNEDECK_SHUTDOWN_CONFIRM_MS: int(10_000, 1000, 600_000),
    TUNEDECK_DISABLE_GPIO: flag(false),
    TUNEDECK_GPIO_CHIP: text('gpiochip0'),
    TUNEDECK_GPIOMON: text('gpiomon'),
    TUNEDECK_KEYBOARD: flag(false),
    TUNEDECK_DISPLAY_DEVICE: text(''),
    TUNEDECK_DISPLAY_WIDTH: int(240, 16, 4096),
    TUNEDECK_DISPLAY_HEIGHT: int(240, 16, 4096),
    TUNEDECK_DISPLAY_ROTATION: z.enum(['0', '90', '180', '270']).default('90').transform(Number),
    TUNEDECK_DISPLAY_FONT: text(''),
    TUNEDECK_FFMPEG: text('ffmpeg'),
    TUNEDECK_ALSA_DEVICE: text('hw:1,0'),
    TUNEDECK_MPD_HOST: text('localhost'),
    TUNEDECK_MPD_PORT: int(6600, 1, 65535),
    TUNEDECK_METADATA_INTERVAL_MS: int(10_000, 1000),
    TUNEDECK_PROGRAM_REFRESH_MS: int(3_600_000, 10_000),
    TUNEDECK_RADIKO_APP: text('pc_html5'),
    TUNEDECK_RADIKO_APP_VER: text('0.0.1'),
    TUNEDECK_RADIKO_DEVICE: text('pc'),
    TUNEDECK_RADIKO_USER: text('dummy_user'),
    TUNEDECK_RADIKO_AUTHKEY: text(DEFAULT_AUTH_KEY).pipe(z.string().min(16)),
    TUNEDECK_RADIKO_COOKIE: text(''),
    TUNEDECK_RADIKO_AUTH1_URLS: urlList(DEFAULT_AUTH1_URLS),
    TUNEDECK_RADIKO_AUTH2_URLS: urlList(DEFAULT_AUTH2_URLS),
    TUNEDECK_RADIKO_TOKEN: text(''),
    TUNEDECK_TOKEN_TTL_MS: int(3_600_000, 60_000),
    TUNEDECK_TOKEN_MARGIN_MS: int(120_000, 0),
    TUNEDECK_AUTH_ATTEMPTS: int(3, 1, 20),
    TUNEDECK_AUTH_BACKOFF_MS: int(1000, 0, 60_000),
    TUNEDECK_AUTH_BACKOFF_MAX_MS: int(8000, 0, 600_000),
    TUNEDECK_WORLD_API: text('https://all.api.radio-browser.info/json').pipe(z.string().url()),
    TUNEDECK_WORLD_COUNTRY: text('').pipe(z.string().regex(/^([A-Za-z]{2})?$/, 'expected a 2-letter country code')),
    TUNEDECK_WORLD_LIMIT: int(200, 1, 5000),
    TUNEDECK_POWEROFF_COMMAND: text('sudo shutdown -h now'),
    TUNEDECK_EXPORT_STATIONS: flag(false),
  })
  .strict();

type RawEnvironment = z.infer<typeof environmentSchema>;

/**
 * Canonical view of the process environment consumed by the application.
 */
export interface EnvironmentConfig {
  stationsFile: string;
  stateFile: string;
  logLevel: LogLevel;
  logJson: boolean;
  buttonPins: Record<ButtonId, number>;
  doubleClickMs: number;
  shutdownConfirmMs: number;
  gpioDisabled: boolean;
  gpioChip: string;
  gpiomonBinary: string;
  keyboardInput: boolean;
  display: {
    device: string | null;
    width: number;
    height: number;
    rotation: number;
    fontPath: string | null;
  };
  ffmpegBinary: string;
  alsaDevice: string;
  mpd: { host: string; port: number };
  nowPlayingIntervalMs: number;
  programRefreshMs: number;
  radiko: {
    app: string;
    appVersion: string;
    device: string;
    user: string;
    authKey: string;
    cookie: string | null;
    auth1Urls: string[];
    auth2Urls: string[];
    tokenOverride: string | null;
    tokenTtlMs: number;
    tokenSafetyMarginMs: number;
    maxAttempts: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
  };
  world: { baseUrl: string; countryCode: string | null; limit: number };
  poweroffCommand: string[];
  exportStations: boolean;
}

function pickPrefixed(env: NodeJS.ProcessEnv): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    // Empty assignments count as unset.
    if (key.startsWith(ENV_PREFIX) && value !== undefined && value.trim() !== '') {
      picked[key] = value;
    }
  }
  return picked;
}

function toEnvironment(raw: RawEnvironment): EnvironmentConfig {
  const orNull = (value: string) => (value ? value : null);
  return {
    stationsFile: raw.TUNEDECK_STATIONS,
    stateFile: raw.TUNEDECK_STATE,
    logLevel: raw.TUNEDECK_DEBUG ? 'debug' : raw.TUNEDECK_LOG_LEVEL,
    logJson: raw.TUNEDECK_LOG_JSON,
    buttonPins: {
      A: raw.TUNEDECK_BUTTON_A,
      B: raw.TUNEDECK_BUTTON_B,
      X: raw.TUNEDECK_BUTTON_X,
      Y: raw.TUNEDECK_BUTTON_Y,
    },
    doubleClickMs: raw.TUNEDECK_DOUBLE_CLICK_MS,
    shutdownConfirmMs: raw.TUNEDECK_SHUTDOWN_CONFIRM_MS,
    gpioDisabled: raw.TUNEDECK_DISABLE_GPIO,
    gpioChip: raw.TUNEDECK_GPIO_CHIP,
    gpiomonBinary: raw.TUNEDECK_GPIOMON,
    keyboardInput: raw.TUNEDECK_KEYBOARD,
    display: {
      device: orNull(raw.TUNEDECK_DISPLAY_DEVICE),
      width: raw.TUNEDECK_DISPLAY_WIDTH,
      height: raw.TUNEDECK_DISPLAY_HEIGHT,
      rotation: raw.TUNEDECK_DISPLAY_ROTATION,
      fontPath: orNull(raw.TUNEDECK_DISPLAY_FONT),
    },
    ffmpegBinary: raw.TUNEDECK_FFMPEG,
    alsaDevice: raw.TUNEDECK_ALSA_DEVICE,
    mpd: { host: raw.TUNEDECK_MPD_HOST, port: raw.TUNEDECK_MPD_PORT },
    nowPlayingIntervalMs: raw.TUNEDECK_METADATA_INTERVAL_MS,
    programRefreshMs: raw.TUNEDECK_PROGRAM_REFRESH_MS,
    radiko: {
      app: raw.TUNEDECK_RADIKO_APP,
      appVersion: raw.TUNEDECK_RADIKO_APP_VER,
      device: raw.TUNEDECK_RADIKO_DEVICE,
      user: raw.TUNEDECK_RADIKO_USER,
      authKey: raw.TUNEDECK_RADIKO_AUTHKEY,
      cookie: orNull(raw.TUNEDECK_RADIKO_COOKIE),
      auth1Urls: raw.TUNEDECK_RADIKO_AUTH1_URLS,
      auth2Urls: raw.TUNEDECK_RADIKO_AUTH2_URLS,
      tokenOverride: orNull(raw.TUNEDECK_RADIKO_TOKEN),
      tokenTtlMs: raw.TUNEDECK_TOKEN_TTL_MS,
      tokenSafetyMarginMs: raw.TUNEDECK_TOKEN_MARGIN_MS,
      maxAttempts: raw.TUNEDECK_AUTH_ATTEMPTS,
      backoffBaseMs: raw.TUNEDECK_AUTH_BACKOFF_MS,
      backoffMaxMs: raw.TUNEDECK_AUTH_BACKOFF_MAX_MS,
    },
    world: {
      baseUrl: raw.TUNEDECK_WORLD_API.replace(/\/+$/, ''),
      countryCode: orNull(raw.TUNEDECK_WORLD_COUNTRY.toUpperCase()),
      limit: raw.TUNEDECK_WORLD_LIMIT,
    },
    poweroffCommand: raw.TUNEDECK_POWEROFF_COMMAND.split(/\s+/).filter(Boolean),
    exportStations: raw.TUNEDECK_EXPORT_STATIONS,
  };
}

/**
 * Resolves the configuration once from `TUNEDECK_*` variables. Unknown variables
 * under the prefix and invalid values throw a ConfigError naming each of them.
 */
export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const parsed = environmentSchema.safeParse(pickPrefixed(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      if (issue.code === 'unrecognized_keys') {
        return `unknown variable${issue.keys.length === 1 ? '' : 's'} ${issue.keys.join(', ')}`;
      }
      return `${issue.path.join('.')}: ${issue.message}`;
    });
    throw new ConfigError(issues);
  }
  const config = toEnvironment(parsed.data);
  const pins = BUTTON_IDS.map((id) => config.buttonPins[id]);
  if (new Set(pins).size !== pins.length) {
    throw new ConfigError(['button pins must be distinct']);
  }
  return config;
}
