/**
 * The upstream token handshake failed on every attempt. Callers treat this as
 * "nothing can be resolved right now", never as a process failure.
 */
export class AuthUnavailableError extends Error {
  public readonly name = 'AuthUnavailableError';

  constructor(
    public readonly attempts: number,
    public readonly lastCause?: unknown,
  ) {
    super(
      `auth unavailable after ${attempts} attempt${attempts === 1 ? '' : 's'}` +
        (lastCause instanceof Error ? `: ${lastCause.message}` : ''),
    );
  }
}

/** Upstream rejected a request made with the current token (HTTP 401). */
export class UpstreamRejectedError extends Error {
  public readonly name = 'UpstreamRejectedError';

  constructor(
    public readonly status: number,
    message: string,
  ) {
    super(message);
  }
}

/** The external player failed to start or stopped on its own. */
export class PlaybackBackendError extends Error {
  public readonly name = 'PlaybackBackendError';

  constructor(message: string, public readonly cause?: unknown) {
    super(message);
  }
}

/** The state file could not be read or written. Operation continues in memory. */
export class PersistenceError extends Error {
  public readonly name = 'PersistenceError';

  constructor(
    public readonly filePath: string,
    message: string,
  ) {
    super(message);
  }
}

/** Invalid configuration; fatal at startup. */
export class ConfigError extends Error {
  public readonly name = 'ConfigError';

  constructor(public readonly issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
  }
}
