import { AuthUnavailableError } from '@/domain/errors';
import type { AuthChallenge, AuthHandshakePort } from '@/ports/AuthHandshakePort';
import type { ClockPort } from '@/ports/ClockPort';
import { systemClock } from '@/shared/time/systemClock';
import { backoffDelay, sleep as defaultSleep, type BackoffPolicy, type Sleep } from '@/shared/backoff';
import { createLogger, errorMessage } from '@/shared/logging/logger';

export interface AuthToken {
  readonly value: string;
  readonly issuedAt: number;
  readonly validityMs: number;
  /** Slice of the shared key echoed back in the confirmation step. */
  readonly partialKey: string;
  readonly areaId: string | null;
}

export interface AuthTokenManagerOptions {
  /** Client identification headers sent with every authenticated request. */
  baseHeaders: Readonly<Record<string, string>>;
  authKey: string;
  tokenTtlMs: number;
  safetyMarginMs: number;
  maxAttempts: number;
  backoff: BackoffPolicy;
  /** Externally supplied credential; used as is and never renewed. */
  tokenOverride?: string | null;
  clock?: ClockPort;
  sleep?: Sleep;
}

/**
 * Owns the upstream session token: acquires it through the two-step handshake,
 * caches it in memory and renews it before it expires or after a rejection.
 * Renewal is single-flight; concurrent callers share the in-flight handshake.
 */
export class AuthTokenManager {
  private readonly log = createLogger('Auth', 'TokenManager');
  private readonly clock: ClockPort;
  private readonly sleep: Sleep;
  private token: AuthToken | null = null;
  private inflight: Promise<AuthToken> | null = null;
  private renewTimer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly handshake: AuthHandshakePort,
    private readonly options: AuthTokenManagerOptions,
  ) {
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
  }

  public async getValidToken(): Promise<AuthToken> {
    const override = this.overrideToken();
    if (override) {
      return override;
    }
    const cached = this.token;
    if (cached && !this.isExpired(cached, this.clock.now())) {
      return cached;
    }
    return this.renew();
  }

  /** Drops the cached token, e.g. after the upstream refused it. */
  public invalidate(value?: string): void {
    if (!this.token || (value !== undefined && this.token.value !== value)) {
      return;
    }
    this.log.info('auth token invalidated', { token: this.token.value });
    this.token = null;
    this.clearRenewTimer();
  }

  public isExpired(token: AuthToken, now: number): boolean {
    return now >= token.issuedAt + token.validityMs - this.options.safetyMarginMs;
  }

  /** Headers every authenticated request, and the player fetching the stream, must carry. */
  public authHeaders(token: AuthToken): Record<string, string> {
    const headers: Record<string, string> = {
      ...this.options.baseHeaders,
      'X-Radiko-AuthToken': token.value,
    };
    if (token.partialKey) {
      headers['X-Radiko-Partialkey'] = token.partialKey;
    }
    if (token.areaId) {
      headers['X-Radiko-AreaId'] = token.areaId;
    }
    return headers;
  }

  /** Starts the background renewal task. */
  public start(): void {
    this.running = true;
    if (this.token) {
      this.scheduleRenewal(this.token);
    }
  }

  public stop(): void {
    this.running = false;
    this.clearRenewTimer();
  }

  private renew(): Promise<AuthToken> {
    if (!this.inflight) {
      this.inflight = this.handshakeWithRetry().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async handshakeWithRetry(): Promise<AuthToken> {
    const { maxAttempts } = this.options;
    let lastError: unknown;
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        const token = await this.performHandshake();
        this.token = token;
        this.log.info('auth token acquired', { attempt, areaId: token.areaId, token: token.value });
        this.scheduleRenewal(token);
        return token;
      } catch (error) {
        lastError = error;
        this.log.warn('auth handshake failed', { attempt, maxAttempts, message: errorMessage(error) });
        if (attempt < maxAttempts) {
          await this.sleep(backoffDelay(this.options.backoff, attempt - 1));
        }
      }
    }
    this.token = null;
    throw new AuthUnavailableError(maxAttempts, lastError);
  }

  private async performHandshake(): Promise<AuthToken> {
    const issuedAt = this.clock.now();
    const challenge = await this.handshake.requestChallenge();
    const partialKey = derivePartialKey(this.options.authKey, challenge);
    const confirmation = await this.handshake.confirm(challenge, partialKey);
    const token: AuthToken = {
      value: challenge.token,
      issuedAt,
      validityMs: this.options.tokenTtlMs,
      partialKey,
      areaId: confirmation.areaId,
    };
    if (this.isExpired(token, this.clock.now())) {
      throw new Error('token validity window elapsed during handshake');
    }
    return token;
  }

  private scheduleRenewal(token: AuthToken): void {
    this.clearRenewTimer();
    if (!this.running) {
      return;
    }
    const renewAt = token.issuedAt + token.validityMs - this.options.safetyMarginMs;
    const delay = Math.max(0, renewAt - this.clock.now());
    this.renewTimer = setTimeout(() => {
      this.renewTimer = null;
      this.log.debug('background token renewal');
      this.renew().catch((error: unknown) => {
        this.log.warn('background token renewal failed', { message: errorMessage(error) });
      });
    }, delay);
    this.renewTimer.unref();
  }

  private clearRenewTimer(): void {
    if (this.renewTimer) {
      clearTimeout(this.renewTimer);
      this.renewTimer = null;
    }
  }

  private overrideToken(): AuthToken | null {
    const value = this.options.tokenOverride;
    if (!value) {
      return null;
    }
    return {
      value,
      issuedAt: this.clock.now(),
      validityMs: Number.POSITIVE_INFINITY,
      partialKey: '',
      areaId: null,
    };
  }
}

/**
 * base64 of `authKey[offset, offset + length)`. Throws when the challenge points outside the key.
 */
export function derivePartialKey(authKey: string, challenge: Pick<AuthChallenge, 'keyOffset' | 'keyLength'>): string {
  const key = Buffer.from(authKey, 'ascii');
  const { keyOffset, keyLength } = challenge;
  if (keyOffset < 0 || keyLength <= 0 || keyOffset + keyLength > key.length) {
    throw new Error(`malformed challenge: offset=${keyOffset} length=${keyLength}`);
  }
  return key.subarray(keyOffset, keyOffset + keyLength).toString('base64');
}
