import type { AuthChallenge, AuthConfirmation, AuthHandshakePort } from '@/ports/AuthHandshakePort';
import type { FetchLike } from '@/ports/HttpPort';
import { createLogger, errorMessage } from '@/shared/logging/logger';
import { safeReadText } from '@/shared/bestEffort';
import { globalFetch, withTimeout } from '@/shared/http';
import { baseRadikoHeaders, type RadikoClientIdentity } from '@/adapters/content/radiko/radikoHeaders';

export interface RadikoAuthClientOptions extends RadikoClientIdentity {
  auth1Urls: string[];
  auth2Urls: string[];
  fetch?: FetchLike;
}

/**
 * HTTP side of the two-step token handshake. Each step walks its endpoint list
 * in order and stops at the first usable answer.
 */
export class RadikoAuthClient implements AuthHandshakePort {
  private readonly log = createLogger('Upstream', 'Auth');
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: RadikoAuthClientOptions) {
    this.fetchImpl = options.fetch ?? globalFetch;
  }

  public async requestChallenge(): Promise<AuthChallenge> {
    const headers = baseRadikoHeaders(this.options);
    let lastFailure = 'no auth1 endpoint configured';
    for (const url of this.options.auth1Urls) {
      let res: Response;
      try {
        res = await this.fetchImpl(url, withTimeout({ method: 'GET', headers, redirect: 'follow' }));
      } catch (error) {
        lastFailure = `auth1 request failed: ${errorMessage(error)}`;
        this.log.debug('auth1 request failed', { url, message: errorMessage(error) });
        continue;
      }
      const token = res.headers.get('X-Radiko-AuthToken');
      const keyLength = res.headers.get('X-Radiko-KeyLength');
      const keyOffset = res.headers.get('X-Radiko-KeyOffset');
      if (res.ok && token && keyLength && keyOffset) {
        const challenge = {
          token,
          keyLength: Number(keyLength),
          keyOffset: Number(keyOffset),
        };
        if (!Number.isInteger(challenge.keyLength) || !Number.isInteger(challenge.keyOffset)) {
          lastFailure = 'auth1 returned a malformed challenge';
          continue;
        }
        this.log.debug('auth1 ok', { url });
        return challenge;
      }
      const body = await safeReadText(res);
      lastFailure = res.ok
        ? 'auth1 challenge headers missing'
        : `auth1 rejected: HTTP ${res.status}`;
      this.log.debug('auth1 unusable', {
        url,
        status: res.status,
        html: /<!DOCTYPE html|<html/i.test(body),
      });
    }
    throw new Error(lastFailure);
  }

  public async confirm(challenge: AuthChallenge, partialKey: string): Promise<AuthConfirmation> {
    const headers = {
      ...baseRadikoHeaders(this.options),
      'X-Radiko-AuthToken': challenge.token,
      'X-Radiko-Partialkey': partialKey,
    };
    let lastFailure = 'no auth2 endpoint configured';
    for (const url of this.options.auth2Urls) {
      try {
        let res = await this.fetchImpl(url, withTimeout({ method: 'POST', headers, body: '\r\n' }));
        if (res.status === 404 || res.status === 405) {
          res = await this.fetchImpl(url, withTimeout({ method: 'GET', headers }));
        }
        if (res.status === 200) {
          const areaId = parseAreaId(await safeReadText(res));
          this.log.debug('auth2 ok', { url, areaId });
          return { areaId };
        }
        lastFailure = `auth2 rejected: HTTP ${res.status}`;
        this.log.debug('auth2 unusable', { url, status: res.status });
      } catch (error) {
        lastFailure = `auth2 request failed: ${errorMessage(error)}`;
        this.log.debug('auth2 request failed', { url, message: errorMessage(error) });
      }
    }
    throw new Error(lastFailure);
  }
}

/**
 * The auth2 body is `JP13,tokyo Japan,...`; the leading JPnn code is the service area.
 */
export function parseAreaId(body: string): string | null {
  const head = body.split(',')[0]?.trim() ?? '';
  if (/^JP\d{1,2}$/.test(head)) {
    return head;
  }
  const match = body.match(/JP\d{2}/);
  return match ? match[0] : null;
}
