import type { FetchLike } from '@/ports/HttpPort';

export const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

export const globalFetch: FetchLike = (input, init) => fetch(input, init);

export function withTimeout(init: RequestInit = {}, timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS): RequestInit {
  return { ...init, signal: AbortSignal.timeout(timeoutMs) };
}

/**
 * Fetches a binary resource (artwork). Throws on non-2xx answers.
 */
export async function fetchBinary(
  fetchImpl: FetchLike,
  url: string,
  timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS,
): Promise<Buffer> {
  const res = await fetchImpl(url, withTimeout({ method: 'GET' }, timeoutMs));
  if (!res.ok) {
    throw new Error(`HTTP ${res.status} for ${url}`);
  }
  return Buffer.from(await res.arrayBuffer());
}
