import type { FetchLike } from '../../src/ports/HttpPort';

export type RecordedRequest = {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: string | null;
};

export type FetchRoute = (request: RecordedRequest) => Response | Promise<Response> | undefined;

function headersOf(init?: RequestInit): Record<string, string> {
  const out: Record<string, string> = {};
  new Headers(init?.headers).forEach((value, key) => {
    out[key] = value;
  });
  return out;
}

/**
 * Scripted fetch: routes are tried in order; the first one returning a response
 * answers. Unrouted requests fail like a network error.
 */
export function makeScriptedFetch(routes: FetchRoute[]): { fetch: FetchLike; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetch: FetchLike = async (input, init) => {
    const request: RecordedRequest = {
      url: String(input),
      method: init?.method ?? 'GET',
      headers: headersOf(init),
      body: typeof init?.body === 'string' ? init.body : null,
    };
    requests.push(request);
    for (const route of routes) {
      const response = await route(request);
      if (response) {
        return response;
      }
    }
    throw new TypeError(`fetch failed: no route for ${request.method} ${request.url}`);
  };
  return { fetch, requests };
}

export function textResponse(body: string, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(status === 204 ? null : body, { status, headers });
}
