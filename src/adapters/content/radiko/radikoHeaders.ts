export interface RadikoClientIdentity {
  app: string;
  appVersion: string;
  device: string;
  user: string;
  cookie: string | null;
}

export function baseRadikoHeaders(identity: RadikoClientIdentity): Record<string, string> {
  const headers: Record<string, string> = {
    Pragma: 'no-cache',
    'Cache-Control': 'no-cache',
    'X-Radiko-App': identity.app,
    'X-Radiko-App-Version': identity.appVersion,
    'X-Radiko-Device': identity.device,
    'X-Radiko-User': identity.user,
    'User-Agent': 'Mozilla/5.0',
    Origin: 'https://radiko.jp',
    Referer: 'https://radiko.jp/',
  };
  if (identity.cookie) {
    headers.Cookie = identity.cookie;
  }
  return headers;
}
