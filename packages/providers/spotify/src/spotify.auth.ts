import type { TokenSource } from '@tracklift/contracts';

export interface SpotifyTokenResponse {
  access_token: string;
  token_type: string;
  scope?: string;
  expires_in: number;
  refresh_token?: string;
}

export interface SpotifyRefreshCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  tokenUrl?: string;
  timeoutMs?: number;
  now?: () => number;
}

const DEFAULT_TOKEN_URL = 'https://accounts.spotify.com/api/token';
/** Refresh this long before Spotify says the token expires. */
const EXPIRY_SKEW_MS = 60_000;

export function staticTokenSource(token: string): TokenSource {
  if (!token) {
    throw new Error('Spotify token is required');
  }
  return async () => token;
}

/**
 * Refresh Spotify access token
 */
export async function refreshSpotifyToken(credentials: SpotifyRefreshCredentials): Promise<SpotifyTokenResponse> {
  const body = new URLSearchParams({
    grant_type: 'refresh_token',
    refresh_token: credentials.refreshToken,
    client_id: credentials.clientId,
    client_secret: credentials.clientSecret,
  });

  const response = await fetch(credentials.tokenUrl ?? DEFAULT_TOKEN_URL, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/x-www-form-urlencoded',
    },
    body: body.toString(),
    signal: AbortSignal.timeout(credentials.timeoutMs ?? 10000),
  });

  if (!response.ok) {
    const error = await response.text();
    throw new Error(`Spotify token refresh failed: ${response.status} ${error}`);
  }

  return (await response.json()) as SpotifyTokenResponse;
}

/**
 * Token source that trades a long-lived refresh token for access tokens and
 * reuses each one until shortly before it expires. Concurrent callers share a
 * single in-flight refresh.
 */
export function refreshingTokenSource(credentials: SpotifyRefreshCredentials): TokenSource {
  const now = credentials.now ?? Date.now;
  let cached: { token: string; expiresAt: number } | null = null;
  let inflight: Promise<string> | null = null;

  const refresh = async (): Promise<string> => {
    const response = await refreshSpotifyToken(credentials);
    cached = {
      token: response.access_token,
      expiresAt: now() + response.expires_in * 1000 - EXPIRY_SKEW_MS,
    };
    return response.access_token;
  };

  return async () => {
    if (cached && cached.expiresAt > now()) {
      return cached.token;
    }
    if (!inflight) {
      inflight = refresh().finally(() => {
        inflight = null;
      });
    }
    return inflight;
  };
}
