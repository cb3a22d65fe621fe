import { RateLimitError, type TokenSource } from '@tracklift/contracts';
import { parseRetryAfter } from '@tracklift/providers-core';

export interface SpotifyClientOptions {
  getToken: TokenSource;
  baseUrl?: string;
  /** per-request timeout */
  timeoutMs?: number;
}

export interface SpotifyUserProfile {
  id: string;
}

export interface SpotifyArtist {
  name: string;
}

export interface SpotifyTrack {
  id?: string | null;
  uri?: string | null;
  name: string;
  artists?: SpotifyArtist[] | null;
  is_local?: boolean | null;
}

export interface SpotifyPlaylistItem {
  track: SpotifyTrack | null;
}

export interface SpotifyPlaylistPage {
  items: SpotifyPlaylistItem[];
  next: string | null;
  offset: number;
  limit: number;
  total: number;
}

export interface SpotifyPlaylist {
  id: string;
  name: string;
  description?: string | null;
  tracks: SpotifyPlaylistPage;
}

export interface SpotifyCreatedPlaylist {
  id: string;
  external_urls?: { spotify?: string | null } | null;
}

export interface SpotifySearchResponse {
  tracks?: { items: SpotifyTrack[] } | null;
}

export class SpotifyApiError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = 'SpotifyApiError';
  }
}

const defaultBaseUrl = 'https://api.spotify.com/v1';
const defaultTimeoutMs = 10000;

export class SpotifyClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly options: SpotifyClientOptions) {
    this.baseUrl = (options.baseUrl ?? defaultBaseUrl).replace(/\/$/, '');
    this.timeoutMs = options.timeoutMs ?? defaultTimeoutMs;
  }

  private buildUrl(path: string, query?: Record<string, string | number | undefined>): string {
    const url = new URL(`${this.baseUrl}${path}`);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value === undefined) continue;
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private async request<T>(method: 'GET' | 'POST', path: string, options?: {
    body?: unknown;
    query?: Record<string, string | number | undefined>;
  }): Promise<T> {
    const url = this.buildUrl(path, options?.query);
    const headers: Record<string, string> = {
      authorization: `Bearer ${await this.options.getToken()}`,
    };

    const init: RequestInit = {
      method,
      headers,
      signal: AbortSignal.timeout(this.timeoutMs),
    };

    if (options?.body !== undefined) {
      headers['content-type'] = 'application/json';
      init.body = JSON.stringify(options.body);
    }

    const response = await fetch(url, init);

    if (response.status === 429) {
      const retryAfter = parseRetryAfter(response.headers.get('retry-after'));
      throw new RateLimitError('Spotify rate limit exceeded', retryAfter);
    }

    if (!response.ok) {
      const message = await response.text().catch(() => response.statusText);
      throw new SpotifyApiError(response.status, `Spotify API ${response.status}: ${message}`);
    }

    return (await response.json()) as T;
  }

  getPlaylist(id: string): Promise<SpotifyPlaylist> {
    const encoded = encodeURIComponent(id);
    return this.request<SpotifyPlaylist>('GET', `/playlists/${encoded}`);
  }

  getPlaylistTracks(id: string, opts: { offset: number; limit: number }): Promise<SpotifyPlaylistPage> {
    const encoded = encodeURIComponent(id);
    return this.request<SpotifyPlaylistPage>('GET', `/playlists/${encoded}/tracks`, {
      query: {
        offset: opts.offset,
        limit: opts.limit,
      },
    });
  }

  searchTracks(q: string, limit: number): Promise<SpotifySearchResponse> {
    return this.request<SpotifySearchResponse>('GET', '/search', {
      query: { q, type: 'track', limit },
    });
  }

  getCurrentUser(): Promise<SpotifyUserProfile> {
    return this.request<SpotifyUserProfile>('GET', '/me');
  }

  createPlaylist(
    userId: string,
    payload: { name: string; description?: string; public?: boolean },
  ): Promise<SpotifyCreatedPlaylist> {
    const encoded = encodeURIComponent(userId);
    return this.request<SpotifyCreatedPlaylist>('POST', `/users/${encoded}/playlists`, { body: payload });
  }

  addTracks(playlistId: string, uris: string[]): Promise<{ snapshot_id: string }> {
    const encoded = encodeURIComponent(playlistId);
    return this.request<{ snapshot_id: string }>('POST', `/playlists/${encoded}/tracks`, {
      body: { uris },
    });
  }
}
