import { RateLimitError, type TokenSource } from '@tracklift/contracts';
import { parseRetryAfter } from '@tracklift/providers-core';

export interface YouTubeClientOptions {
  /** Data API key; enough for reads and searches. */
  apiKey?: string;
  /** OAuth access token; required for playlist writes. */
  getToken?: TokenSource;
  baseUrl?: string;
  timeoutMs?: number;
}

export interface YouTubePlaylistSnippet {
  title?: string | null;
  description?: string | null;
}

export interface YouTubePlaylistResponse {
  items?: Array<{
    id?: string | null;
    snippet?: YouTubePlaylistSnippet | null;
  }> | null;
}

export interface YouTubePlaylistItemSnippet {
  title?: string | null;
  videoOwnerChannelTitle?: string | null;
  resourceId?: {
    videoId?: string | null;
  } | null;
}

export interface YouTubePlaylistItemsResponse {
  items?: Array<{
    snippet?: YouTubePlaylistItemSnippet | null;
  }> | null;
  nextPageToken?: string | null;
}

export interface YouTubeSearchResponse {
  items?: Array<{
    id?: {
      videoId?: string | null;
    } | null;
    snippet?: {
      title?: string | null;
      channelTitle?: string | null;
    } | null;
  }> | null;
}

interface YouTubeErrorBody {
  error?: {
    message?: string;
    errors?: Array<{ reason?: string }>;
  };
}

export class YouTubeApiError extends Error {
  constructor(public readonly status: number, message: string, public readonly reason?: string) {
    super(message);
    this.name = 'YouTubeApiError';
  }
}

const defaultBaseUrl = 'https://www.googleapis.com/youtube/v3';
const defaultTimeoutMs = 10000;
/** Data API category id for Music. */
const MUSIC_CATEGORY_ID = '10';
const RATE_LIMIT_REASONS = new Set(['rateLimitExceeded', 'userRateLimitExceeded']);

type HttpMethod = 'GET' | 'POST';
type Query = Record<string, string | number | null | undefined>;

const parseErrorBody = (text: string): YouTubeErrorBody => {
  try {
    return JSON.parse(text) as YouTubeErrorBody;
  } catch {
    return {};
  }
};

export class YouTubeClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly options: YouTubeClientOptions) {
    if (!options.apiKey && !options.getToken) {
      throw new Error('YouTube API key or access token is required');
    }
    this.baseUrl = (options.baseUrl ?? defaultBaseUrl).replace(/\/$/, '');
    this.timeoutMs = options.timeoutMs ?? defaultTimeoutMs;
  }

  /** Whether writes (playlist creation, item inserts) are possible. */
  hasUserAuth(): boolean {
    return Boolean(this.options.getToken);
  }

  private buildUrl(path: string, query?: Query): URL {
    const normalizedPath = path.startsWith('/') ? path.slice(1) : path;
    const url = new URL(normalizedPath, `${this.baseUrl}/`);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value === undefined || value === null) continue;
        url.searchParams.set(key, String(value));
      }
    }
    return url;
  }

  private async request<T>(
    method: HttpMethod,
    path: string,
    options?: {
      query?: Query;
      body?: unknown;
    },
  ): Promise<T> {
    const url = this.buildUrl(path, options?.query);
    const headers: Record<string, string> = {};

    if (this.options.getToken) {
      headers.authorization = `Bearer ${await this.options.getToken()}`;
    } else if (method === 'GET' && this.options.apiKey) {
      url.searchParams.set('key', this.options.apiKey);
    } else {
      throw new YouTubeApiError(401, 'YouTube writes require an OAuth access token');
    }

    const init: RequestInit = {
      method,
      headers,
      signal: AbortSignal.timeout(this.timeoutMs),
    };

    if (options?.body !== undefined) {
      headers['content-type'] = 'application/json';
      init.body = JSON.stringify(options.body);
    }

    const response = await fetch(url.toString(), init);

    if (response.status === 429) {
      const retryAfter = parseRetryAfter(response.headers.get('retry-after'));
      throw new RateLimitError('YouTube rate limit exceeded', retryAfter);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => response.statusText);
      const body = parseErrorBody(text);
      const reason = body.error?.errors?.[0]?.reason;
      if (reason && RATE_LIMIT_REASONS.has(reason)) {
        throw new RateLimitError('YouTube rate limit exceeded', parseRetryAfter(response.headers.get('retry-after')));
      }
      throw new YouTubeApiError(
        response.status,
        `YouTube API ${response.status}: ${body.error?.message ?? text}`,
        reason,
      );
    }

    return (await response.json()) as T;
  }

  getPlaylist(id: string): Promise<YouTubePlaylistResponse> {
    return this.request('GET', '/playlists', {
      query: {
        part: 'snippet',
        id,
      },
    });
  }

  getPlaylistItems(
    playlistId: string,
    opts: { maxResults: number; pageToken?: string },
  ): Promise<YouTubePlaylistItemsResponse> {
    return this.request('GET', '/playlistItems', {
      query: {
        part: 'snippet',
        playlistId,
        maxResults: Math.min(Math.max(opts.maxResults, 1), 50),
        pageToken: opts.pageToken,
      },
    });
  }

  searchVideos(query: string, opts?: { maxResults?: number }): Promise<YouTubeSearchResponse> {
    const maxResults = opts?.maxResults && opts.maxResults > 0 ? Math.min(opts.maxResults, 50) : 5;
    return this.request('GET', '/search', {
      query: {
        part: 'snippet',
        type: 'video',
        videoCategoryId: MUSIC_CATEGORY_ID,
        maxResults,
        q: query,
      },
    });
  }

  createPlaylist(payload: { title: string; description?: string | null }): Promise<{ id: string }> {
    return this.request('POST', '/playlists', {
      query: { part: 'snippet,status' },
      body: {
        snippet: {
          title: payload.title,
          description: payload.description ?? '',
        },
        status: {
          privacyStatus: 'public',
        },
      },
    });
  }

  insertPlaylistItem(playlistId: string, videoId: string): Promise<{ id: string }> {
    return this.request('POST', '/playlistItems', {
      query: { part: 'snippet' },
      body: {
        snippet: {
          playlistId,
          resourceId: {
            kind: 'youtube#video',
            videoId,
          },
        },
      },
    });
  }
}
