import {
  AppendFailedError,
  DEFAULT_PLAYLIST_TITLE,
  DEFAULT_READ_TRACK_LIMIT,
  InvalidUrlError,
  PlaylistCreationFailedError,
  PlaylistUnavailableError,
  SearchUnavailableError,
  errorMessage,
  type BackoffOptions,
  type CandidateTrack,
  type CreatedPlaylist,
  type PlatformAdapter,
  type SourcePlaylist,
  type TrackRef,
} from '@tracklift/contracts';
import { runWithBackoff, sleep, toTrackRef } from '@tracklift/providers-core';

import { YouTubeClient, type YouTubePlaylistItemSnippet } from './youtube.client';
import { decodeEntities, isUnavailableTitle, splitVideoTitle } from './youtube.titles';

export * from './youtube.client';
export * from './youtube.titles';

export interface YouTubeAdapterOptions {
  client: YouTubeClient;
  readTrackLimit?: number;
  pageSize?: number;
  backoff?: BackoffOptions;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_PAGE_SIZE = 50;
/** Safety stop for playlists whose page tokens never run out. */
const MAX_PAGES = 1000;

const normalizePageSize = (value: number | undefined): number => {
  if (!value || Number.isNaN(value) || value <= 0) {
    return DEFAULT_PAGE_SIZE;
  }
  return Math.min(Math.trunc(value), 50);
};

export const youtubePlaylistUrl = (id: string): string =>
  `https://music.youtube.com/playlist?list=${encodeURIComponent(id)}`;

const mapItem = (snippet: YouTubePlaylistItemSnippet | null | undefined): TrackRef | undefined => {
  const rawTitle = snippet?.title?.trim();
  if (!rawTitle || isUnavailableTitle(rawTitle)) {
    return undefined;
  }
  const parts = splitVideoTitle(rawTitle, snippet?.videoOwnerChannelTitle);
  return toTrackRef(parts.title, parts.artist);
};

export class YouTubeAdapter implements PlatformAdapter {
  public readonly name = 'youtube' as const;

  private readonly client: YouTubeClient;
  private readonly readTrackLimit: number;
  private readonly pageSize: number;
  private readonly backoff?: BackoffOptions;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(options: YouTubeAdapterOptions) {
    this.client = options.client;
    this.readTrackLimit = options.readTrackLimit ?? DEFAULT_READ_TRACK_LIMIT;
    this.pageSize = normalizePageSize(options.pageSize);
    this.backoff = options.backoff;
    this.wait = options.sleep ?? sleep;
  }

  extractPlaylistId(url: string): string {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new InvalidUrlError(`Not a valid URL: ${url}`);
    }
    const id = parsed.searchParams.get('list')?.trim();
    if (!id) {
      throw new InvalidUrlError('YouTube URL does not name a playlist (missing list parameter)');
    }
    return id;
  }

  async listTracks(playlistId: string): Promise<SourcePlaylist> {
    try {
      const playlist = await runWithBackoff(() => this.client.getPlaylist(playlistId), this.backoff, this.wait);
      const meta = playlist.items?.[0];
      if (!meta) {
        throw new Error(`playlist ${playlistId} not found or not public`);
      }

      const snippets: Array<YouTubePlaylistItemSnippet | null | undefined> = [];
      let pageToken: string | undefined;
      let pages = 0;

      while (pages < MAX_PAGES && snippets.length < this.readTrackLimit) {
        pages += 1;
        const token = pageToken;
        const page = await runWithBackoff(
          () => this.client.getPlaylistItems(playlistId, { maxResults: this.pageSize, pageToken: token }),
          this.backoff,
          this.wait,
        );
        for (const item of page.items ?? []) {
          snippets.push(item.snippet);
        }
        pageToken = page.nextPageToken ?? undefined;
        if (!pageToken) {
          break;
        }
      }

      const tracks = snippets
        .slice(0, this.readTrackLimit)
        .map(mapItem)
        .filter((track): track is TrackRef => Boolean(track));

      const title = meta.snippet?.title ? decodeEntities(meta.snippet.title).trim() : '';
      return { tracks, title: title || DEFAULT_PLAYLIST_TITLE };
    } catch (error) {
      throw new PlaylistUnavailableError(
        this.name,
        `Could not access YouTube playlist: ${errorMessage(error)}`,
        error,
      );
    }
  }

  async search(title: string, artist: string, limit: number): Promise<CandidateTrack[]> {
    const q = `${title} ${artist}`.trim();
    try {
      const response = await this.client.searchVideos(q, { maxResults: limit });
      const candidates: CandidateTrack[] = [];
      for (const item of response.items ?? []) {
        const videoId = item.id?.videoId?.trim();
        const rawTitle = item.snippet?.title?.trim();
        if (!videoId || !rawTitle) continue;
        const parts = splitVideoTitle(rawTitle, item.snippet?.channelTitle);
        candidates.push({ displayTitle: parts.title, displayArtist: parts.artist, platformId: videoId });
      }
      return candidates.slice(0, limit);
    } catch (error) {
      throw new SearchUnavailableError(this.name, `YouTube search failed for "${q}": ${errorMessage(error)}`, error);
    }
  }

  /** Playlists are always created for the token's own channel. */
  async currentUserId(): Promise<string> {
    return 'me';
  }

  async createPlaylist(_ownerId: string, name: string): Promise<CreatedPlaylist> {
    if (!this.client.hasUserAuth()) {
      throw new PlaylistCreationFailedError(
        this.name,
        'YouTube playlist creation requires an OAuth access token',
      );
    }

    try {
      const created = await runWithBackoff(
        () => this.client.createPlaylist({ title: name }),
        this.backoff,
        this.wait,
      );
      return { id: created.id, publicUrl: youtubePlaylistUrl(created.id) };
    } catch (error) {
      throw new PlaylistCreationFailedError(
        this.name,
        `Could not create YouTube playlist: ${errorMessage(error)}`,
        error,
      );
    }
  }

  async appendTracks(playlistId: string, trackIds: string[]): Promise<void> {
    if (trackIds.length === 0) return;

    let inserted = 0;
    try {
      for (const videoId of trackIds) {
        await runWithBackoff(() => this.client.insertPlaylistItem(playlistId, videoId), this.backoff, this.wait);
        inserted += 1;
      }
    } catch (error) {
      throw new AppendFailedError(
        this.name,
        `Could not add tracks to YouTube playlist (${inserted}/${trackIds.length} added): ${errorMessage(error)}`,
        { cause: error, matched: trackIds.length, playlistId },
      );
    }
  }
}

export default YouTubeAdapter;
