import {
  AppendFailedError,
  DEFAULT_PLAYLIST_TITLE,
  DEFAULT_READ_TRACK_LIMIT,
  InvalidUrlError,
  PlaylistCreationFailedError,
  PlaylistUnavailableError,
  SearchUnavailableError,
  TransferError,
  errorMessage,
  type BackoffOptions,
  type CandidateTrack,
  type CreatedPlaylist,
  type PlatformAdapter,
  type SourcePlaylist,
  type TrackRef,
} from '@tracklift/contracts';
import { chunk, runWithBackoff, sleep, toTrackRef } from '@tracklift/providers-core';

import {
  SpotifyClient,
  type SpotifyPlaylist,
  type SpotifyPlaylistItem,
  type SpotifyTrack,
} from './spotify.client';

export * from './spotify.auth';
export * from './spotify.client';

const DEFAULT_PAGE_SIZE = 100;
const DEFAULT_BATCH_SIZE = 100;

const normalizePageSize = (pageSize: number | undefined): number => {
  if (!pageSize || Number.isNaN(pageSize) || pageSize <= 0) {
    return DEFAULT_PAGE_SIZE;
  }
  return Math.min(Math.trunc(pageSize), 100);
};

const normalizeBatchSize = (batchSize: number | undefined): number => {
  if (!batchSize || Number.isNaN(batchSize) || batchSize <= 0) {
    return DEFAULT_BATCH_SIZE;
  }
  return Math.min(Math.trunc(batchSize), 100);
};

export interface SpotifyAdapterOptions {
  client: SpotifyClient;
  readTrackLimit?: number;
  pageSize?: number;
  batchSize?: number;
  backoff?: BackoffOptions;
  /** injectable for tests */
  sleep?: (ms: number) => Promise<void>;
}

const toUri = (track: SpotifyTrack): string | null => {
  if (track.uri) return track.uri;
  return track.id ? `spotify:track:${track.id}` : null;
};

const firstArtist = (track: SpotifyTrack): string =>
  (track.artists ?? []).map((artist) => artist?.name).find((name): name is string => Boolean(name)) ?? '';

const mapTrack = (item: SpotifyPlaylistItem): TrackRef | undefined => {
  const track = item.track;
  // named local files are kept
  if (!track || !track.name) {
    return undefined;
  }
  return toTrackRef(track.name, firstArtist(track));
};

const toCandidate = (track: SpotifyTrack): CandidateTrack | undefined => {
  const platformId = toUri(track);
  if (!platformId || !track.name) return undefined;
  return {
    displayTitle: track.name,
    displayArtist: firstArtist(track),
    platformId,
  };
};

export function buildExactQuery(ref: TrackRef): string {
  return ref.artist ? `track:${ref.title} artist:${ref.artist}` : `track:${ref.title}`;
}

export class SpotifyAdapter implements PlatformAdapter {
  public readonly name = 'spotify' as const;

  private readonly client: SpotifyClient;
  private readonly readTrackLimit: number;
  private readonly pageSize: number;
  private readonly batchSize: number;
  private readonly backoff?: BackoffOptions;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(options: SpotifyAdapterOptions) {
    this.client = options.client;
    this.readTrackLimit = options.readTrackLimit ?? DEFAULT_READ_TRACK_LIMIT;
    this.pageSize = normalizePageSize(options.pageSize);
    this.batchSize = normalizeBatchSize(options.batchSize);
    this.backoff = options.backoff;
    this.wait = options.sleep ?? sleep;
  }

  extractPlaylistId(url: string): string {
    let path: string;
    try {
      path = new URL(url).pathname;
    } catch {
      throw new InvalidUrlError(`Not a valid URL: ${url}`);
    }
    const id = path.split('playlist/')[1]?.split('/')[0]?.trim();
    if (!id) {
      throw new InvalidUrlError('Spotify URL does not name a playlist (expected /playlist/<id>)');
    }
    return id;
  }

  private async fetchItems(playlist: SpotifyPlaylist): Promise<SpotifyPlaylistItem[]> {
    const items = playlist.tracks.items.slice(0, this.readTrackLimit);

    let next = playlist.tracks.next;
    let offset = playlist.tracks.offset + playlist.tracks.items.length;

    while (next && items.length < this.readTrackLimit) {
      const limit = Math.min(this.pageSize, this.readTrackLimit - items.length);
      const page = await runWithBackoff(
        () => this.client.getPlaylistTracks(playlist.id, { offset, limit }),
        this.backoff,
        this.wait,
      );
      items.push(...page.items);
      next = page.next;
      offset += page.items.length;
      if (page.items.length === 0) {
        break;
      }
    }

    return items;
  }

  async listTracks(playlistId: string): Promise<SourcePlaylist> {
    try {
      const playlist = await runWithBackoff(() => this.client.getPlaylist(playlistId), this.backoff, this.wait);
      const items = await this.fetchItems(playlist);
      const tracks = items
        .map(mapTrack)
        .filter((track): track is TrackRef => Boolean(track));

      return {
        tracks,
        title: playlist.name?.trim() || DEFAULT_PLAYLIST_TITLE,
      };
    } catch (error) {
      throw new PlaylistUnavailableError(
        this.name,
        `Could not access Spotify playlist: ${errorMessage(error)}`,
        error,
      );
    }
  }

  async search(title: string, artist: string, limit: number): Promise<CandidateTrack[]> {
    const q = `${title} ${artist}`.trim();
    try {
      const response = await this.client.searchTracks(q, limit);
      return (response.tracks?.items ?? [])
        .map(toCandidate)
        .filter((candidate): candidate is CandidateTrack => Boolean(candidate))
        .slice(0, limit);
    } catch (error) {
      throw new SearchUnavailableError(this.name, `Spotify search failed for "${q}": ${errorMessage(error)}`, error);
    }
  }

  async searchExact(ref: TrackRef): Promise<CandidateTrack | null> {
    const q = buildExactQuery(ref);
    try {
      const response = await this.client.searchTracks(q, 1);
      for (const track of response.tracks?.items ?? []) {
        const candidate = toCandidate(track);
        if (candidate) return candidate;
      }
      return null;
    } catch (error) {
      throw new SearchUnavailableError(this.name, `Spotify search failed for "${q}": ${errorMessage(error)}`, error);
    }
  }

  async currentUserId(): Promise<string> {
    try {
      const profile = await this.client.getCurrentUser();
      return profile.id;
    } catch (error) {
      throw new PlaylistCreationFailedError(
        this.name,
        `Could not resolve the Spotify account: ${errorMessage(error)}`,
        error,
      );
    }
  }

  async createPlaylist(ownerId: string, name: string): Promise<CreatedPlaylist> {
    try {
      const created = await this.client.createPlaylist(ownerId, { name, public: true });
      return {
        id: created.id,
        publicUrl: created.external_urls?.spotify ?? `https://open.spotify.com/playlist/${created.id}`,
      };
    } catch (error) {
      throw new PlaylistCreationFailedError(
        this.name,
        `Could not create Spotify playlist: ${errorMessage(error)}`,
        error,
      );
    }
  }

  async appendTracks(playlistId: string, trackIds: string[]): Promise<void> {
    if (trackIds.length === 0) return;

    try {
      for (const batch of chunk(trackIds, this.batchSize)) {
        await runWithBackoff(() => this.client.addTracks(playlistId, batch), this.backoff, this.wait);
      }
    } catch (error) {
      if (error instanceof TransferError) throw error;
      throw new AppendFailedError(this.name, `Could not add tracks to Spotify playlist: ${errorMessage(error)}`, {
        cause: error,
        matched: trackIds.length,
        playlistId,
      });
    }
  }
}

export default SpotifyAdapter;
