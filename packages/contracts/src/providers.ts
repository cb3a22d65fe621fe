// packages/contracts/src/providers.ts

import type { PlatformName } from './constants';

/** Normalized identity of one source-playlist entry. */
export interface TrackRef {
  readonly title: string;
  readonly artist: string;
}

/** One catalog search result considered for matching. */
export interface CandidateTrack {
  displayTitle: string;
  displayArtist: string;
  /** Spotify track URI or YouTube video id */
  platformId: string;
}

export interface SourcePlaylist {
  tracks: TrackRef[];
  title: string;
}

export interface CreatedPlaylist {
  id: string;
  publicUrl: string;
}

/** Shared errors & config */
export class RateLimitError extends Error {
  constructor(message: string, public retryAfterMs?: number) {
    super(message);
    this.name = 'RateLimitError';
  }
}

export interface BackoffOptions {
  /** max retries on 429 */
  retries?: number;           // default 3
  /** base delay in ms for exponential backoff */
  baseDelayMs?: number;       // default 500
  /** optional hard ceiling */
  maxDelayMs?: number;        // default 8000
}

/** Yields a bearer token; implementations may cache and refresh. */
export type TokenSource = () => Promise<string>;

/** Source side: read a playlist off a platform. */
export interface SourceAdapter {
  readonly name: PlatformName;
  extractPlaylistId(url: string): string;
  listTracks(playlistId: string): Promise<SourcePlaylist>;
}

/** Catalog lookups used by the match resolver. */
export interface CatalogSearch {
  readonly name: PlatformName;
  search(title: string, artist: string, limit: number): Promise<CandidateTrack[]>;
  /** Field-scoped title + artist query; first hit in relevance order, or null. */
  searchExact?(ref: TrackRef): Promise<CandidateTrack | null>;
}

/** Destination side: create a playlist and fill it. */
export interface DestinationAdapter extends CatalogSearch {
  currentUserId(): Promise<string>;
  createPlaylist(ownerId: string, name: string): Promise<CreatedPlaylist>;
  appendTracks(playlistId: string, trackIds: string[]): Promise<void>;
}

/** Convenience union for classes that do both */
export type PlatformAdapter = SourceAdapter & DestinationAdapter;
