import type { PlatformName } from './constants';
import type { MatchTier } from './matcher';

export interface TransferRequest {
  readonly sourceUrl: string;
  readonly targetPlatform: PlatformName;
  /** Overrides the destination playlist name. */
  readonly playlistName?: string | null;
}

export interface TransferReport {
  total: number;
  resolved: number;
  unresolved: number;
  byTier: Record<MatchTier, number>;
}

export interface TransferResult {
  destinationPlaylistUrl: string;
  destinationPlaylistId: string;
  playlistName: string;
  sourcePlatform: PlatformName;
  targetPlatform: PlatformName;
  /** `"title - artist"` for every unresolved entry, in source order */
  missing: string[];
  report: TransferReport;
}

export type TransferState =
  | 'idle'
  | 'platform_detected'
  | 'source_read'
  | 'destination_created'
  | 'resolving'
  | 'destination_written'
  | 'done'
  | 'failed';

/** Destination naming: keep the source title, or always use a fixed name. */
export type PlaylistNamingMode = 'source' | 'fixed';
