import {
  DEFAULT_PLAYLIST_TITLE,
  AppendFailedError,
  PlaylistCreationFailedError,
  PlaylistUnavailableError,
  TransferError,
  UNRESOLVED,
  errorMessage,
  isResolved,
  type CreatedPlaylist,
  type DestinationAdapter,
  type MatchDecision,
  type MatchTier,
  type PlatformAdapter,
  type PlatformName,
  type PlaylistNamingMode,
  type SourceAdapter,
  type SourcePlaylist,
  type TrackRef,
  type TransferReport,
  type TransferRequest,
  type TransferResult,
  type TransferState,
} from '@tracklift/contracts';
import { formatTrackRef, silentLogger, type Logger, type MatchResolver } from '@tracklift/providers-core';

import { PLATFORM_LABELS, detectPlatform } from './platform';

export type PlatformAdapters = Partial<Record<PlatformName, PlatformAdapter>>;

/** Counters the orchestrator reports into; the metrics plugin supplies one. */
export interface TransferMetrics {
  transferStarted(source: PlatformName, target: PlatformName): void;
  transferSucceeded(source: PlatformName, target: PlatformName, report: TransferReport): void;
  transferFailed(source: PlatformName | 'unknown', target: PlatformName, code: string): void;
}

export interface TransferOrchestratorOptions {
  adapters: PlatformAdapters;
  resolver: Pick<MatchResolver, 'resolveAgainst'>;
  /** @default 'source' */
  namingMode?: PlaylistNamingMode;
  /** Destination name in `fixed` mode. */
  fixedPlaylistName?: string;
  logger?: Logger;
  metrics?: TransferMetrics;
  onStateChange?: (state: TransferState, previous: TransferState) => void;
}

/**
 * Runs one playlist transfer end to end: detect the source platform, read the
 * source playlist, create the destination playlist, resolve every track in
 * order, then append the resolved ids in a single call.
 *
 * Setup failures abort the transfer. A track that cannot be resolved, for any
 * reason, only lands in `missing`.
 */
export class TransferOrchestrator {
  private readonly adapters: PlatformAdapters;
  private readonly resolver: Pick<MatchResolver, 'resolveAgainst'>;
  private readonly namingMode: PlaylistNamingMode;
  private readonly fixedPlaylistName: string;
  private readonly logger: Logger;
  private readonly metrics?: TransferMetrics;
  private readonly onStateChange?: (state: TransferState, previous: TransferState) => void;

  constructor(options: TransferOrchestratorOptions) {
    this.adapters = options.adapters;
    this.resolver = options.resolver;
    this.namingMode = options.namingMode ?? 'source';
    this.fixedPlaylistName = options.fixedPlaylistName ?? DEFAULT_PLAYLIST_TITLE;
    this.logger = options.logger ?? silentLogger;
    this.metrics = options.metrics;
    this.onStateChange = options.onStateChange;
  }

  async transfer(request: TransferRequest): Promise<TransferResult> {
    const target = request.targetPlatform;
    let state: TransferState = 'idle';
    let source: PlatformName | 'unknown' = 'unknown';

    const move = (next: TransferState) => {
      const previous = state;
      state = next;
      this.logger.debug({ from: previous, to: next, source, target }, 'transfer state changed');
      this.onStateChange?.(next, previous);
    };

    try {
      const detected = detectPlatform(request.sourceUrl);
      source = detected;
      const reader = this.sourceAdapter(detected);
      const writer = this.destinationAdapter(target);
      const playlistId = reader.extractPlaylistId(request.sourceUrl);
      move('platform_detected');
      this.metrics?.transferStarted(detected, target);

      const listing = await this.readSource(reader, playlistId);
      move('source_read');

      const playlistName = this.destinationName(request, listing);
      const created = await this.createDestination(writer, playlistName);
      move('destination_created');

      move('resolving');
      const trackIds: string[] = [];
      const missing: string[] = [];
      const byTier: Record<MatchTier, number> = { exact: 0, oracle: 0, fuzzy: 0 };

      for (const ref of listing.tracks) {
        const decision = await this.resolveTrack(ref, writer);
        if (isResolved(decision)) {
          trackIds.push(decision.platformId);
          byTier[decision.tier] += 1;
        } else {
          missing.push(formatTrackRef(ref));
        }
      }

      if (trackIds.length > 0) {
        await this.appendResolved(writer, created.id, trackIds);
      }
      move('destination_written');

      const report: TransferReport = {
        total: listing.tracks.length,
        resolved: trackIds.length,
        unresolved: missing.length,
        byTier,
      };
      this.logger.info({ source: detected, target, playlistId: created.id, ...report }, 'transfer complete');
      this.metrics?.transferSucceeded(detected, target, report);
      move('done');

      return {
        destinationPlaylistUrl: created.publicUrl,
        destinationPlaylistId: created.id,
        playlistName,
        sourcePlatform: detected,
        targetPlatform: target,
        missing,
        report,
      };
    } catch (error) {
      const code = error instanceof TransferError ? error.code : 'internal';
      this.logger.warn({ source, target, code, err: errorMessage(error) }, 'transfer failed');
      this.metrics?.transferFailed(source, target, code);
      move('failed');
      throw error;
    }
  }

  private sourceAdapter(platform: PlatformName): SourceAdapter {
    const adapter = this.adapters[platform];
    if (!adapter) {
      throw new PlaylistUnavailableError(platform, `${PLATFORM_LABELS[platform]} is not configured on this server`);
    }
    return adapter;
  }

  private destinationAdapter(platform: PlatformName): DestinationAdapter {
    const adapter = this.adapters[platform];
    if (!adapter) {
      throw new PlaylistCreationFailedError(platform, `${PLATFORM_LABELS[platform]} is not configured on this server`);
    }
    return adapter;
  }

  private async readSource(adapter: SourceAdapter, playlistId: string): Promise<SourcePlaylist> {
    try {
      return await adapter.listTracks(playlistId);
    } catch (error) {
      if (error instanceof TransferError) throw error;
      throw new PlaylistUnavailableError(
        adapter.name,
        `Could not read the ${PLATFORM_LABELS[adapter.name]} playlist: ${errorMessage(error)}`,
        error,
      );
    }
  }

  private destinationName(request: TransferRequest, listing: SourcePlaylist): string {
    const override = request.playlistName?.trim();
    if (override) return override;
    if (this.namingMode === 'fixed') return this.fixedPlaylistName;
    return listing.title.trim() || DEFAULT_PLAYLIST_TITLE;
  }

  private async createDestination(adapter: DestinationAdapter, name: string): Promise<CreatedPlaylist> {
    try {
      const ownerId = await adapter.currentUserId();
      return await adapter.createPlaylist(ownerId, name);
    } catch (error) {
      if (error instanceof TransferError) throw error;
      throw new PlaylistCreationFailedError(
        adapter.name,
        `Could not create the ${PLATFORM_LABELS[adapter.name]} playlist: ${errorMessage(error)}`,
        error,
      );
    }
  }

  private async resolveTrack(ref: TrackRef, catalog: DestinationAdapter): Promise<MatchDecision> {
    try {
      return await this.resolver.resolveAgainst(ref, catalog);
    } catch (error) {
      this.logger.warn({ track: formatTrackRef(ref), err: errorMessage(error) }, 'track resolution failed; leaving it unresolved');
      return UNRESOLVED;
    }
  }

  private async appendResolved(adapter: DestinationAdapter, playlistId: string, trackIds: string[]): Promise<void> {
    try {
      await adapter.appendTracks(playlistId, trackIds);
    } catch (error) {
      if (error instanceof TransferError) throw error;
      throw new AppendFailedError(
        adapter.name,
        `Could not add ${trackIds.length} matched tracks to the ${PLATFORM_LABELS[adapter.name]} playlist: ${errorMessage(error)}`,
        { cause: error, matched: trackIds.length, playlistId },
      );
    }
  }
}
