import pino from 'pino';
import { describe, it, expect, vi } from 'vitest';

import {
  AppendFailedError,
  InvalidUrlError,
  PlaylistCreationFailedError,
  PlaylistUnavailableError,
  SearchUnavailableError,
  UNRESOLVED,
  type MatchDecision,
  type MatchOracle,
  type PlatformAdapter,
  type PlatformName,
  type TrackRef,
  type TransferState,
} from '@tracklift/contracts';
import { MatchResolver, toTrackRef } from '@tracklift/providers-core';

import { TransferOrchestrator, type TransferMetrics } from '../orchestrator';

const YOUTUBE_URL = 'https://music.youtube.com/playlist?list=PL-road-trip';
const SPOTIFY_URL = 'https://open.spotify.com/playlist/37i9dQZF1DX0XUsuxWHRQd';

function fakeAdapter(name: PlatformName) {
  return {
    name,
    extractPlaylistId: vi.fn<PlatformAdapter['extractPlaylistId']>(() => 'src-1'),
    listTracks: vi.fn<PlatformAdapter['listTracks']>(async () => ({ title: 'Road Trip', tracks: [] })),
    search: vi.fn<PlatformAdapter['search']>(async () => []),
    searchExact: vi.fn<NonNullable<PlatformAdapter['searchExact']>>(async () => null),
    currentUserId: vi.fn<PlatformAdapter['currentUserId']>(async () => 'user-1'),
    createPlaylist: vi.fn<PlatformAdapter['createPlaylist']>(async (_owner, playlistName) => ({
      id: 'pl-new',
      publicUrl: `https://example.test/${name}/${encodeURIComponent(playlistName)}`,
    })),
    appendTracks: vi.fn<PlatformAdapter['appendTracks']>(async () => undefined),
  } satisfies PlatformAdapter;
}

type FakeAdapter = ReturnType<typeof fakeAdapter>;

/** A resolver stand-in that answers from a table keyed by track title. */
function scriptedResolver(answers: Record<string, MatchDecision | Error>) {
  return {
    resolveAgainst: vi.fn(async (ref: TrackRef): Promise<MatchDecision> => {
      const answer: MatchDecision | Error = answers[ref.title] ?? UNRESOLVED;
      if (answer instanceof Error) throw answer;
      return answer;
    }),
  };
}

const exact = (platformId: string): MatchDecision => ({
  status: 'resolved',
  platformId,
  tier: 'exact',
  candidate: { displayTitle: platformId, displayArtist: '', platformId },
});

function setup(options: { resolver?: { resolveAgainst: MatchResolver['resolveAgainst'] } } = {}) {
  const youtube = fakeAdapter('youtube');
  const spotify = fakeAdapter('spotify');
  const states: TransferState[] = [];
  const orchestrator = new TransferOrchestrator({
    adapters: { youtube, spotify },
    resolver: options.resolver ?? new MatchResolver(),
    onStateChange: (state) => states.push(state),
  });
  return { youtube, spotify, states, orchestrator };
}

function allCalls(adapter: FakeAdapter): number {
  return [
    adapter.extractPlaylistId,
    adapter.listTracks,
    adapter.search,
    adapter.searchExact,
    adapter.currentUserId,
    adapter.createPlaylist,
    adapter.appendTracks,
  ].reduce((sum, fn) => sum + fn.mock.calls.length, 0);
}

describe('TransferOrchestrator.transfer', () => {
  it('appends exact hits and reports tracks no tier could place', async () => {
    const oracle = vi.fn<MatchOracle>(async () => 'NONE');
    const youtube = fakeAdapter('youtube');
    const spotify = fakeAdapter('spotify');
    youtube.listTracks.mockResolvedValue({
      title: 'Road Trip',
      tracks: [toTrackRef('Song A (Live)', 'Artist X'), toTrackRef('Song B', 'Artist Y')],
    });
    spotify.searchExact.mockImplementation(async (ref) =>
      ref.title === 'Song A'
        ? { displayTitle: 'Song A', displayArtist: 'Artist X', platformId: 'spotify:track:song-a' }
        : null,
    );
    spotify.search.mockResolvedValue([
      { displayTitle: 'Completely Different', displayArtist: 'Someone', platformId: 'spotify:track:other' },
    ]);

    const orchestrator = new TransferOrchestrator({
      adapters: { youtube, spotify },
      resolver: new MatchResolver({ oracle }),
    });

    const result = await orchestrator.transfer({ sourceUrl: YOUTUBE_URL, targetPlatform: 'spotify' });

    expect(spotify.appendTracks).toHaveBeenCalledTimes(1);
    expect(spotify.appendTracks).toHaveBeenCalledWith('pl-new', ['spotify:track:song-a']);
    expect(result.missing).toEqual(['Song B - Artist Y']);
    expect(result.report).toEqual({
      total: 2,
      resolved: 1,
      unresolved: 1,
      byTier: { exact: 1, oracle: 0, fuzzy: 0 },
    });
    expect(spotify.search).toHaveBeenCalledTimes(1);
    expect(spotify.search).toHaveBeenCalledWith('Song B', 'Artist Y', 5);
    expect(oracle).toHaveBeenCalledWith('Song B Artist Y', ['Completely Different Someone']);
  });

  it('rejects an unrecognized host before any network call', async () => {
    const { youtube, spotify, orchestrator, states } = setup();

    const attempt = orchestrator.transfer({ sourceUrl: 'https://example.com/list?id=1', targetPlatform: 'spotify' });

    await expect(attempt).rejects.toBeInstanceOf(InvalidUrlError);
    await expect(attempt).rejects.toMatchObject({ code: 'unsupported_url', status: 400 });
    expect(allCalls(youtube) + allCalls(spotify)).toBe(0);
    expect(states).toEqual(['failed']);
  });

  it('rejects a non-http scheme', async () => {
    const { orchestrator } = setup();

    await expect(
      orchestrator.transfer({ sourceUrl: 'ftp://open.spotify.com/playlist/abc', targetPlatform: 'youtube' }),
    ).rejects.toMatchObject({ code: 'invalid_url', message: 'Playlist URL must use http or https, got ftp' });
  });

  it('searches nothing when the destination playlist cannot be created', async () => {
    const { youtube, spotify, orchestrator, states } = setup();
    youtube.listTracks.mockResolvedValue({ title: 'Road Trip', tracks: [toTrackRef('Song A', 'Artist X')] });
    spotify.createPlaylist.mockRejectedValue(new Error('503 Service Unavailable'));

    const attempt = orchestrator.transfer({ sourceUrl: YOUTUBE_URL, targetPlatform: 'spotify' });

    await expect(attempt).rejects.toBeInstanceOf(PlaylistCreationFailedError);
    await expect(attempt).rejects.toMatchObject({
      message: 'Could not create the Spotify playlist: 503 Service Unavailable',
    });
    expect(spotify.searchExact).not.toHaveBeenCalled();
    expect(spotify.search).not.toHaveBeenCalled();
    expect(spotify.appendTracks).not.toHaveBeenCalled();
    expect(states).toEqual(['platform_detected', 'source_read', 'failed']);
  });

  it('passes adapter creation errors through unchanged', async () => {
    const { spotify, youtube, orchestrator } = setup();
    const refusal = new PlaylistCreationFailedError('youtube', 'YouTube playlist creation needs an OAuth access token');
    youtube.createPlaylist.mockRejectedValue(refusal);

    await expect(orchestrator.transfer({ sourceUrl: SPOTIFY_URL, targetPlatform: 'youtube' })).rejects.toBe(refusal);
    expect(spotify.listTracks).toHaveBeenCalledWith('src-1');
  });

  it('fails with PlaylistUnavailable when the source cannot be read', async () => {
    const { youtube, spotify, orchestrator } = setup();
    youtube.listTracks.mockRejectedValue(new Error('socket hang up'));

    const attempt = orchestrator.transfer({ sourceUrl: YOUTUBE_URL, targetPlatform: 'spotify' });

    await expect(attempt).rejects.toBeInstanceOf(PlaylistUnavailableError);
    await expect(attempt).rejects.toMatchObject({
      code: 'playlist_unavailable',
      message: 'Could not read the YouTube playlist: socket hang up',
    });
    expect(spotify.createPlaylist).not.toHaveBeenCalled();
  });

  it('fails before reading when the destination platform is not configured', async () => {
    const youtube = fakeAdapter('youtube');
    const orchestrator = new TransferOrchestrator({ adapters: { youtube }, resolver: new MatchResolver() });

    await expect(orchestrator.transfer({ sourceUrl: YOUTUBE_URL, targetPlatform: 'spotify' })).rejects.toMatchObject({
      code: 'playlist_creation_failed',
      message: 'Spotify is not configured on this server',
    });
    expect(youtube.listTracks).not.toHaveBeenCalled();
  });

  it('keeps source order and accounts for every track', async () => {
    const resolver = scriptedResolver({
      One: exact('id-1'),
      Three: exact('id-3'),
      Four: { status: 'resolved', platformId: 'id-4', tier: 'fuzzy', candidate: { displayTitle: 'Four', displayArtist: 'D', platformId: 'id-4' } },
    });
    const { youtube, spotify, orchestrator } = setup({ resolver });
    const tracks = ['One', 'Two', 'Three', 'Four', 'Five'].map((title, index) => toTrackRef(title, `Artist ${index + 1}`));
    youtube.listTracks.mockResolvedValue({ title: 'Mix', tracks });

    const result = await orchestrator.transfer({ sourceUrl: YOUTUBE_URL, targetPlatform: 'spotify' });

    const appended = spotify.appendTracks.mock.calls[0]?.[1] ?? [];
    expect(appended).toEqual(['id-1', 'id-3', 'id-4']);
    expect(result.missing).toEqual(['Two - Artist 2', 'Five - Artist 5']);
    expect(appended.length + result.missing.length).toBe(tracks.length);
    expect(resolver.resolveAgainst.mock.calls.map(([ref]) => ref.title)).toEqual(['One', 'Two', 'Three', 'Four', 'Five']);
    expect(result.report.byTier).toEqual({ exact: 2, oracle: 0, fuzzy: 1 });
  });

  it('turns a failed search into a missing track and carries on', async () => {
    const logger = pino({ level: 'silent' });
    const warn = vi.spyOn(logger, 'warn');
    const resolver = scriptedResolver({
      One: new SearchUnavailableError('spotify', 'Spotify search failed: timed out'),
      Two: exact('id-2'),
    });
    const youtube = fakeAdapter('youtube');
    const spotify = fakeAdapter('spotify');
    youtube.listTracks.mockResolvedValue({
      title: 'Mix',
      tracks: [toTrackRef('One', 'A'), toTrackRef('Two', 'B')],
    });
    const orchestrator = new TransferOrchestrator({ adapters: { youtube, spotify }, resolver, logger });

    const result = await orchestrator.transfer({ sourceUrl: YOUTUBE_URL, targetPlatform: 'spotify' });

    expect(result.missing).toEqual(['One - A']);
    expect(spotify.appendTracks).toHaveBeenCalledWith('pl-new', ['id-2']);
    expect(warn).toHaveBeenCalledWith(
      { track: 'One - A', err: 'Spotify search failed: timed out' },
      'track resolution failed; leaving it unresolved',
    );
  });

  it('skips the append call when nothing resolved', async () => {
    const { youtube, spotify, orchestrator, states } = setup({ resolver: scriptedResolver({}) });
    youtube.listTracks.mockResolvedValue({ title: 'Mix', tracks: [toTrackRef('One', 'A')] });

    const result = await orchestrator.transfer({ sourceUrl: YOUTUBE_URL, targetPlatform: 'spotify' });

    expect(spotify.appendTracks).not.toHaveBeenCalled();
    expect(result.missing).toEqual(['One - A']);
    expect(states).toEqual([
      'platform_detected',
      'source_read',
      'destination_created',
      'resolving',
      'destination_written',
      'done',
    ]);
  });

  it('reports a failed append distinctly, with the matches it lost', async () => {
    const { youtube, spotify, orchestrator } = setup({ resolver: scriptedResolver({ One: exact('id-1') }) });
    youtube.listTracks.mockResolvedValue({ title: 'Mix', tracks: [toTrackRef('One', 'A')] });
    spotify.appendTracks.mockRejectedValue(new Error('quota exceeded'));

    const attempt = orchestrator.transfer({ sourceUrl: YOUTUBE_URL, targetPlatform: 'spotify' });

    await expect(attempt).rejects.toBeInstanceOf(AppendFailedError);
    await expect(attempt).rejects.toMatchObject({
      code: 'append_failed',
      message: 'Could not add 1 matched tracks to the Spotify playlist: quota exceeded',
      details: { platform: 'spotify', matched: 1, playlist_id: 'pl-new' },
    });
  });

  describe('destination naming', () => {
    it('uses the source title by default', async () => {
      const { youtube, spotify, orchestrator } = setup();
      youtube.listTracks.mockResolvedValue({ title: 'Road Trip', tracks: [] });

      const result = await orchestrator.transfer({ sourceUrl: YOUTUBE_URL, targetPlatform: 'spotify' });

      expect(spotify.createPlaylist).toHaveBeenCalledWith('user-1', 'Road Trip');
      expect(result.playlistName).toBe('Road Trip');
      expect(result.destinationPlaylistUrl).toBe('https://example.test/spotify/Road%20Trip');
    });

    it('uses the fixed name in fixed mode', async () => {
      const youtube = fakeAdapter('youtube');
      const spotify = fakeAdapter('spotify');
      const orchestrator = new TransferOrchestrator({
        adapters: { youtube, spotify },
        resolver: new MatchResolver(),
        namingMode: 'fixed',
        fixedPlaylistName: 'From YouTube',
      });

      await orchestrator.transfer({ sourceUrl: YOUTUBE_URL, targetPlatform: 'spotify' });

      expect(spotify.createPlaylist).toHaveBeenCalledWith('user-1', 'From YouTube');
    });

    it('prefers a name given with the request', async () => {
      const { spotify, orchestrator } = setup();

      await orchestrator.transfer({ sourceUrl: YOUTUBE_URL, targetPlatform: 'spotify', playlistName: '  Summer  ' });

      expect(spotify.createPlaylist).toHaveBeenCalledWith('user-1', 'Summer');
    });

    it('falls back to the default title when the source has none', async () => {
      const { youtube, spotify, orchestrator } = setup();
      youtube.listTracks.mockResolvedValue({ title: '   ', tracks: [] });

      await orchestrator.transfer({ sourceUrl: YOUTUBE_URL, targetPlatform: 'spotify' });

      expect(spotify.createPlaylist).toHaveBeenCalledWith('user-1', 'Imported Playlist');
    });
  });

  it('reports outcomes to the metrics sink', async () => {
    const metrics: TransferMetrics = {
      transferStarted: vi.fn(),
      transferSucceeded: vi.fn(),
      transferFailed: vi.fn(),
    };
    const youtube = fakeAdapter('youtube');
    const spotify = fakeAdapter('spotify');
    const orchestrator = new TransferOrchestrator({
      adapters: { youtube, spotify },
      resolver: new MatchResolver(),
      metrics,
    });

    await orchestrator.transfer({ sourceUrl: SPOTIFY_URL, targetPlatform: 'youtube' });
    await expect(
      orchestrator.transfer({ sourceUrl: 'https://example.com/x', targetPlatform: 'youtube' }),
    ).rejects.toThrow();

    expect(metrics.transferStarted).toHaveBeenCalledWith('spotify', 'youtube');
    expect(metrics.transferSucceeded).toHaveBeenCalledWith('spotify', 'youtube', {
      total: 0,
      resolved: 0,
      unresolved: 0,
      byTier: { exact: 0, oracle: 0, fuzzy: 0 },
    });
    expect(metrics.transferFailed).toHaveBeenCalledWith('unknown', 'youtube', 'unsupported_url');
  });
});
