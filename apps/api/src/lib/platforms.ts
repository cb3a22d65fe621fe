import { PLATFORM_NAMES, type MatchOracle, type PlatformAdapter, type PlatformName, type TokenSource } from '@tracklift/contracts';
import {
  MatchResolver,
  createGeminiOracle,
  resolveProviderConfig,
  silentLogger,
  type Logger,
  type ProviderRequestConfig,
} from '@tracklift/providers-core';
import { SpotifyAdapter, SpotifyClient, refreshingTokenSource, staticTokenSource } from '@tracklift/providers-spotify';
import { YouTubeAdapter, YouTubeClient } from '@tracklift/providers-youtube';

import type { Env } from '../config/env';
import { readFlags, type PlatformFlags } from '../config/flags';
import type { PlatformAdapters } from './transfer/orchestrator';

export interface PlatformServices {
  adapters: PlatformAdapters;
  resolver: MatchResolver;
  /** Platforms that have an adapter, in declaration order. */
  available: PlatformName[];
  oracleEnabled: boolean;
}

export interface PlatformServiceOptions {
  flags?: PlatformFlags;
  providerConfig?: Partial<ProviderRequestConfig>;
  logger?: Logger;
  /** Replaces the Gemini oracle. */
  oracle?: MatchOracle;
}

type PlatformSettings = Pick<
  Env,
  | 'SPOTIFY_ACCESS_TOKEN'
  | 'SPOTIFY_CLIENT_ID'
  | 'SPOTIFY_CLIENT_SECRET'
  | 'SPOTIFY_REFRESH_TOKEN'
  | 'YOUTUBE_API_KEY'
  | 'YOUTUBE_ACCESS_TOKEN'
  | 'GEMINI_API_KEY'
  | 'GEMINI_MODEL'
>;

function createSpotify(config: PlatformSettings, provider: ProviderRequestConfig): SpotifyAdapter | undefined {
  const { SPOTIFY_CLIENT_ID: clientId, SPOTIFY_CLIENT_SECRET: clientSecret, SPOTIFY_REFRESH_TOKEN: refreshToken } = config;

  let getToken: TokenSource;
  if (refreshToken && clientId && clientSecret) {
    getToken = refreshingTokenSource({ clientId, clientSecret, refreshToken, timeoutMs: provider.timeoutMs });
  } else if (config.SPOTIFY_ACCESS_TOKEN) {
    getToken = staticTokenSource(config.SPOTIFY_ACCESS_TOKEN);
  } else {
    return undefined;
  }

  const client = new SpotifyClient({ getToken, timeoutMs: provider.timeoutMs });
  return new SpotifyAdapter({ client, readTrackLimit: provider.readTrackLimit });
}

function createYouTube(config: PlatformSettings, provider: ProviderRequestConfig): YouTubeAdapter | undefined {
  const apiKey = config.YOUTUBE_API_KEY;
  const accessToken = config.YOUTUBE_ACCESS_TOKEN;
  if (!apiKey && !accessToken) {
    return undefined;
  }

  const client = new YouTubeClient({
    apiKey,
    getToken: accessToken ? async () => accessToken : undefined,
    timeoutMs: provider.timeoutMs,
  });
  return new YouTubeAdapter({ client, readTrackLimit: provider.readTrackLimit });
}

/**
 * Builds one adapter per enabled platform with credentials, and the match
 * resolver the orchestrator shares across transfers.
 */
export function createPlatformServices(config: PlatformSettings, options: PlatformServiceOptions = {}): PlatformServices {
  const flags = options.flags ?? readFlags();
  const provider = resolveProviderConfig(options.providerConfig);
  const logger = options.logger ?? silentLogger;

  const adapters: PlatformAdapters = {};
  const builders: Record<PlatformName, () => PlatformAdapter | undefined> = {
    spotify: () => createSpotify(config, provider),
    youtube: () => createYouTube(config, provider),
  };

  for (const name of PLATFORM_NAMES) {
    if (!flags[name]) {
      logger.info({ platform: name }, 'platform disabled by flag');
      continue;
    }
    const adapter = builders[name]();
    if (adapter) {
      adapters[name] = adapter;
    } else {
      logger.warn({ platform: name }, 'platform has no credentials; transfers involving it will fail');
    }
  }

  const oracle =
    options.oracle ??
    (config.GEMINI_API_KEY
      ? createGeminiOracle({ apiKey: config.GEMINI_API_KEY, model: config.GEMINI_MODEL, timeoutMs: provider.timeoutMs })
      : undefined);
  if (!oracle) {
    logger.info('no oracle configured; matching uses exact and fuzzy tiers only');
  }

  const resolver = new MatchResolver({
    oracle,
    fuzzyThreshold: provider.fuzzyThreshold,
    searchLimit: provider.searchLimit,
    logger: logger.child({ component: 'match-resolver' }),
  });

  return {
    adapters,
    resolver,
    available: PLATFORM_NAMES.filter((name) => adapters[name] !== undefined),
    oracleEnabled: oracle !== undefined,
  };
}
