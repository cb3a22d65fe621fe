import type Redis from 'ioredis';

import type { MatchOracle, PlatformName } from '@tracklift/contracts';
import { createLogger, type Logger } from '@tracklift/providers-core';

import type { Env } from '../config/env';
import { readFlags, type PlatformFlags } from '../config/flags';
import { HealthProbe } from './health/probe';
import { createMetrics, type AppMetrics } from './metrics';
import { createPlatformServices } from './platforms';
import { RateGovernor } from './rate-governor/governor';
import { RedisWindowStore } from './rate-governor/store';
import { createRedisClient } from './redis/client';
import { TransferOrchestrator } from './transfer/orchestrator';

export type PlatformStatus = {
  flags: PlatformFlags;
  available: PlatformName[];
  oracleEnabled: boolean;
};

/** Everything the routes reach through `app.services`. */
export interface AppServices {
  governor: RateGovernor;
  transfers: Pick<TransferOrchestrator, 'transfer'>;
  health: Pick<HealthProbe, 'run'>;
  platforms: PlatformStatus;
  metrics?: AppMetrics;
}

export type ServiceOptions = {
  /** `null` runs without a durable store even when REDIS_URL is set. */
  redis?: Redis | null;
  flags?: PlatformFlags;
  logger?: Logger;
  oracle?: MatchOracle;
};

/**
 * Constructs the long-lived service handles once per process. Credentials and
 * clients are read-only afterwards and shared by concurrent transfers.
 */
export function createAppServices(
  config: Env,
  options: ServiceOptions = {},
): { services: AppServices; redis: Redis | null; logger: Logger } {
  const logger = options.logger ?? createLogger('tracklift', config.LOG_LEVEL);
  const metrics = config.ENABLE_METRICS ? createMetrics() : undefined;
  const flags = options.flags ?? readFlags();

  let redis: Redis | null = null;
  if (options.redis !== undefined) {
    redis = options.redis;
  } else if (config.REDIS_URL) {
    // queue commands until the first connect so the startup ping does not race it
    redis = createRedisClient({
      url: config.REDIS_URL,
      enableOfflineQueue: true,
      logger: logger.child({ component: 'redis' }),
    });
  }

  const durable = redis;
  const governor = new RateGovernor({
    store: durable ? new RedisWindowStore(durable) : null,
    ping: durable ? () => durable.ping() : undefined,
    maxRequests: config.RATE_LIMIT_REQUESTS,
    windowMinutes: config.RATE_LIMIT_WINDOW_MINUTES,
    logger: logger.child({ component: 'rate-governor' }),
    onAdmission: metrics ? (admission) => metrics.rateLimitDecision(admission) : undefined,
  });

  const platformServices = createPlatformServices(config, { flags, logger, oracle: options.oracle });

  const transfers = new TransferOrchestrator({
    adapters: platformServices.adapters,
    resolver: platformServices.resolver,
    namingMode: config.PLAYLIST_NAMING_MODE,
    fixedPlaylistName: config.FIXED_PLAYLIST_NAME,
    logger: logger.child({ component: 'transfer' }),
    metrics,
  });

  const health = new HealthProbe({
    redis,
    youtubeApiKey: config.YOUTUBE_API_KEY,
    geminiApiKey: config.GEMINI_API_KEY,
  });

  return {
    services: {
      governor,
      transfers,
      health,
      platforms: {
        flags,
        available: platformServices.available,
        oracleEnabled: platformServices.oracleEnabled,
      },
      metrics,
    },
    redis,
    logger,
  };
}
