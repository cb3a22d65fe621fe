import type Redis from 'ioredis';

import { errorMessage } from '@tracklift/contracts';
import { withTimeout } from '@tracklift/providers-core';

import { checkRedisHealth } from '../redis/client';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export type HealthCheck = {
  status: HealthStatus;
  message: string;
  response_time_ms: number;
};

export type HealthReport = {
  status: HealthStatus;
  timestamp: string;
  uptime_seconds: number;
  checks: Record<'redis' | 'spotify' | 'youtube' | 'oracle', HealthCheck>;
};

type HealthProbeDeps = {
  redis?: Pick<Redis, 'ping'> | null;
  youtubeApiKey?: string;
  geminiApiKey?: string;
  timeoutMs?: number;
  now?: () => number;
  startedAt?: number;
};

const SPOTIFY_PROBE_URL = 'https://api.spotify.com/v1/search?q=test&type=track&limit=1';
const YOUTUBE_PROBE_URL = 'https://www.googleapis.com/youtube/v3/search';
const GEMINI_PROBE_URL = 'https://generativelanguage.googleapis.com/v1beta/models';

/**
 * On-demand connectivity check of every upstream the service talks to. It never
 * runs a transfer; each check is a single read with a bounded timeout.
 */
export class HealthProbe {
  private readonly redis: Pick<Redis, 'ping'> | null;
  private readonly youtubeApiKey?: string;
  private readonly geminiApiKey?: string;
  private readonly timeoutMs: number;
  private readonly now: () => number;
  private readonly startedAt: number;

  constructor(deps: HealthProbeDeps = {}) {
    this.redis = deps.redis ?? null;
    this.youtubeApiKey = deps.youtubeApiKey;
    this.geminiApiKey = deps.geminiApiKey;
    this.timeoutMs = deps.timeoutMs ?? 5000;
    this.now = deps.now ?? Date.now;
    this.startedAt = deps.startedAt ?? this.now();
  }

  async run(): Promise<HealthReport> {
    const [redis, spotify, youtube, oracle] = await Promise.all([
      this.checkRedis(),
      this.checkHttp('Spotify API', SPOTIFY_PROBE_URL, [200, 401]),
      this.youtubeApiKey
        ? this.checkHttp('YouTube API', withKey(YOUTUBE_PROBE_URL, this.youtubeApiKey, { part: 'snippet', q: 'test', maxResults: '1' }))
        : notConfigured('YouTube API key not configured'),
      this.geminiApiKey
        ? this.checkHttp('Gemini API', withKey(GEMINI_PROBE_URL, this.geminiApiKey))
        : notConfigured('Gemini API key not configured; matching skips the oracle tier'),
    ]);

    const checks = { redis, spotify, youtube, oracle };
    return {
      status: overallStatus(Object.values(checks)),
      timestamp: new Date(this.now()).toISOString(),
      uptime_seconds: Math.floor((this.now() - this.startedAt) / 1000),
      checks,
    };
  }

  private async checkRedis(): Promise<HealthCheck> {
    if (!this.redis) {
      return notConfigured('Redis not configured; rate limiting runs in memory');
    }

    const started = this.now();
    try {
      const ok = await withTimeout(checkRedisHealth(this.redis), this.timeoutMs, 'redis ping');
      return {
        status: ok ? 'healthy' : 'unhealthy',
        message: ok ? 'Redis connection successful' : 'Redis ping returned an unexpected reply',
        response_time_ms: this.now() - started,
      };
    } catch (error) {
      return { status: 'unhealthy', message: `Redis connection failed: ${errorMessage(error)}`, response_time_ms: 0 };
    }
  }

  private async checkHttp(label: string, url: string, healthyStatuses: number[] = [200]): Promise<HealthCheck> {
    const started = this.now();
    try {
      const response = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
      const elapsed = this.now() - started;
      if (healthyStatuses.includes(response.status)) {
        return { status: 'healthy', message: `${label} accessible`, response_time_ms: elapsed };
      }
      return { status: 'unhealthy', message: `${label} returned status ${response.status}`, response_time_ms: elapsed };
    } catch (error) {
      return { status: 'unhealthy', message: `${label} check failed: ${errorMessage(error)}`, response_time_ms: 0 };
    }
  }
}

function withKey(base: string, key: string, params: Record<string, string> = {}): string {
  const url = new URL(base);
  for (const [name, value] of Object.entries(params)) {
    url.searchParams.set(name, value);
  }
  url.searchParams.set('key', key);
  return url.toString();
}

async function notConfigured(message: string): Promise<HealthCheck> {
  return { status: 'degraded', message, response_time_ms: 0 };
}

export function overallStatus(checks: HealthCheck[]): HealthStatus {
  if (checks.some((check) => check.status === 'unhealthy')) return 'unhealthy';
  if (checks.some((check) => check.status === 'degraded')) return 'degraded';
  return 'healthy';
}
