import { errorMessage } from '@tracklift/contracts';
import { silentLogger, type Logger } from '@tracklift/providers-core';

import { InMemoryWindowStore, type RateWindowStore, type WindowDecision } from './store';

export type AdmissionMode = 'normal' | 'degraded' | 'fail_open';

export type Admission =
  | { allowed: true; mode: AdmissionMode; reason: string; remaining: number }
  | { allowed: false; reason: string; retryAfterMs: number; remaining: 0 };

export type RateLimitInfo = {
  currentRequests: number;
  maxRequests: number;
  remaining: number;
  windowMinutes: number;
  /** epoch ms at which the oldest live request leaves the window */
  resetAt: number;
};

export interface RateGovernorOptions {
  /** Durable store; omit to run on the in-memory window only. */
  store?: RateWindowStore | null;
  /** Replaceable for tests. */
  fallback?: RateWindowStore;
  /** Health check run once by {@link RateGovernor.start}. */
  ping?: () => Promise<unknown>;
  maxRequests?: number;
  windowMinutes?: number;
  /** How long to stay on the fallback before trying the durable store again. */
  recoveryMs?: number;
  now?: () => number;
  logger?: Logger;
  onAdmission?: (admission: Admission) => void;
}

export const DEFAULT_MAX_REQUESTS = 3;
export const DEFAULT_WINDOW_MINUTES = 60;
const DEFAULT_RECOVERY_MS = 30_000;

const MINUTE_MS = 60_000;

/**
 * Sliding-window admission gate in front of transfers.
 *
 * Runs on the durable store while it answers, falls back to the process-local
 * window when it does not, and admits with `mode: 'fail_open'` when even the
 * fallback throws.
 */
export class RateGovernor {
  private readonly store: RateWindowStore | null;
  private readonly fallback: RateWindowStore;
  private readonly ping?: () => Promise<unknown>;
  private readonly maxRequests: number;
  private readonly windowMinutes: number;
  private readonly recoveryMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly onAdmission?: (admission: Admission) => void;

  /** Set while the durable store is considered down. */
  private degradedSince: number | null = null;

  constructor(options: RateGovernorOptions = {}) {
    this.store = options.store ?? null;
    this.fallback = options.fallback ?? new InMemoryWindowStore();
    this.ping = options.ping;
    this.maxRequests = options.maxRequests ?? DEFAULT_MAX_REQUESTS;
    this.windowMinutes = options.windowMinutes ?? DEFAULT_WINDOW_MINUTES;
    this.recoveryMs = options.recoveryMs ?? DEFAULT_RECOVERY_MS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
    this.onAdmission = options.onAdmission;

    if (!this.store) {
      this.logger.warn('no durable rate-limit store configured; using the in-memory window');
    }
  }

  /** Checks the durable store once; an unreachable store starts the governor degraded. */
  async start(): Promise<void> {
    if (!this.store || !this.ping) return;
    try {
      await this.ping();
      this.logger.info({ store: this.store.kind }, 'rate governor using durable store');
    } catch (error) {
      this.degrade(error, 'durable rate-limit store unreachable at startup; using the in-memory window');
    }
  }

  get mode(): Exclude<AdmissionMode, 'fail_open'> {
    return this.activeStore() === this.store ? 'normal' : 'degraded';
  }

  async admit(userId: string, maxRequests = this.maxRequests, windowMinutes = this.windowMinutes): Promise<Admission> {
    const admission = await this.check(userId, maxRequests, windowMinutes);
    this.onAdmission?.(admission);
    return admission;
  }

  async info(userId: string): Promise<RateLimitInfo> {
    const now = this.now();
    const windowMs = this.windowMinutes * MINUTE_MS;
    const empty: RateLimitInfo = {
      currentRequests: 0,
      maxRequests: this.maxRequests,
      remaining: this.maxRequests,
      windowMinutes: this.windowMinutes,
      resetAt: now + windowMs,
    };

    try {
      const snapshot = await this.activeStore().peek(userId, now, windowMs);
      return {
        ...empty,
        currentRequests: snapshot.count,
        remaining: Math.max(0, this.maxRequests - snapshot.count),
        resetAt: snapshot.oldest === null ? empty.resetAt : snapshot.oldest + windowMs,
      };
    } catch (error) {
      this.logger.error({ userId, err: errorMessage(error) }, 'failed to read rate limit info');
      return empty;
    }
  }

  private async check(userId: string, maxRequests: number, windowMinutes: number): Promise<Admission> {
    const now = this.now();
    const windowMs = windowMinutes * MINUTE_MS;

    const store = this.activeStore();
    if (store === this.store) {
      try {
        const decision = await store.checkAndRecord(userId, now, windowMs, maxRequests);
        if (this.degradedSince !== null) {
          this.degradedSince = null;
          this.logger.info('durable rate-limit store recovered');
        }
        return this.toAdmission(decision, 'normal', now, windowMs, maxRequests, windowMinutes);
      } catch (error) {
        this.degrade(error, 'durable rate-limit store failed; using the in-memory window');
      }
    }

    try {
      const decision = await this.fallback.checkAndRecord(userId, now, windowMs, maxRequests);
      return this.toAdmission(decision, 'degraded', now, windowMs, maxRequests, windowMinutes);
    } catch (error) {
      this.logger.error({ userId, err: errorMessage(error) }, 'in-memory rate limiting failed; admitting request');
      return { allowed: true, mode: 'fail_open', reason: 'OK (fail-open)', remaining: maxRequests };
    }
  }

  /** The durable store unless it is down and the recovery delay has not passed. */
  private activeStore(): RateWindowStore {
    if (!this.store) return this.fallback;
    if (this.degradedSince === null) return this.store;
    return this.now() - this.degradedSince >= this.recoveryMs ? this.store : this.fallback;
  }

  private degrade(error: unknown, message: string): void {
    if (this.degradedSince === null) {
      this.logger.warn({ err: errorMessage(error) }, message);
    }
    this.degradedSince = this.now();
  }

  private toAdmission(
    decision: WindowDecision,
    mode: 'normal' | 'degraded',
    now: number,
    windowMs: number,
    maxRequests: number,
    windowMinutes: number,
  ): Admission {
    if (decision.allowed) {
      return {
        allowed: true,
        mode,
        reason: mode === 'normal' ? 'OK' : 'OK (degraded)',
        remaining: Math.max(0, maxRequests - decision.count),
      };
    }

    const oldest = decision.oldest ?? now;
    return {
      allowed: false,
      reason: `Rate limit exceeded. Max ${maxRequests} requests per ${windowMinutes} minutes.`,
      retryAfterMs: Math.max(0, oldest + windowMs - now),
      remaining: 0,
    };
  }
}
