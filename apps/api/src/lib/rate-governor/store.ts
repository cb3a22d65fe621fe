/**
 * Sliding-window storage backends for the rate governor
 */
import type Redis from 'ioredis';
import { nanoid } from 'nanoid';

export type WindowSnapshot = {
  /** live entries in the window */
  count: number;
  /** timestamp of the oldest live entry */
  oldest: number | null;
};

export type WindowDecision = WindowSnapshot & {
  allowed: boolean;
};

/**
 * One user's window of admission timestamps. `checkAndRecord` prunes entries at
 * or before `now - windowMs`, then records `now` only when fewer than `limit`
 * remain. It must be atomic per key.
 */
export interface RateWindowStore {
  readonly kind: 'redis' | 'memory';
  checkAndRecord(key: string, now: number, windowMs: number, limit: number): Promise<WindowDecision>;
  peek(key: string, now: number, windowMs: number): Promise<WindowSnapshot>;
}

const CHECK_AND_RECORD = `
local key = KEYS[1]
local now = tonumber(ARGV[1])
local window = tonumber(ARGV[2])
local limit = tonumber(ARGV[3])
redis.call('ZREMRANGEBYSCORE', key, '-inf', now - window)
local count = redis.call('ZCARD', key)
local allowed = 0
if count < limit then
  redis.call('ZADD', key, now, ARGV[4])
  redis.call('PEXPIRE', key, window)
  count = count + 1
  allowed = 1
end
local oldest = redis.call('ZRANGE', key, 0, 0, 'WITHSCORES')
local oldestScore = -1
if oldest[2] then
  oldestScore = tonumber(oldest[2])
end
return { allowed, count, oldestScore }
`;

const toNumber = (value: unknown): number => {
  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`unexpected rate window reply: ${String(value)}`);
  }
  return parsed;
};

/**
 * Redis sorted set per user (`ratelimit:{userId}`), scored and keyed by admission
 * time. Check-and-record runs as one Lua script so concurrent API instances see a
 * linearizable window.
 */
export class RedisWindowStore implements RateWindowStore {
  readonly kind = 'redis' as const;

  constructor(
    private readonly client: Pick<Redis, 'eval' | 'zrangebyscore'>,
    private readonly keyPrefix: string = 'ratelimit:',
  ) {}

  private getFullKey(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  async checkAndRecord(key: string, now: number, windowMs: number, limit: number): Promise<WindowDecision> {
    const reply = await this.client.eval(
      CHECK_AND_RECORD,
      1,
      this.getFullKey(key),
      String(now),
      String(windowMs),
      String(limit),
      `${now}-${nanoid(8)}`,
    );

    if (!Array.isArray(reply) || reply.length < 3) {
      throw new Error('unexpected rate window reply');
    }

    const oldest = toNumber(reply[2]);
    return {
      allowed: toNumber(reply[0]) === 1,
      count: toNumber(reply[1]),
      oldest: oldest < 0 ? null : oldest,
    };
  }

  async peek(key: string, now: number, windowMs: number): Promise<WindowSnapshot> {
    const entries = await this.client.zrangebyscore(this.getFullKey(key), `(${now - windowMs}`, '+inf', 'WITHSCORES');
    const firstScore = entries[1];
    return {
      count: Math.floor(entries.length / 2),
      oldest: firstScore === undefined ? null : toNumber(firstScore),
    };
  }
}

/**
 * Process-local window, used while the durable store is missing or failing.
 * Checks for one user run one after another on a promise chain.
 */
export class InMemoryWindowStore implements RateWindowStore {
  readonly kind = 'memory' as const;

  private windows = new Map<string, number[]>();
  private chains = new Map<string, Promise<void>>();

  private prune(key: string, now: number, windowMs: number): number[] {
    const cutoff = now - windowMs;
    const live = (this.windows.get(key) ?? []).filter((timestamp) => timestamp > cutoff);
    this.windows.set(key, live);
    return live;
  }

  private serialize<T>(key: string, task: () => T): Promise<T> {
    const previous = this.chains.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.chains.set(key, tail);
    void tail.then(() => {
      if (this.chains.get(key) === tail) {
        this.chains.delete(key);
      }
    });
    return result;
  }

  checkAndRecord(key: string, now: number, windowMs: number, limit: number): Promise<WindowDecision> {
    return this.serialize(key, () => {
      const live = this.prune(key, now, windowMs);
      const allowed = live.length < limit;
      if (allowed) {
        live.push(now);
      }
      return { allowed, count: live.length, oldest: live[0] ?? null };
    });
  }

  peek(key: string, now: number, windowMs: number): Promise<WindowSnapshot> {
    return this.serialize(key, () => {
      const cutoff = now - windowMs;
      const live = (this.windows.get(key) ?? []).filter((timestamp) => timestamp > cutoff);
      return { count: live.length, oldest: live[0] ?? null };
    });
  }
}
