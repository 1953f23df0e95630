/**
 * Sliding-window rate limiting per client key (the caller's address).
 * Hits are kept in process memory, or in Redis sorted sets when a Redis URL is given so that
 * several server instances share one window.
 *
 * Best effort: when not initialised, or when Redis fails, requests are allowed (fail open).
 */

import * as crypto from 'crypto';
import { createClient } from 'redis';

type RedisClient = ReturnType<typeof createClient>;

export interface RateLimitOptions {
  /** default 60 s */
  windowMs?: number;
  /** per window, default 10 */
  maxRequests?: number;
  /** use Redis instead of process memory */
  redisUrl?: string;
  /** key prefix in Redis */
  prefix?: string;
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  /** epoch ms at which the oldest hit in the window expires */
  resetAt: number;
}

interface LimiterState {
  windowMs: number;
  maxRequests: number;
  prefix: string;
  redis: RedisClient | null;
  /** in-memory hit times per key, oldest first */
  hits: Map<string, number[]>;
  /** when keys with no hits in the window were last dropped */
  lastSweep: number;
}

let limiter: LimiterState | null = null;

/**
 * Should be called once at server startup. Calling again replaces the previous limiter.
 */
export async function initRateLimiter(options: RateLimitOptions = {}): Promise<void> {
  await closeRateLimiter();
  let redis: RedisClient | null = null;
  if (options.redisUrl) {
    redis = createClient({ url: options.redisUrl });
    redis.on('error', (err) => {
      console.error('Redis Client Error:', err);
    });
    await redis.connect();
    console.log('Redis client connected');
  }
  limiter = {
    windowMs: options.windowMs ?? 60_000,
    maxRequests: options.maxRequests ?? 10,
    prefix: options.prefix ?? 'rate_limit:',
    redis,
    hits: new Map(),
    lastSweep: 0,
  };
}

/**
 * Should be called during graceful shutdown.
 */
export async function closeRateLimiter(): Promise<void> {
  const current = limiter;
  limiter = null;
  if (current?.redis) {
    await current.redis.quit();
    console.log('Redis client disconnected');
  }
}

/** Drop keys whose newest hit has left the window. Runs at most once per window. */
function sweepInMemory(state: LimiterState, now: number): void {
  if (now - state.lastSweep < state.windowMs) {
    return;
  }
  state.lastSweep = now;
  const windowStart = now - state.windowMs;
  for (const [key, times] of state.hits) {
    if (times.length === 0 || times[times.length - 1] <= windowStart) {
      state.hits.delete(key);
    }
  }
}

function checkInMemory(state: LimiterState, key: string, now: number): RateLimitResult {
  sweepInMemory(state, now);
  const windowStart = now - state.windowMs;
  const recent = (state.hits.get(key) ?? []).filter((t) => t > windowStart);
  if (recent.length >= state.maxRequests) {
    state.hits.set(key, recent);
    return { allowed: false, remaining: 0, resetAt: recent[0] + state.windowMs };
  }
  recent.push(now);
  state.hits.set(key, recent);
  return {
    allowed: true,
    remaining: state.maxRequests - recent.length,
    resetAt: recent[0] + state.windowMs,
  };
}

async function checkInRedis(state: LimiterState, redis: RedisClient, key: string, now: number): Promise<RateLimitResult> {
  const redisKey = state.prefix + key;
  await redis.zRemRangeByScore(redisKey, 0, now - state.windowMs);
  const count = await redis.zCard(redisKey);

  let resetAt = now + state.windowMs;
  if (count > 0) {
    const oldest = await redis.zRangeWithScores(redisKey, 0, 0);
    if (oldest.length > 0) {
      resetAt = oldest[0].score + state.windowMs;
    }
  }

  if (count >= state.maxRequests) {
    return { allowed: false, remaining: 0, resetAt };
  }
  await redis.zAdd(redisKey, { score: now, value: `${now}-${crypto.randomBytes(4).toString('hex')}` });
  await redis.pExpire(redisKey, state.windowMs * 2);
  return { allowed: true, remaining: state.maxRequests - count - 1, resetAt };
}

/**
 * Number of keys with hits held in process memory (0 when not initialised or using Redis).
 */
export function trackedKeyCount(): number {
  return limiter?.hits.size ?? 0;
}

/**
 * Count a request from `key` and say whether it is within the limit.
 * A rejected request is not counted.
 *
 * @returns null if rate limiting is unavailable (the request should be allowed)
 */
export async function checkRateLimit(key: string, now: number = Date.now()): Promise<RateLimitResult | null> {
  const state = limiter;
  if (!state) {
    return null;
  }
  if (!state.redis) {
    return checkInMemory(state, key, now);
  }
  try {
    return await checkInRedis(state, state.redis, key, now);
  } catch (error) {
    console.error('Error checking rate limit:', error);
    return null;
  }
}
