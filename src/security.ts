import type { IncomingMessage } from 'node:http';

export interface RateLimitOptions {
  windowMs: number;
  max: number;
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  retryAfterMs: number;
}

interface RateLimitBucket {
  count: number;
  resetAt: number;
}

function normalizeRateLimitWindow(value: number, fallback: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return Math.max(1000, Math.floor(value));
}

function normalizePositiveCount(value: number, fallback: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return Math.max(1, Math.floor(value));
}

/** Fixed-window request counter keyed by client address. */
export class MemoryRateLimiter {
  private readonly windowMs: number;
  private readonly max: number;
  private readonly buckets = new Map<string, RateLimitBucket>();
  private lastSweep = 0;

  constructor(options: RateLimitOptions) {
    this.windowMs = normalizeRateLimitWindow(options.windowMs, 60_000);
    this.max = normalizePositiveCount(options.max, 100);
  }

  hit(key: string): RateLimitResult {
    const now = Date.now();
    this.sweep(now);

    const normalizedKey = key || 'unknown';
    const existing = this.buckets.get(normalizedKey);
    const bucket: RateLimitBucket =
      existing && existing.resetAt > now ? existing : { count: 0, resetAt: now + this.windowMs };

    bucket.count += 1;
    this.buckets.set(normalizedKey, bucket);
    return {
      allowed: bucket.count <= this.max,
      remaining: Math.max(0, this.max - bucket.count),
      retryAfterMs: Math.max(0, bucket.resetAt - now)
    };
  }

  private sweep(now: number): void {
    if (now - this.lastSweep < 60_000) {
      return;
    }
    this.lastSweep = now;
    for (const [key, bucket] of this.buckets.entries()) {
      if (bucket.resetAt <= now) {
        this.buckets.delete(key);
      }
    }
  }
}

export interface LoginLockoutOptions {
  maxFailures: number;
  lockMs: number;
  now?: () => number;
}

export interface LoginFailureResult {
  failures: number;
  locked: boolean;
  lockedUntil: number;
}

interface LockoutBucket {
  failures: number;
  lockUntil: number;
}

/**
 * Per-account failed login counter. Reaching `maxFailures` locks the account
 * for `lockMs`; once the lock lapses the counter starts over.
 */
export class LoginLockout {
  private readonly maxFailures: number;
  private readonly lockMs: number;
  private readonly now: () => number;
  private readonly buckets = new Map<string, LockoutBucket>();

  constructor(options: LoginLockoutOptions) {
    this.maxFailures = normalizePositiveCount(options.maxFailures, 5);
    this.lockMs = normalizeRateLimitWindow(options.lockMs, 15 * 60_000);
    this.now = options.now ?? Date.now;
  }

  isLocked(username: string): boolean {
    const bucket = this.buckets.get(username);
    if (!bucket || bucket.lockUntil === 0) {
      return false;
    }
    if (bucket.lockUntil > this.now()) {
      return true;
    }
    this.buckets.delete(username);
    return false;
  }

  recordFailure(username: string): LoginFailureResult {
    const now = this.now();
    const existing = this.buckets.get(username);
    const bucket: LockoutBucket =
      existing && (existing.lockUntil === 0 || existing.lockUntil > now) ? existing : { failures: 0, lockUntil: 0 };

    bucket.failures += 1;
    if (bucket.failures >= this.maxFailures && bucket.lockUntil === 0) {
      bucket.lockUntil = now + this.lockMs;
    }
    this.buckets.set(username, bucket);
    return {
      failures: bucket.failures,
      locked: bucket.lockUntil > now,
      lockedUntil: bucket.lockUntil
    };
  }

  reset(username: string): void {
    this.buckets.delete(username);
  }
}

export function getClientIp(req: IncomingMessage): string {
  const forwardedFor = req.headers['x-forwarded-for'];
  if (typeof forwardedFor === 'string' && forwardedFor.trim().length > 0) {
    const first = forwardedFor.split(',')[0]?.trim();
    if (first) {
      return first;
    }
  }
  if (Array.isArray(forwardedFor) && forwardedFor.length > 0) {
    const first = forwardedFor[0]?.trim();
    if (first) {
      return first;
    }
  }
  return req.socket.remoteAddress || 'unknown';
}
