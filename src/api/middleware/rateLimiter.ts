// API layer: Rate Limiter
// Fixed window request limits per client address

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { httpLogger } from '@/utils/logger.js';
import { sendError } from './errorHandler.js';

export interface RateLimitConfig {
  name: string;                  // Prefix for the store key
  windowMs: number;              // Time window in milliseconds
  maxAttempts: number;           // Max requests per window
}

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  resetAt: number;
  retryAfterSeconds: number;
}

const CLEANUP_INTERVAL_MS = 60 * 60 * 1000; // 1 hour

/**
 * In-memory fixed window counter. One instance per app, so separate apps
 * (and separate tests) never share counts.
 */
export class RateLimiter {
  private readonly store = new Map<string, RateLimitEntry>();
  private cleanupTimer: NodeJS.Timeout | null = null;

  constructor(private readonly nowMs: () => number = () => Date.now()) {}

  /**
   * Count one request against `key` and report whether it may proceed
   */
  hit(key: string, config: Pick<RateLimitConfig, 'windowMs' | 'maxAttempts'>): RateLimitDecision {
    const now = this.nowMs();
    let entry = this.store.get(key);

    if (!entry || now >= entry.resetAt) {
      entry = { count: 0, resetAt: now + config.windowMs };
      this.store.set(key, entry);
    }
    entry.count++;

    return {
      allowed: entry.count <= config.maxAttempts,
      limit: config.maxAttempts,
      remaining: Math.max(0, config.maxAttempts - entry.count),
      resetAt: entry.resetAt,
      retryAfterSeconds: Math.max(1, Math.ceil((entry.resetAt - now) / 1000)),
    };
  }

  /**
   * Drop windows that have ended
   */
  cleanup(): number {
    const now = this.nowMs();
    let cleaned = 0;

    for (const [key, entry] of this.store.entries()) {
      if (entry.resetAt <= now) {
        this.store.delete(key);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      httpLogger.debug('Cleaned up expired rate limit entries', { count: cleaned });
    }
    return cleaned;
  }

  /**
   * Periodic cleanup. The timer is unref'd so it never keeps the process alive.
   */
  startAutomaticCleanup(intervalMs: number = CLEANUP_INTERVAL_MS): void {
    if (this.cleanupTimer) {
      return;
    }
    this.cleanupTimer = setInterval(() => this.cleanup(), intervalMs);
    this.cleanupTimer.unref();
  }

  stopAutomaticCleanup(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  size(): number {
    return this.store.size;
  }
}

export function clientKey(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

/**
 * Create rate limiting middleware
 */
export function createRateLimitMiddleware(limiter: RateLimiter, config: RateLimitConfig): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const address = clientKey(req);
    const decision = limiter.hit(`${config.name}:${address}`, config);

    res.setHeader('X-RateLimit-Limit', decision.limit);
    res.setHeader('X-RateLimit-Remaining', decision.remaining);
    res.setHeader('X-RateLimit-Reset', Math.ceil(decision.resetAt / 1000));

    if (!decision.allowed) {
      httpLogger.warn('Rate limit exceeded', { limit: config.name, ip: address });
      res.setHeader('Retry-After', decision.retryAfterSeconds);
      sendError(res, 429, 'Too many requests. Please try again later.', 'RATE_LIMITED');
      return;
    }

    next();
  };
}

/**
 * Predefined rate limit configurations
 */
export const RateLimitPresets = {
  signup: { name: 'signup', windowMs: 60 * 60 * 1000, maxAttempts: 3 },
  verifyEmail: { name: 'verify-email', windowMs: 60 * 60 * 1000, maxAttempts: 10 },
  login: { name: 'login', windowMs: 60 * 1000, maxAttempts: 5 },
  resendVerification: { name: 'resend-verification', windowMs: 60 * 60 * 1000, maxAttempts: 3 },
} as const satisfies Record<string, RateLimitConfig>;

export type RateLimitPresetName = keyof typeof RateLimitPresets;
