import type { NextFunction, Request, Response } from "express";
import type { AppConfig, RateLimitConfig } from "../config";
import { buildSafeRequestLogMetadata, type Logger } from "./logger";

export interface RateLimitWindow {
  count: number;
  resetAt: number;
}

export interface RateLimitStore {
  hit(key: string, windowStart: number, windowMs: number): RateLimitWindow;
}

export interface WriteRateLimitOptions {
  store: RateLimitStore;
  logger: Logger;
  windowMs?: number;
  now?: () => number;
}

const WINDOW_MS = 60_000;
const WRITE_METHODS = new Set(["POST", "PUT", "PATCH", "DELETE"]);

export function resolveRateLimitConfig(config: AppConfig): RateLimitConfig {
  return {
    enabled: config.rateLimit?.enabled ?? true,
    writePerMinute: config.rateLimit?.writePerMinute ?? 30
  };
}

// Signed-in writers share one bucket per account; anonymous writes fall back to the client address.
export function resolveWriterIdentity(req: Request): string {
  if (req.auth) {
    return `user:${req.auth.userId}`;
  }

  return `ip:${req.ips[0] ?? req.ip ?? "unknown"}`;
}

/**
 * Counts hits in fixed, clock-aligned windows. Buckets from finished windows
 * are dropped whenever a new window starts.
 */
export class InMemoryRateLimitStore implements RateLimitStore {
  private readonly buckets = new Map<string, number>();
  private currentWindowStart = Number.NEGATIVE_INFINITY;

  hit(key: string, windowStart: number, windowMs: number): RateLimitWindow {
    if (windowStart !== this.currentWindowStart) {
      this.buckets.clear();
      this.currentWindowStart = windowStart;
    }

    const count = (this.buckets.get(key) ?? 0) + 1;
    this.buckets.set(key, count);
    return { count, resetAt: windowStart + windowMs };
  }
}

export function createWriteRateLimit(config: AppConfig, options: WriteRateLimitOptions) {
  const { enabled, writePerMinute } = resolveRateLimitConfig(config);
  const windowMs = options.windowMs ?? WINDOW_MS;
  const now = options.now ?? (() => Date.now());

  return (req: Request, res: Response, next: NextFunction): void => {
    if (!enabled || writePerMinute <= 0 || !WRITE_METHODS.has(req.method)) {
      next();
      return;
    }

    const nowMs = now();
    const windowStart = nowMs - (nowMs % windowMs);
    const identity = resolveWriterIdentity(req);
    const window = options.store.hit(identity, windowStart, windowMs);
    const resetInSeconds = Math.max(1, Math.ceil((window.resetAt - nowMs) / 1000));

    res.setHeader("RateLimit-Limit", String(writePerMinute));
    res.setHeader("RateLimit-Remaining", String(Math.max(0, writePerMinute - window.count)));
    res.setHeader("RateLimit-Reset", String(resetInSeconds));

    if (window.count > writePerMinute) {
      options.logger.warn("blog_write_rate_limited", { ...buildSafeRequestLogMetadata(req), identity });
      res.setHeader("Retry-After", String(resetInSeconds));
      res.status(429).type("text/plain").send("Too many requests");
      return;
    }

    next();
  };
}
