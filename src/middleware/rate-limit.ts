import type { Request, Response, NextFunction } from 'express';

export interface RateLimitCounter {
  count: number;
  windowStart: number;
}

export interface RateLimitOptions {
  windowMs: number;
  max: number;
  /** Defaults to client IP plus path. */
  keyOf?: (req: Request) => string;
  now?: () => number;
  counters?: Map<string, RateLimitCounter>;
}

/** Fixed-window limiter. Each limiter keeps its own counters unless `counters` is passed in. */
export const createRateLimiter = (options: RateLimitOptions) => {
  const { windowMs, max } = options;
  const keyOf = options.keyOf ?? ((req: Request) => `${req.ip}:${req.path}`);
  const now = options.now ?? Date.now;
  const counters = options.counters ?? new Map<string, RateLimitCounter>();
  let lastSweep = now();

  // Drops finished windows at most once per window.
  const sweep = (current: number) => {
    if (current - lastSweep < windowMs) {
      return;
    }
    lastSweep = current;
    for (const [key, counter] of counters) {
      if (current - counter.windowStart >= windowMs) {
        counters.delete(key);
      }
    }
  };

  return (req: Request, res: Response, next: NextFunction) => {
    const key = keyOf(req);
    const current = now();
    sweep(current);
    const existing = counters.get(key);
    if (!existing || current - existing.windowStart >= windowMs) {
      counters.set(key, { count: 1, windowStart: current });
      next();
      return;
    }
    if (existing.count >= max) {
      const retryAfterSeconds = Math.ceil((existing.windowStart + windowMs - current) / 1000);
      res.setHeader('Retry-After', String(retryAfterSeconds));
      res.status(429).json({ error: 'RATE_LIMITED' });
      return;
    }
    existing.count += 1;
    next();
  };
};
