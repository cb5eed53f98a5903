import { Request, Response, NextFunction } from 'express';

export interface RateLimitOptions {
  limit: number;
  windowMs: number;
  // Only these methods count; others pass through untouched
  methods?: string[];
  keyFor?: (req: Request) => string;
}

interface Window {
  count: number;
  resetAt: Date;
}

/**
 * Fixed-window limiter keyed by client address.
 */
export function createRateLimiter(options: RateLimitOptions) {
  const windows = new Map<string, Window>();
  const keyFor = options.keyFor ?? ((req: Request) => req.ip ?? req.socket.remoteAddress ?? 'unknown');

  return (req: Request, res: Response, next: NextFunction): void => {
    if (options.methods && !options.methods.includes(req.method)) {
      next();
      return;
    }

    const now = Date.now();
    for (const [key, window] of windows) {
      if (window.resetAt.getTime() <= now) windows.delete(key);
    }

    const key = keyFor(req);
    let window = windows.get(key);
    if (!window) {
      window = { count: 0, resetAt: new Date(now + options.windowMs) };
      windows.set(key, window);
    }
    window.count++;

    const remaining = Math.max(options.limit - window.count, 0);
    res.setHeader('X-RateLimit-Limit', options.limit.toString());
    res.setHeader('X-RateLimit-Remaining', remaining.toString());
    res.setHeader('X-RateLimit-Reset', window.resetAt.toISOString());

    if (window.count > options.limit) {
      res.status(429).json({
        error: 'Rate limit exceeded',
        kind: 'RateLimited',
        retryAfter: Math.ceil((window.resetAt.getTime() - now) / 1000),
      });
      return;
    }

    next();
  };
}
