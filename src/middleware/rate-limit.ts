import type { FastifyReply, FastifyRequest } from 'fastify';
import { errorResponse } from '../errors.js';
import { callerId } from './auth.js';

interface TokenBucket {
  tokens: number;
  lastRefill: number;
}

export interface RateLimitOptions {
  enabled: boolean;
  burst: number;
  sustainedPerMin: number; // tokens per minute
}

export class RateLimiter {
  private buckets = new Map<string, TokenBucket>();

  constructor(
    private options: Pick<RateLimitOptions, 'burst' | 'sustainedPerMin'>,
    private now: () => number = Date.now
  ) {}

  private getBucket(key: string): TokenBucket {
    const now = this.now();
    let bucket = this.buckets.get(key);

    if (!bucket) {
      bucket = { tokens: this.options.burst, lastRefill: now };
      this.buckets.set(key, bucket);
    }

    // Refill tokens based on time passed
    const minutesPassed = (now - bucket.lastRefill) / 60000;
    const tokensToAdd = Math.floor(minutesPassed * this.options.sustainedPerMin);

    if (tokensToAdd > 0) {
      bucket.tokens = Math.min(this.options.burst, bucket.tokens + tokensToAdd);
      bucket.lastRefill = now;
    }

    return bucket;
  }

  tryConsume(key: string): { allowed: boolean; retryAfter?: number; remaining: number } {
    const bucket = this.getBucket(key);

    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return { allowed: true, remaining: bucket.tokens };
    }

    // Seconds until the next token
    const retryAfter = Math.ceil(60 / this.options.sustainedPerMin);

    return { allowed: false, retryAfter, remaining: 0 };
  }
}

/** Token bucket per caller (falling back to client IP) for job submission. */
export function createRateLimit(options: RateLimitOptions) {
  const limiter = new RateLimiter(options);

  return async (request: FastifyRequest, reply: FastifyReply) => {
    if (!options.enabled) return;

    const user = callerId(request);
    const key = user ? `user:${user}` : `ip:${request.ip}`;
    const result = limiter.tryConsume(key);

    reply.header('X-RateLimit-Limit', String(options.burst));
    reply.header('X-RateLimit-Remaining', String(result.remaining));

    if (!result.allowed) {
      const retryAfter = result.retryAfter ?? 1;
      reply.header('Retry-After', String(retryAfter));
      return reply.code(429).send({ ...errorResponse('RATE_LIMIT_EXCEEDED'), retryAfter });
    }
  };
}
