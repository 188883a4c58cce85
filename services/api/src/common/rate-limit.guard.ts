import {
  Injectable,
  CanActivate,
  ExecutionContext,
  HttpException,
  HttpStatus,
  SetMetadata,
  Logger,
  OnModuleInit,
  OnModuleDestroy,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { Request } from 'express';
import { RedisService } from '../redis/redis.service';

/** Rate limit metadata key */
export const RATE_LIMIT_KEY = 'rateLimit';

/** Rate limit configuration */
export interface RateLimitConfig {
  /** Maximum requests allowed in the window */
  limit: number;
  /** Time window in milliseconds */
  windowMs: number;
  /** Optional: separate key prefix for different rate limit buckets */
  prefix?: string;
}

/** Decorator to set rate limit on a route */
export const RateLimit = (config: RateLimitConfig) =>
  SetMetadata(RATE_LIMIT_KEY, config);

/** In-memory rate limit store (fallback) */
interface RateLimitEntry {
  count: number;
  resetAt: number;
}

@Injectable()
export class RateLimitGuard implements CanActivate, OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RateLimitGuard.name);
  private readonly memoryStore = new Map<string, RateLimitEntry>();
  private readonly cleanupTimer: NodeJS.Timeout;
  private useRedis = false;

  constructor(
    private readonly reflector: Reflector,
    private readonly redis: RedisService,
  ) {
    // Clean up expired memory entries every minute (fallback)
    this.cleanupTimer = setInterval(() => this.cleanupMemory(), 60000);
    this.cleanupTimer.unref();
  }

  async onModuleInit(): Promise<void> {
    try {
      await this.redis.ping();
      this.useRedis = true;
      this.logger.log('Rate limiter using Redis store');
    } catch (error) {
      this.logger.warn(`Redis unavailable - falling back to in-memory rate limiting: ${String(error)}`);
      this.useRedis = false;
    }
  }

  onModuleDestroy(): void {
    clearInterval(this.cleanupTimer);
  }

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const config = this.reflector.get<RateLimitConfig | undefined>(
      RATE_LIMIT_KEY,
      context.getHandler(),
    );

    // If no rate limit configured, allow
    if (!config) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    const key = this.getKey(request, config.prefix);

    if (!this.useRedis) {
      return this.checkMemoryLimit(key, config);
    }

    let count: number;
    try {
      count = await this.incrementWindow(key, config);
    } catch (error) {
      // On Redis error, fall back to memory store
      this.logger.error('Redis rate limit check failed, using memory fallback:', error);
      return this.checkMemoryLimit(key, config);
    }

    if (count > config.limit) {
      const now = Date.now();
      const windowStart = Math.floor(now / config.windowMs) * config.windowMs;
      this.reject(Math.ceil((windowStart + config.windowMs - now) / 1000));
    }

    return true;
  }

  private async incrementWindow(key: string, config: RateLimitConfig): Promise<number> {
    const windowKey = `ratelimit:${key}:${Math.floor(Date.now() / config.windowMs)}`;

    // Atomic increment with TTL
    const count = await this.redis.incr(windowKey);

    // Set expiry on first request in window
    if (count === 1) {
      // Set TTL slightly longer than window to avoid edge cases
      await this.redis.expire(windowKey, Math.ceil(config.windowMs / 1000) + 1);
    }

    return count;
  }

  private checkMemoryLimit(key: string, config: RateLimitConfig): boolean {
    const now = Date.now();
    let entry = this.memoryStore.get(key);

    // Create new entry if doesn't exist or window expired
    if (!entry || now > entry.resetAt) {
      entry = {
        count: 0,
        resetAt: now + config.windowMs,
      };
      this.memoryStore.set(key, entry);
    }

    entry.count++;

    if (entry.count > config.limit) {
      this.reject(Math.ceil((entry.resetAt - now) / 1000));
    }

    return true;
  }

  private reject(retryAfter: number): never {
    throw new HttpException(
      {
        statusCode: HttpStatus.TOO_MANY_REQUESTS,
        message: 'Too many requests. Please try again later.',
        retryAfter,
      },
      HttpStatus.TOO_MANY_REQUESTS,
    );
  }

  private getKey(request: Request, prefix?: string): string {
    const ip = request.ip ?? request.socket.remoteAddress ?? 'unknown';
    const path = request.path || request.url;
    const keyPrefix = prefix || 'default';

    return `${keyPrefix}:ip:${ip}:${path}`;
  }

  private cleanupMemory(): void {
    const now = Date.now();
    for (const [key, entry] of this.memoryStore.entries()) {
      if (now > entry.resetAt) {
        this.memoryStore.delete(key);
      }
    }
  }
}
