/**
 * Redis Service - Wrapper around Redis client for dependency injection
 */
import { Injectable, Inject, Logger } from '@nestjs/common';
import { REDIS_CLIENT, type RedisClient } from './redis.constants';

/**
 * RedisService provides a typed wrapper around the Redis client
 * for use in services that need Redis access.
 */
@Injectable()
export class RedisService {
  private readonly logger = new Logger(RedisService.name);

  constructor(
    @Inject(REDIS_CLIENT)
    private readonly client: RedisClient
  ) {}

  /**
   * Check if Redis is connected
   */
  isConnected(): boolean {
    return this.client.isOpen;
  }

  async ping(): Promise<string> {
    return this.client.ping();
  }

  // ==================== String Operations ====================

  /**
   * Get a string value by key
   */
  async get(key: string): Promise<string | null> {
    try {
      return await this.client.get(key);
    } catch (error) {
      this.logger.error(`Redis GET error for key ${key}:`, error);
      throw error;
    }
  }

  /**
   * Set a string value with optional expiry
   */
  async set(key: string, value: string, expirySeconds?: number): Promise<void> {
    try {
      if (expirySeconds) {
        await this.client.set(key, value, { EX: expirySeconds });
      } else {
        await this.client.set(key, value);
      }
    } catch (error) {
      this.logger.error(`Redis SET error for key ${key}:`, error);
      throw error;
    }
  }

  /**
   * Delete one or more keys
   */
  async del(...keys: string[]): Promise<number> {
    if (keys.length === 0) {
      return 0;
    }
    try {
      return await this.client.del(keys);
    } catch (error) {
      this.logger.error(`Redis DEL error for keys ${keys.join(', ')}:`, error);
      throw error;
    }
  }

  /**
   * Set key expiry in seconds
   */
  async expire(key: string, seconds: number): Promise<boolean> {
    try {
      return await this.client.expire(key, seconds);
    } catch (error) {
      this.logger.error(`Redis EXPIRE error for key ${key}:`, error);
      throw error;
    }
  }

  // ==================== Utility Operations ====================

  /**
   * Increment a key's value
   */
  async incr(key: string): Promise<number> {
    try {
      return await this.client.incr(key);
    } catch (error) {
      this.logger.error(`Redis INCR error for key ${key}:`, error);
      throw error;
    }
  }

  /**
   * Scan for keys matching a pattern
   */
  async scan(
    cursor: number,
    pattern: string,
    count?: number
  ): Promise<{ cursor: number; keys: string[] }> {
    try {
      const options: { MATCH: string; COUNT?: number } = { MATCH: pattern };
      if (count) {
        options.COUNT = count;
      }
      const result = await this.client.scan(cursor, options);
      return {
        cursor: result.cursor,
        keys: result.keys,
      };
    } catch (error) {
      this.logger.error(`Redis SCAN error:`, error);
      throw error;
    }
  }

  /**
   * Delete every key starting with `prefix`
   */
  async deleteByPrefix(prefix: string): Promise<number> {
    let cursor = 0;
    let deleted = 0;
    do {
      const page = await this.scan(cursor, `${prefix}*`, 100);
      deleted += await this.del(...page.keys);
      cursor = page.cursor;
    } while (cursor !== 0);
    return deleted;
  }
}
