/**
 * Event de-duplication
 * Set-once-with-TTL keyed by event id. markIfNew() returns true exactly once
 * per id within the TTL; release() forgets an id so a redelivery is processed.
 */

import type Redis from 'ioredis';

export interface DedupeStore {
  markIfNew(eventId: string): Promise<boolean>;
  release(eventId: string): Promise<void>;
}

export const dedupeKey = (eventId: string) => `events:processed:${eventId}`;

export class RedisDedupeStore implements DedupeStore {
  constructor(
    private redis: Redis,
    private ttlSec: number
  ) {}

  async markIfNew(eventId: string): Promise<boolean> {
    const result = await this.redis.set(dedupeKey(eventId), '1', 'EX', this.ttlSec, 'NX');
    return result === 'OK';
  }

  async release(eventId: string): Promise<void> {
    await this.redis.del(dedupeKey(eventId));
  }
}

export class MemoryDedupeStore implements DedupeStore {
  private expiries: Map<string, number> = new Map();

  constructor(
    private ttlSec: number,
    private now: () => number = Date.now
  ) {}

  async markIfNew(eventId: string): Promise<boolean> {
    const key = dedupeKey(eventId);
    const current = this.now();
    const expiry = this.expiries.get(key);
    if (expiry !== undefined && expiry > current) {
      return false;
    }
    this.expiries.set(key, current + this.ttlSec * 1000);
    this.sweep(current);
    return true;
  }

  async release(eventId: string): Promise<void> {
    this.expiries.delete(dedupeKey(eventId));
  }

  get size(): number {
    return this.expiries.size;
  }

  private sweep(current: number): void {
    if (this.expiries.size < 10_000) return;
    for (const [key, expiry] of this.expiries) {
      if (expiry <= current) this.expiries.delete(key);
    }
  }
}
