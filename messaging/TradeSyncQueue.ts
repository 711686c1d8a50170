/**
 * Trade synchronisation queue
 * Account-wide sync jobs for the worker that recomputes trades from the broker.
 */

import type Redis from 'ioredis';

export interface TradeSyncJob {
  accountId: string;
  reason: string;
  eventId: string;
  enqueuedAt: string;
}

export interface TradeSyncQueue {
  enqueue(job: TradeSyncJob): Promise<void>;
}

export const TRADE_SYNC_QUEUE_KEY = 'queue:trade_sync';

export class RedisTradeSyncQueue implements TradeSyncQueue {
  constructor(
    private redis: Redis,
    private key = TRADE_SYNC_QUEUE_KEY
  ) {}

  async enqueue(job: TradeSyncJob): Promise<void> {
    await this.redis.lpush(this.key, JSON.stringify(job));
  }
}

/** Keeps the most recent `limit` jobs; nothing drains them */
export class MemoryTradeSyncQueue implements TradeSyncQueue {
  readonly jobs: TradeSyncJob[] = [];

  constructor(readonly limit = 1000) {}

  async enqueue(job: TradeSyncJob): Promise<void> {
    this.jobs.push(job);
    if (this.jobs.length > this.limit) this.jobs.shift();
  }
}
