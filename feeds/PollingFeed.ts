/**
 * Polling Feed
 * Fallback for any platform: every interval fetches the last two candles and
 * enqueues the newest one when its timestamp advanced.
 */

import { LoggerFactory } from '../logging/logger';
import { AsyncEventQueue } from './AsyncEventQueue';
import { CandleEvent, CandleSource, FeedEvent, MarketDataFeed } from './types';

const logger = LoggerFactory.getLogger('PollingFeed');

export interface PollingFeedOptions {
  intervalMs?: number;
  maxQueue?: number;
}

export class PollingFeed implements MarketDataFeed {
  private queue: AsyncEventQueue<FeedEvent>;
  private intervalMs: number;
  private timer: NodeJS.Timeout | null = null;
  private polling = false;
  private lastTs: number | null = null;

  constructor(
    readonly accountId: string,
    readonly symbol: string,
    readonly timeframe: string,
    private source: CandleSource,
    options: PollingFeedOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? 5000;
    this.queue = new AsyncEventQueue(options.maxQueue ?? 100);
  }

  async start(): Promise<void> {
    if (this.timer) return;
    this.queue.reopen();
    logger.logAccount('info', `Polling feed started for ${this.symbol}@${this.timeframe}`, this.accountId, {
      intervalMs: this.intervalMs,
    });
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.tick();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.queue.close();
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  warmupCandles(count: number): Promise<CandleEvent[]> {
    return this.source.fetchCandles(this.accountId, this.symbol, this.timeframe, count);
  }

  getEvent(timeoutMs?: number): Promise<FeedEvent | null> {
    return this.queue.get(timeoutMs);
  }

  /**
   * One poll cycle; returns true when a new candle was enqueued
   */
  async pollOnce(): Promise<boolean> {
    if (this.polling) return false;
    this.polling = true;
    try {
      const candles = await this.source.fetchCandles(this.accountId, this.symbol, this.timeframe, 2);
      const last = candles[candles.length - 1];
      if (!last) return false;
      if (this.lastTs !== null && last.time <= this.lastTs) return false;
      this.lastTs = last.time;
      if (!this.queue.put({ type: 'candle', data: { ...last, timeframe: this.timeframe } })) {
        logger.debug('Feed queue full, candle dropped', { symbol: this.symbol, time: last.time });
      }
      return true;
    } finally {
      this.polling = false;
    }
  }

  private tick(): void {
    this.pollOnce().catch((error: unknown) => {
      logger.warn('Polling feed cycle failed', {
        accountId: this.accountId,
        symbol: this.symbol,
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }
}
