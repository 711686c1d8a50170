/**
 * MT5 Websocket Feed
 *
 * Streams ticks and candles from the account's shared MT5 session client.
 * Every feed in the process goes through the same connection manager, so N
 * feeds on one account share one socket. stop() aborts the feed's controller;
 * the abort handler unregisters its listeners.
 */

import { LoggerFactory } from '../logging/logger';
import { ConnectorFactory } from '../connectors/factory';
import { ConfigurationError } from '../connectors/errors';
import { Mt5ApiClient, RawListener } from '../connectors/mt5/Mt5ApiClient';
import { Mt5ConnectionManager } from '../connectors/mt5/Mt5ConnectionManager';
import type { AccountRecord } from '../connectors/types';
import { AsyncEventQueue } from './AsyncEventQueue';
import { CandleEvent, CandleSource, FeedEvent, MarketDataFeed, toCandleEvent, toTickEvent } from './types';

const logger = LoggerFactory.getLogger('Mt5WebsocketFeed');

export interface Mt5WebsocketFeedDeps {
  factory: ConnectorFactory;
  manager: Mt5ConnectionManager;
  /** Warm-up fallback when the client is unavailable */
  fallback: CandleSource;
  maxQueue?: number;
}

export class Mt5WebsocketFeed implements MarketDataFeed {
  private queue: AsyncEventQueue<FeedEvent>;
  private client: Mt5ApiClient | null = null;
  private controller: AbortController | null = null;

  constructor(
    readonly account: AccountRecord,
    readonly symbol: string,
    readonly timeframe: string,
    private deps: Mt5WebsocketFeedDeps
  ) {
    this.queue = new AsyncEventQueue(deps.maxQueue ?? 1000);
  }

  async start(): Promise<void> {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;
    this.queue.reopen();

    const loaded = await this.deps.factory.loadCredentials(this.account);
    if (loaded.platform !== 'MT5') {
      this.controller = null;
      throw new ConfigurationError(`Account ${this.account.id} is not an MT5 account`, ['platform']);
    }
    const client = await this.deps.manager.getClient(loaded.credentials);
    if (controller.signal.aborted) return;
    this.client = client;

    const onPrice: RawListener = (payload) => {
      this.enqueue({ type: 'tick', data: toTickEvent(payload, this.symbol) });
    };
    const onCandle: RawListener = (payload) => {
      const candle = toCandleEvent(payload, this.symbol, this.timeframe);
      if (candle) this.enqueue({ type: 'candle', data: candle });
    };

    client.registerPriceListener(this.symbol, onPrice);
    client.registerCandleListener(this.symbol, this.timeframe, onCandle);

    controller.signal.addEventListener(
      'abort',
      () => {
        client.unregisterCandleListener(this.symbol, this.timeframe, onCandle);
        client.unregisterPriceListener(this.symbol, onPrice);
        logger.logAccount('info', `MT5 feed stopped for ${this.symbol}@${this.timeframe}`, this.account.id);
      },
      { once: true }
    );
    logger.logAccount('info', `✅ MT5 feed started for ${this.symbol}@${this.timeframe}`, this.account.id);
  }

  async stop(): Promise<void> {
    const controller = this.controller;
    this.controller = null;
    this.client = null;
    controller?.abort();
    this.queue.close();
  }

  async warmupCandles(count: number): Promise<CandleEvent[]> {
    if (this.client) {
      try {
        const raw = await this.client.getHistoricalCandles({ symbol: this.symbol, timeframe: this.timeframe, count });
        return raw.flatMap((candle) => toCandleEvent(candle, this.symbol, this.timeframe) ?? []);
      } catch (error) {
        logger.info('MT5 feed warm-up falling back to polling source', {
          accountId: this.account.id,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return this.deps.fallback.fetchCandles(this.account.id, this.symbol, this.timeframe, count);
  }

  getEvent(timeoutMs?: number): Promise<FeedEvent | null> {
    return this.queue.get(timeoutMs);
  }

  private enqueue(event: FeedEvent): void {
    if (!this.queue.put(event)) {
      logger.debug('Feed queue full, event dropped', { symbol: this.symbol, type: event.type });
    }
  }
}
