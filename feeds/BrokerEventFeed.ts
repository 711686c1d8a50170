/**
 * Broker Event Feed
 *
 * Reads the same account topics as the fan-out bridge from a private,
 * auto-deleted queue on the events exchange. For MT5 accounts it also holds a
 * headless subscription through the orchestrator so the gateway keeps polling
 * the symbol while no dashboard socket is open.
 */

import type { ConsumeMessage } from 'amqplib';
import { LoggerFactory } from '../logging/logger';
import { ConnectorFactory } from '../connectors/factory';
import { HeadlessSubscriptionOrchestrator } from '../connectors/mt5/HeadlessOrchestrator';
import { asRecord, toStr } from '../connectors/normalize';
import type { AccountRecord, Mt5Credentials } from '../connectors/types';
import { AmqpChannel, AmqpConnect, AmqpConnection } from '../messaging/amqp';
import { parseEnvelope, ParsedEvent } from '../messaging/envelope';
import { AsyncEventQueue } from './AsyncEventQueue';
import { CandleEvent, CandleSource, FeedEvent, MarketDataFeed, toCandleEvent, toTickEvent } from './types';

const logger = LoggerFactory.getLogger('BrokerEventFeed');

export interface BrokerEventFeedDeps {
  url: string;
  exchange: string;
  connect: AmqpConnect;
  factory: ConnectorFactory;
  orchestrator: HeadlessSubscriptionOrchestrator;
  source: CandleSource;
  maxQueue?: number;
}

export class BrokerEventFeed implements MarketDataFeed {
  private queue: AsyncEventQueue<FeedEvent>;
  private connection: AmqpConnection | null = null;
  private channel: AmqpChannel | null = null;
  private consumerTag: string | null = null;
  private headless: { credentials: Mt5Credentials; candles: boolean } | null = null;
  readonly symbol: string;

  constructor(
    readonly account: AccountRecord,
    symbol: string,
    readonly timeframe: string,
    private deps: BrokerEventFeedDeps
  ) {
    this.symbol = symbol.toUpperCase();
    this.queue = new AsyncEventQueue(deps.maxQueue ?? 1000);
  }

  /**
   * Bind a private queue and, for MT5, take the headless subscriptions.
   * A failure part-way releases whatever was already acquired.
   */
  async start(): Promise<void> {
    if (this.channel) return;
    this.queue.reopen();
    const loaded = await this.deps.factory.loadCredentials(this.account);
    const patterns = [`account.${this.account.id}.#`];
    if (loaded.platform === 'MT5') {
      patterns.push(`account.${loaded.credentials.login}.#`);
    }

    try {
      const connection = await this.deps.connect(this.deps.url);
      connection.on('error', (error) => {
        logger.error('AMQP feed connection error', error, { accountId: this.account.id });
      });
      this.connection = connection;

      const channel = await connection.createChannel();
      this.channel = channel;
      await channel.assertExchange(this.deps.exchange, 'topic', { durable: true });
      const { queue } = await channel.assertQueue('', { exclusive: true, autoDelete: true });
      for (const pattern of patterns) {
        await channel.bindQueue(queue, this.deps.exchange, pattern);
      }
      const reply = await channel.consume(queue, (msg) => this.onMessage(msg), { noAck: true });
      this.consumerTag = reply.consumerTag;

      if (loaded.platform === 'MT5') {
        await this.deps.orchestrator.subscribePrice(loaded.credentials, this.symbol);
        const headless = { credentials: loaded.credentials, candles: false };
        this.headless = headless;
        await this.deps.orchestrator.subscribeCandles(loaded.credentials, this.symbol, this.timeframe);
        headless.candles = true;
      }
      logger.logAccount('info', `AMQP feed started for ${this.symbol}@${this.timeframe}`, this.account.id, {
        queue,
        patterns,
      });
    } catch (error) {
      try {
        await this.release();
      } catch (cleanupError) {
        logger.warn('Error unwinding a failed AMQP feed start', {
          accountId: this.account.id,
          error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
        });
      }
      throw error;
    }
  }

  /**
   * Release the headless subscriptions and the transport. Every step runs;
   * the first failure is rethrown once the connection is closed.
   */
  async stop(): Promise<void> {
    this.queue.close();
    await this.release();
  }

  private async release(): Promise<void> {
    const { channel, connection, consumerTag, headless } = this;
    this.channel = null;
    this.connection = null;
    this.consumerTag = null;
    this.headless = null;

    const failures: unknown[] = [];
    const attempt = async (what: string, fn: () => Promise<unknown>) => {
      try {
        await fn();
      } catch (error) {
        logger.warn(`Failed to ${what}`, {
          accountId: this.account.id,
          error: error instanceof Error ? error.message : String(error),
        });
        failures.push(error);
      }
    };

    if (headless) {
      const { credentials } = headless;
      if (headless.candles) {
        await attempt('release headless candles', () =>
          this.deps.orchestrator.unsubscribeCandles(credentials, this.symbol, this.timeframe)
        );
      }
      await attempt('release headless prices', () => this.deps.orchestrator.unsubscribePrice(credentials, this.symbol));
    }
    if (channel) {
      if (consumerTag) await attempt('cancel AMQP feed consumer', () => channel.cancel(consumerTag));
      await attempt('close AMQP feed channel', () => channel.close());
    }
    if (connection) await attempt('close AMQP feed connection', () => connection.close());

    if (failures.length > 0) throw failures[0];
  }

  warmupCandles(count: number): Promise<CandleEvent[]> {
    return this.deps.source.fetchCandles(this.account.id, this.symbol, this.timeframe, count);
  }

  getEvent(timeoutMs?: number): Promise<FeedEvent | null> {
    return this.queue.get(timeoutMs);
  }

  /**
   * Filter one delivery down to this feed's symbol and timeframe
   */
  handleBody(body: Buffer | string): FeedEvent | null {
    let event: ParsedEvent;
    try {
      event = parseEnvelope(body);
    } catch (error) {
      logger.debug('Ignoring malformed feed message', { error: error instanceof Error ? error.message : String(error) });
      return null;
    }
    const payload = event.envelope.payload;
    const symbol = (toStr(payload.symbol) ?? '').toUpperCase();
    if (symbol !== this.symbol) return null;

    let feedEvent: FeedEvent | null = null;
    if (event.type === 'price.tick') {
      feedEvent = { type: 'tick', data: toTickEvent(payload, symbol) };
    } else if (event.type === 'candle.update') {
      const timeframe = toStr(payload.timeframe) ?? '';
      if (timeframe.toUpperCase() !== this.timeframe.toUpperCase()) return null;
      const candle = toCandleEvent(asRecord(payload.candle), symbol, this.timeframe);
      if (candle) feedEvent = { type: 'candle', data: candle };
    }

    if (feedEvent && !this.queue.put(feedEvent)) {
      logger.debug('Feed queue full, event dropped', { symbol, type: feedEvent.type });
    }
    return feedEvent;
  }

  private onMessage(msg: ConsumeMessage | null): void {
    if (msg === null) {
      logger.warn('AMQP feed consumer cancelled by broker', { accountId: this.account.id });
      return;
    }
    this.handleBody(msg.content);
  }
}
