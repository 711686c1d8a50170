/**
 * Connector Services
 * Process-wide container: built once at startup and passed to every consumer
 * of the connector layer. Redis-backed stores are used when REDIS_URL is set,
 * in-memory ones otherwise.
 */

import Redis from 'ioredis';
import { LoggerFactory } from '../logging/logger';
import { loadSettings, Settings } from '../config/settings';
import { RepositoryFactory } from '../database/RepositoryFactory';
import type { AccountStore } from '../database/repositories/AccountRepository';
import { ConnectorFactory } from '../connectors/factory';
import type { TradeProtectionStore } from '../connectors/ctrader/CTraderHttpConnector';
import { Mt5ConnectionManager } from '../connectors/mt5/Mt5ConnectionManager';
import {
  HeadlessSubscriptionOrchestrator,
  HeadlessUpstream,
  Mt5HeadlessGateway,
} from '../connectors/mt5/HeadlessOrchestrator';
import { TradingService } from '../connectors/TradingService';
import type { AccountRecord } from '../connectors/types';
import { AccountIdCache, AccountResolver, MemoryAccountIdCache, RedisAccountIdCache } from '../messaging/AccountResolver';
import { ChannelLayer, MemoryChannelLayer, RedisChannelLayer } from '../messaging/ChannelLayer';
import { DedupeStore, MemoryDedupeStore, RedisDedupeStore } from '../messaging/DedupeStore';
import { EventRouter } from '../messaging/EventRouter';
import { EventsConsumer } from '../messaging/EventsConsumer';
import { AmqpConnect, connectAmqp } from '../messaging/amqp';
import { MemoryTradeSyncQueue, RedisTradeSyncQueue, TradeSyncQueue } from '../messaging/TradeSyncQueue';
import { ConnectorCandleSource } from '../feeds/ConnectorCandleSource';
import { makeFeed } from '../feeds/makeFeed';
import type { CandleSource, MarketDataFeed } from '../feeds/types';

const logger = LoggerFactory.getLogger('ConnectorServices');

/**
 * Replacements for the external collaborators (tests, embedding processes)
 */
export interface ConnectorServicesOverrides {
  accounts?: AccountStore;
  trades?: TradeProtectionStore;
  /** null forces the in-memory stores even when REDIS_URL is set */
  redis?: Redis | null;
  upstream?: HeadlessUpstream;
  amqpConnect?: AmqpConnect | null;
}

export class ConnectorServices {
  readonly settings: Settings;
  readonly mt5Manager: Mt5ConnectionManager;
  readonly orchestrator: HeadlessSubscriptionOrchestrator;
  readonly factory: ConnectorFactory;
  readonly dedupe: DedupeStore;
  readonly accountCache: AccountIdCache;
  readonly resolver: AccountResolver;
  readonly channels: ChannelLayer;
  readonly tradeSync: TradeSyncQueue;
  readonly router: EventRouter;
  readonly candles: CandleSource;
  readonly amqpConnect: AmqpConnect | null;

  private repositories: RepositoryFactory | null = null;
  private redis: Redis | null;

  constructor(settings: Settings = loadSettings(), overrides: ConnectorServicesOverrides = {}) {
    this.settings = settings;
    LoggerFactory.configure({
      logLevel: settings.logLevel,
      enableFile: Boolean(settings.logFilePath),
      logFilePath: settings.logFilePath,
    });

    let accounts = overrides.accounts;
    let trades = overrides.trades;
    if (!accounts || !trades) {
      this.repositories = new RepositoryFactory(settings.databaseUrl);
      accounts = accounts ?? this.repositories.getAccountRepo();
      trades = trades ?? this.repositories.getTradeRepo();
    }

    this.redis = overrides.redis !== undefined ? overrides.redis : createRedis(settings.redisUrl);
    if (this.redis) {
      this.dedupe = new RedisDedupeStore(this.redis, settings.eventDedupeTtlSec);
      this.accountCache = new RedisAccountIdCache(this.redis, settings.accountCacheTtlSec);
      this.channels = new RedisChannelLayer(this.redis);
      this.tradeSync = new RedisTradeSyncQueue(this.redis);
    } else {
      logger.warn(
        'REDIS_URL not configured, using in-memory stores: group fan-out stays in this process and trade sync jobs are not delivered to a worker'
      );
      this.dedupe = new MemoryDedupeStore(settings.eventDedupeTtlSec);
      this.accountCache = new MemoryAccountIdCache(settings.accountCacheTtlSec);
      this.channels = new MemoryChannelLayer();
      this.tradeSync = new MemoryTradeSyncQueue();
    }

    this.mt5Manager = new Mt5ConnectionManager({
      sharedSecret: settings.internalSharedSecret,
      timeoutMs: settings.mt5.httpTimeoutMs,
      wsEnabled: settings.mt5.wsEnabled,
      wsBaseUrl: settings.mt5.wsBaseUrl,
      pollIntervalMs: settings.mt5.pollIntervalMs,
    });
    this.orchestrator = new HeadlessSubscriptionOrchestrator(
      overrides.upstream ?? new Mt5HeadlessGateway(this.mt5Manager)
    );
    this.factory = new ConnectorFactory({
      settings,
      accounts,
      trades,
      mt5Manager: this.mt5Manager,
      orchestrator: this.orchestrator,
    });

    this.resolver = new AccountResolver(accounts, this.accountCache);
    this.router = new EventRouter({
      dedupe: this.dedupe,
      resolver: this.resolver,
      channels: this.channels,
      tradeSync: this.tradeSync,
    });
    this.candles = new ConnectorCandleSource(this.factory);
    this.amqpConnect = overrides.amqpConnect !== undefined ? overrides.amqpConnect : connectAmqp;
  }

  tradingService(account: AccountRecord): TradingService {
    return new TradingService(account, this.factory);
  }

  createEventsConsumer(): EventsConsumer {
    if (!this.amqpConnect) {
      throw new Error('No AMQP transport configured');
    }
    return new EventsConsumer(this.router, {
      url: this.settings.amqp.url,
      exchange: this.settings.amqp.exchange,
      queue: this.settings.amqp.queue,
      connect: this.amqpConnect,
    });
  }

  createFeed(account: AccountRecord, symbol: string, timeframe: string): MarketDataFeed {
    return makeFeed(account, symbol, timeframe, {
      settings: this.settings,
      factory: this.factory,
      manager: this.mt5Manager,
      orchestrator: this.orchestrator,
      source: this.candles,
      amqpConnect: this.amqpConnect,
    });
  }

  async shutdown(): Promise<void> {
    this.mt5Manager.closeAll();
    if (this.redis) {
      await this.redis.quit();
      this.redis = null;
    }
    if (this.repositories) {
      await this.repositories.disconnect();
      this.repositories = null;
    }
    logger.info('Connector services shut down');
  }
}

function createRedis(url: string | undefined): Redis | null {
  if (!url) return null;
  const redis = new Redis(url);
  redis.on('connect', () => logger.info('Redis connected'));
  redis.on('error', (error: Error) => logger.error('Redis error', error));
  return redis;
}
