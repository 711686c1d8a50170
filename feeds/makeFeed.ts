/**
 * Feed selection from BOT_FEED_MODE
 */

import { LoggerFactory } from '../logging/logger';
import type { Settings } from '../config/settings';
import { ConnectorFactory, normalizePlatform } from '../connectors/factory';
import { HeadlessSubscriptionOrchestrator } from '../connectors/mt5/HeadlessOrchestrator';
import { Mt5ConnectionManager } from '../connectors/mt5/Mt5ConnectionManager';
import type { AccountRecord } from '../connectors/types';
import type { AmqpConnect } from '../messaging/amqp';
import { BrokerEventFeed } from './BrokerEventFeed';
import { Mt5WebsocketFeed } from './Mt5WebsocketFeed';
import { PollingFeed } from './PollingFeed';
import type { CandleSource, MarketDataFeed } from './types';

const logger = LoggerFactory.getLogger('makeFeed');

export interface FeedDeps {
  settings: Settings;
  factory: ConnectorFactory;
  manager: Mt5ConnectionManager;
  orchestrator: HeadlessSubscriptionOrchestrator;
  source: CandleSource;
  /** null when no AMQP transport is available to this process */
  amqpConnect: AmqpConnect | null;
}

export function makeFeed(account: AccountRecord, symbol: string, timeframe: string, deps: FeedDeps): MarketDataFeed {
  const mode = deps.settings.botFeed.mode;
  const polling = () =>
    new PollingFeed(account.id, symbol, timeframe, deps.source, { intervalMs: deps.settings.botFeed.pollIntervalMs });

  if (mode === 'amqp') {
    if (!deps.amqpConnect) {
      logger.warn('AMQP feed requested but no AMQP transport is available, falling back to polling', {
        accountId: account.id,
      });
      return polling();
    }
    return new BrokerEventFeed(account, symbol, timeframe, {
      url: deps.settings.amqp.url,
      exchange: deps.settings.amqp.exchange,
      connect: deps.amqpConnect,
      factory: deps.factory,
      orchestrator: deps.orchestrator,
      source: deps.source,
    });
  }

  if (mode === 'websocket' && normalizePlatform(account.platform) === 'MT5') {
    return new Mt5WebsocketFeed(account, symbol, timeframe, {
      factory: deps.factory,
      manager: deps.manager,
      fallback: deps.source,
    });
  }

  return polling();
}
