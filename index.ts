/**
 * Broker Connector Layer
 * Main entry point and public API
 */

// ============================================================================
// Core Types & Errors
// ============================================================================
export * from './connectors/types';
export {
  ConnectorError,
  ConnectionError,
  AuthenticationError,
  UnsupportedOperationError,
  ConfigurationError,
  BrokerAPIError,
  BrokerConnectionError,
  toHttpError,
} from './connectors/errors';

// ============================================================================
// Configuration & Logging
// ============================================================================
export { loadSettings, Settings, BotFeedMode } from './config/settings';
export { Logger, LoggerFactory } from './logging/logger';

// ============================================================================
// Connectors
// ============================================================================
export { TradingPlatformConnector } from './connectors/base';
export { Mt5Connector } from './connectors/mt5/Mt5Connector';
export { Mt5ApiClient } from './connectors/mt5/Mt5ApiClient';
export { Mt5ConnectionManager } from './connectors/mt5/Mt5ConnectionManager';
export {
  HeadlessSubscriptionOrchestrator,
  HeadlessUpstream,
  Mt5HeadlessGateway,
} from './connectors/mt5/HeadlessOrchestrator';
export { CTraderHttpConnector } from './connectors/ctrader/CTraderHttpConnector';
export { ProtectionAmendTask, AmendOutcome, AmendPolicy } from './connectors/ctrader/ProtectionAmendTask';
export { idempotencyKey } from './connectors/ctrader/idempotency';
export { ConnectorFactory, normalizePlatform, PlatformCredentials } from './connectors/factory';
export { TradingService, PlaceTradeInput } from './connectors/TradingService';

// ============================================================================
// Broker Events
// ============================================================================
export { EventEnvelopeSchema, EventEnvelope, canonicalEventType } from './messaging/envelope';
export { EventRouter, EventStats } from './messaging/EventRouter';
export { EventsConsumer } from './messaging/EventsConsumer';
export { accountGroup, priceGroup, candleGroup } from './messaging/ChannelLayer';

// ============================================================================
// Bot Feeds
// ============================================================================
export { MarketDataFeed, FeedEvent, TickEvent, CandleEvent } from './feeds/types';
export { PollingFeed } from './feeds/PollingFeed';
export { Mt5WebsocketFeed } from './feeds/Mt5WebsocketFeed';
export { BrokerEventFeed } from './feeds/BrokerEventFeed';
export { makeFeed } from './feeds/makeFeed';

// ============================================================================
// Services
// ============================================================================
export { ConnectorServices } from './services/ConnectorServices';
