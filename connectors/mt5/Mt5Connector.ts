/**
 * MT5 connector
 * Implements TradingPlatformConnector on top of the account's shared Mt5ApiClient.
 * Live subscriptions go through the headless orchestrator; callbacks passed to
 * subscribe* are additionally fed from the client's local listener registry.
 */

import { TradingPlatformConnector } from '../base';
import { ConfigurationError, ConnectionError } from '../errors';
import { asRecord, asRecordArray, parseTimestamp, pick, toEpochSeconds, toFloat, toInt, toStr } from '../normalize';
import { LoggerFactory } from '../../logging/logger';
import { Mt5ApiClient, RawListener } from './Mt5ApiClient';
import { Mt5ConnectionManager } from './Mt5ConnectionManager';
import { HeadlessSubscriptionOrchestrator } from './HeadlessOrchestrator';
import type {
  AccountInfo,
  AccountInfoListener,
  BrokerPayload,
  CandleCallback,
  CandleData,
  CandleRange,
  Mt5Credentials,
  Platform,
  PositionClosedListener,
  PositionInfo,
  PositionUpdateListener,
  PriceCallback,
  PriceData,
  SymbolInfo,
  SyncDeal,
  TradeRequest,
  TradeResult,
  TradeSyncData,
} from '../types';

const logger = LoggerFactory.getLogger('Mt5Connector');

const SUPPORTED_SYMBOLS = ['EURUSD', 'GBPUSD', 'USDJPY', 'USDCHF', 'AUDUSD', 'USDCAD', 'NZDUSD'];

export interface Mt5ConnectorDeps {
  manager: Mt5ConnectionManager;
  orchestrator: HeadlessSubscriptionOrchestrator;
}

// ==================== Payload conversion ====================

export function toMt5AccountInfo(raw: BrokerPayload): AccountInfo {
  return {
    balance: toFloat(raw.balance, 0),
    equity: toFloat(raw.equity, 0),
    margin: toFloat(raw.margin, 0),
    freeMargin: toFloat(raw.margin_free, 0),
    marginLevel: toFloat(raw.margin_level, 0),
    currency: toStr(raw.currency) || 'USD',
  };
}

export function toMt5Position(raw: BrokerPayload): PositionInfo {
  const sl = toFloat(raw.sl, 0);
  const tp = toFloat(raw.tp, 0);
  return {
    positionId: toStr(raw.ticket) ?? '',
    symbol: toStr(raw.symbol) ?? '',
    direction: toInt(raw.type, 0) === 0 ? 'BUY' : 'SELL',
    volume: toFloat(raw.volume, 0),
    openPrice: toFloat(raw.price_open, 0),
    currentPrice: toFloat(raw.price_current, 0),
    stopLoss: sl ? sl : undefined,
    takeProfit: tp ? tp : undefined,
    profit: toFloat(raw.profit, 0),
    swap: toFloat(raw.swap, 0),
    commission: toFloat(raw.commission, 0),
  };
}

export function toMt5Price(symbol: string, raw: BrokerPayload): PriceData {
  const ts = pick(raw, 'time', 'timestamp');
  return {
    symbol,
    bid: toFloat(raw.bid, 0),
    ask: toFloat(raw.ask, 0),
    timestamp: ts === undefined ? new Date() : parseTimestamp(ts),
  };
}

export function toMt5Candle(symbol: string, timeframe: string, raw: BrokerPayload): CandleData {
  return {
    symbol,
    timeframe,
    open: toFloat(raw.open, 0),
    high: toFloat(raw.high, 0),
    low: toFloat(raw.low, 0),
    close: toFloat(raw.close, 0),
    volume: toFloat(pick(raw, 'tick_volume', 'volume'), 0),
    timestamp: parseTimestamp(pick(raw, 'time', 'timestamp')),
  };
}

function toSyncDeal(raw: BrokerPayload, symbol: string): SyncDeal {
  const type = toInt(raw.type);
  return {
    ticket: toStr(raw.ticket),
    symbol: toStr(raw.symbol) ?? symbol,
    type: type === 0 || type === 1 ? type : null,
    volume: toFloat(raw.volume),
    price: toFloat(raw.price),
    order: toInt(raw.order),
    time: toEpochSeconds(raw.time),
    profit: toFloat(raw.profit),
    commission: toFloat(raw.commission),
    swap: toFloat(raw.swap),
    reason: toStr(raw.reason),
  };
}

export function toMt5TradeSyncData(raw: BrokerPayload, symbol: string): TradeSyncData {
  return {
    deals: asRecordArray(raw.deals).map((d) => toSyncDeal(d, symbol)),
    platformRemainingSize: toFloat(raw.platform_remaining_size, 0),
    isClosedOnPlatform: raw.is_closed_on_platform === true,
    lastDealPrice: toFloat(raw.last_deal_price),
    latestDealTimestamp: toEpochSeconds(raw.latest_deal_timestamp),
    finalProfit: toFloat(raw.final_profit),
    finalCommission: toFloat(raw.final_commission),
    finalSwap: toFloat(raw.final_swap),
  };
}

function requireCredentials(credentials: Mt5Credentials): void {
  const missing: string[] = [];
  if (!credentials.baseUrl) missing.push('baseUrl');
  if (!Number.isInteger(credentials.login) || credentials.login <= 0) missing.push('login');
  if (!credentials.password) missing.push('password');
  if (!credentials.brokerServer) missing.push('brokerServer');
  if (!credentials.internalAccountId) missing.push('internalAccountId');
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required MT5 credentials: ${missing.join(', ')}`, missing);
  }
}

function ticket(id: string, what: string): number {
  const n = Number(id);
  if (!Number.isInteger(n)) {
    throw new ConnectionError(`Invalid MT5 ${what}: ${id}`);
  }
  return n;
}

// ==================== Connector ====================

export class Mt5Connector extends TradingPlatformConnector {
  private connected = false;
  /** One raw listener per callback, counted like the headless subscriptions */
  private priceCallbacks: Map<PriceCallback, { symbol: string; raw: RawListener; count: number }> = new Map();
  private candleCallbacks: Map<
    CandleCallback,
    { symbol: string; timeframe: string; raw: RawListener; count: number }
  > = new Map();

  constructor(
    private readonly credentials: Mt5Credentials,
    private readonly deps: Mt5ConnectorDeps
  ) {
    super();
    requireCredentials(credentials);
  }

  private client(): Promise<Mt5ApiClient> {
    return this.deps.manager.getClient(this.credentials);
  }

  async connect(): Promise<BrokerPayload> {
    return this.guard('connect to MT5', async () => {
      const result = await (await this.client()).connect();
      this.connected = true;
      return result;
    });
  }

  /** Ends the gateway session and drops the shared client for this account */
  async disconnect(): Promise<BrokerPayload> {
    try {
      const result = await (await this.client()).disconnect();
      return result;
    } catch (error) {
      logger.warn('Error during MT5 disconnect', {
        accountId: this.credentials.internalAccountId,
        error: error instanceof Error ? error.message : String(error),
      });
      return { status: 'disconnected' };
    } finally {
      this.connected = false;
      this.priceCallbacks.clear();
      this.candleCallbacks.clear();
      this.deps.manager.removeClient(this.credentials.internalAccountId);
    }
  }

  isConnected(): boolean {
    return this.connected;
  }

  getAccountInfo(): Promise<AccountInfo> {
    return this.guard('get MT5 account info', async () => toMt5AccountInfo(await (await this.client()).getAccountInfo()));
  }

  placeTrade(request: TradeRequest): Promise<TradeResult> {
    return this.guard('place MT5 trade', async () => {
      const raw = await (await this.client()).placeTrade({
        symbol: request.symbol,
        lotSize: request.lotSize,
        direction: request.direction,
        stopLoss: request.stopLoss ?? 0,
        takeProfit: request.takeProfit ?? 0,
        orderType: request.orderType,
        limitPrice: request.limitPrice,
      });
      const orderId = toStr(pick(raw, 'order_id', 'order', 'ticket')) ?? undefined;
      const positionTicket = toStr(pick(raw, 'position_id', 'position', 'deal')) ?? undefined;
      const status = toStr(raw.status);
      return {
        orderId,
        status: status === 'filled' || positionTicket !== undefined ? 'filled' : 'pending',
        openedPositionTicket: positionTicket,
        raw,
      };
    });
  }

  closePosition(positionId: string, volume: number, symbol: string): Promise<BrokerPayload> {
    return this.guard('close MT5 position', async () =>
      (await this.client()).closeTrade(ticket(positionId, 'position id'), volume, symbol)
    );
  }

  modifyPositionProtection(
    positionId: string,
    symbol: string,
    stopLoss?: number | null,
    takeProfit?: number | null
  ): Promise<BrokerPayload> {
    return this.guard('modify MT5 position protection', async () =>
      (await this.client()).modifyPositionProtection(
        ticket(positionId, 'position id'),
        symbol,
        stopLoss ?? null,
        takeProfit ?? null
      )
    );
  }

  getPositionDetails(positionId: string): Promise<PositionInfo> {
    return this.guard('get MT5 position details', async () =>
      toMt5Position(await (await this.client()).getPositionByTicket(ticket(positionId, 'position id')))
    );
  }

  getOpenPositions(): Promise<PositionInfo[]> {
    return this.guard('get MT5 open positions', async () => {
      const positions = await (await this.client()).getOpenPositions();
      return positions.filter((p) => p.type !== 'pending_order').map(toMt5Position);
    });
  }

  getPendingOrders(): Promise<BrokerPayload[]> {
    return this.guard('fetch MT5 pending orders', async () => {
      const positions = await (await this.client()).getOpenPositions();
      return positions.filter((p) => p.type === 'pending_order');
    });
  }

  cancelOrder(orderId: string): Promise<BrokerPayload> {
    return this.guard('cancel MT5 order', async () => (await this.client()).cancelOrder(ticket(orderId, 'order id')));
  }

  fetchTradeSyncData(positionId: string, symbol: string): Promise<TradeSyncData> {
    return this.guard('fetch MT5 trade sync data', async () => {
      const raw = await (await this.client()).fetchTradeSyncData(ticket(positionId, 'position id'), symbol);
      return toMt5TradeSyncData(raw, symbol);
    });
  }

  getLivePrice(symbol: string): Promise<PriceData> {
    return this.guard('get MT5 live price', async () => toMt5Price(symbol, await (await this.client()).getLivePrice(symbol)));
  }

  getHistoricalCandles(symbol: string, timeframe: string, range: CandleRange): Promise<CandleData[]> {
    return this.guard('get MT5 historical candles', async () => {
      const candles = await (await this.client()).getHistoricalCandles(
        'count' in range
          ? { symbol, timeframe, count: range.count }
          : { symbol, timeframe, start: range.start, end: range.end }
      );
      return candles.map((c) => toMt5Candle(symbol, timeframe, c));
    });
  }

  getSymbolInfo(symbol: string): Promise<SymbolInfo> {
    return this.guard('get MT5 symbol info', async () => {
      const info = await (await this.client()).getSymbolInfo(symbol);
      return { ...info, symbol: toStr(info.symbol) || symbol };
    });
  }

  // ==================== Live subscriptions ====================

  async subscribePrice(symbol: string, callback?: PriceCallback): Promise<void> {
    await this.deps.orchestrator.subscribePrice(this.credentials, symbol);
    logger.logAccount('info', `Headless subscribe_price ${symbol}`, this.credentials.internalAccountId);
    if (!callback) return;
    const entry = this.priceCallbacks.get(callback);
    if (entry) {
      entry.count++;
      return;
    }
    const raw: RawListener = (payload) => callback(toMt5Price(symbol.toUpperCase(), payload));
    this.priceCallbacks.set(callback, { symbol, raw, count: 1 });
    (await this.client()).registerPriceListener(symbol, raw);
  }

  async unsubscribePrice(symbol: string, callback?: PriceCallback): Promise<void> {
    if (callback) {
      const entry = this.priceCallbacks.get(callback);
      if (entry && --entry.count === 0) {
        this.priceCallbacks.delete(callback);
        this.deps.manager.peek(this.credentials.internalAccountId)?.unregisterPriceListener(entry.symbol, entry.raw);
      }
    }
    await this.deps.orchestrator.unsubscribePrice(this.credentials, symbol);
    logger.logAccount('info', `Headless unsubscribe_price ${symbol}`, this.credentials.internalAccountId);
  }

  async subscribeCandles(symbol: string, timeframe: string, callback?: CandleCallback): Promise<void> {
    await this.deps.orchestrator.subscribeCandles(this.credentials, symbol, timeframe);
    logger.logAccount('info', `Headless subscribe_candles ${symbol}@${timeframe}`, this.credentials.internalAccountId);
    if (!callback) return;
    const entry = this.candleCallbacks.get(callback);
    if (entry) {
      entry.count++;
      return;
    }
    const raw: RawListener = (payload) =>
      callback(toMt5Candle(symbol.toUpperCase(), timeframe.toUpperCase(), payload));
    this.candleCallbacks.set(callback, { symbol, timeframe, raw, count: 1 });
    (await this.client()).registerCandleListener(symbol, timeframe, raw);
  }

  async unsubscribeCandles(symbol: string, timeframe: string, callback?: CandleCallback): Promise<void> {
    if (callback) {
      const entry = this.candleCallbacks.get(callback);
      if (entry && --entry.count === 0) {
        this.candleCallbacks.delete(callback);
        this.deps.manager
          .peek(this.credentials.internalAccountId)
          ?.unregisterCandleListener(entry.symbol, entry.timeframe, entry.raw);
      }
    }
    await this.deps.orchestrator.unsubscribeCandles(this.credentials, symbol, timeframe);
    logger.logAccount(
      'info',
      `Headless unsubscribe_candles ${symbol}@${timeframe}`,
      this.credentials.internalAccountId
    );
  }

  // ==================== Listeners ====================

  registerAccountInfoListener(listener: AccountInfoListener): void {
    this.withClient('account info listener', (client) =>
      client.registerAccountInfoListener((raw) => listener(toMt5AccountInfo(raw)))
    );
  }

  registerPositionUpdateListener(listener: PositionUpdateListener): void {
    this.withClient('position update listener', (client) =>
      client.registerOpenPositionsListener((raw) => listener(raw.map(toMt5Position)))
    );
  }

  registerPositionClosedListener(listener: PositionClosedListener): void {
    this.withClient('position closed listener', (client) =>
      client.registerClosedPositionListener((raw) => listener(asRecord(raw)))
    );
  }

  private withClient(what: string, fn: (client: Mt5ApiClient) => void): void {
    this.client()
      .then(fn)
      .catch((error: unknown) => {
        logger.error(`Failed to register MT5 ${what}`, error, {
          accountId: this.credentials.internalAccountId,
        });
      });
  }

  // ==================== Utility ====================

  getPlatformName(): Platform {
    return 'MT5';
  }

  getSupportedSymbols(): string[] {
    return [...SUPPORTED_SYMBOLS];
  }

  async validateSymbol(symbol: string): Promise<boolean> {
    try {
      const info = await (await this.client()).getSymbolInfo(symbol);
      return info.select === true;
    } catch (error) {
      logger.debug(`MT5 symbol validation failed for ${symbol}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
