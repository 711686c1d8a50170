/**
 * Trading Service
 * Platform-agnostic facade over one account's connector. The connector is
 * created lazily through the factory and never auto-connected; most reads are
 * plain REST calls. Connector errors are logged and re-raised unchanged.
 */

import { LoggerFactory } from '../logging/logger';
import { TradingPlatformConnector } from './base';
import { ConnectorFactory } from './factory';
import type {
  AccountInfo,
  AccountRecord,
  BrokerPayload,
  CandleCallback,
  CandleData,
  CandleRange,
  Direction,
  OrderType,
  PositionInfo,
  PriceCallback,
  PriceData,
  SymbolInfo,
  TradeResult,
  TradeSyncData,
} from './types';

const logger = LoggerFactory.getLogger('TradingService');

export interface PlaceTradeInput {
  symbol: string;
  lotSize: number;
  direction: Direction;
  stopLoss?: number;
  takeProfit?: number;
  orderType?: OrderType;
  limitPrice?: number;
  slDistance?: number;
  tpDistance?: number;
}

export class TradingService {
  private connector: TradingPlatformConnector | null = null;
  private priceCallbacks: Map<string, PriceCallback[]> = new Map();
  private candleCallbacks: Map<string, CandleCallback[]> = new Map();

  constructor(
    readonly account: AccountRecord,
    private factory: ConnectorFactory
  ) {}

  private async getConnector(): Promise<TradingPlatformConnector> {
    if (!this.connector) {
      this.connector = await this.factory.getConnector(this.account);
    }
    return this.connector;
  }

  private async call<T>(action: string, fn: (connector: TradingPlatformConnector) => Promise<T>): Promise<T> {
    try {
      return await fn(await this.getConnector());
    } catch (error) {
      logger.logAccount('error', `Failed to ${action}`, this.account.id, {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  getAccountInfo(): Promise<AccountInfo> {
    return this.call('get account info', (c) => c.getAccountInfo());
  }

  getOpenPositions(): Promise<PositionInfo[]> {
    return this.call('get open positions', (c) => c.getOpenPositions());
  }

  getPositionDetails(positionId: string): Promise<PositionInfo> {
    return this.call('get position details', (c) => c.getPositionDetails(positionId));
  }

  getPendingOrders(): Promise<BrokerPayload[]> {
    return this.call('get pending orders', (c) => c.getPendingOrders());
  }

  async placeTrade(input: PlaceTradeInput): Promise<TradeResult> {
    return this.call('place trade', async (c) => {
      const result = await c.placeTrade({ ...input, orderType: input.orderType ?? 'MARKET' });
      logger.logAccount('info', `Trade placed on ${c.getPlatformName()}`, this.account.id, {
        symbol: input.symbol,
        status: result.status,
        orderId: result.orderId,
      });
      return result;
    });
  }

  closePosition(positionId: string, volume: number, symbol: string): Promise<BrokerPayload> {
    return this.call('close position', (c) => c.closePosition(positionId, volume, symbol));
  }

  modifyProtection(
    positionId: string,
    symbol: string,
    stopLoss?: number | null,
    takeProfit?: number | null
  ): Promise<BrokerPayload> {
    return this.call('modify position protection', (c) =>
      c.modifyPositionProtection(positionId, symbol, stopLoss, takeProfit)
    );
  }

  cancelOrder(orderId: string): Promise<BrokerPayload> {
    return this.call('cancel order', (c) => c.cancelOrder(orderId));
  }

  fetchTradeSyncData(positionId: string, symbol: string): Promise<TradeSyncData> {
    return this.call('fetch trade sync data', (c) => c.fetchTradeSyncData(positionId, symbol));
  }

  getLivePrice(symbol: string): Promise<PriceData> {
    return this.call('get live price', (c) => c.getLivePrice(symbol));
  }

  getCandles(symbol: string, timeframe: string, range: CandleRange): Promise<CandleData[]> {
    return this.call('get historical candles', (c) => c.getHistoricalCandles(symbol, timeframe, range));
  }

  getSymbolInfo(symbol: string): Promise<SymbolInfo> {
    return this.call('get symbol info', (c) => c.getSymbolInfo(symbol));
  }

  // ==================== Subscriptions ====================

  async subscribePrice(symbol: string, callback: PriceCallback): Promise<void> {
    await this.call('subscribe price', (c) => c.subscribePrice(symbol, callback));
    const list = this.priceCallbacks.get(symbol) ?? [];
    list.push(callback);
    this.priceCallbacks.set(symbol, list);
  }

  /**
   * Without a callback, the most recently registered one for the symbol is released
   */
  async unsubscribePrice(symbol: string, callback?: PriceCallback): Promise<void> {
    const list = this.priceCallbacks.get(symbol) ?? [];
    const cb = callback ?? list[list.length - 1];
    await this.call('unsubscribe price', (c) => c.unsubscribePrice(symbol, cb));
    removeOne(this.priceCallbacks, symbol, cb);
  }

  async subscribeCandles(symbol: string, timeframe: string, callback: CandleCallback): Promise<void> {
    await this.call('subscribe candles', (c) => c.subscribeCandles(symbol, timeframe, callback));
    const key = `${symbol}|${timeframe}`;
    const list = this.candleCallbacks.get(key) ?? [];
    list.push(callback);
    this.candleCallbacks.set(key, list);
  }

  async unsubscribeCandles(symbol: string, timeframe: string, callback?: CandleCallback): Promise<void> {
    const key = `${symbol}|${timeframe}`;
    const list = this.candleCallbacks.get(key) ?? [];
    const cb = callback ?? list[list.length - 1];
    await this.call('unsubscribe candles', (c) => c.unsubscribeCandles(symbol, timeframe, cb));
    removeOne(this.candleCallbacks, key, cb);
  }

  /**
   * Release every subscription this service holds, one unsubscribe per subscribe
   */
  async unsubscribeAll(): Promise<void> {
    for (const [symbol, callbacks] of Array.from(this.priceCallbacks.entries())) {
      for (const cb of [...callbacks]) {
        await this.unsubscribePrice(symbol, cb);
      }
    }
    for (const [key, callbacks] of Array.from(this.candleCallbacks.entries())) {
      const [symbol, timeframe] = key.split('|');
      for (const cb of [...callbacks]) {
        await this.unsubscribeCandles(symbol, timeframe, cb);
      }
    }
  }

  subscriptionCount(): number {
    let total = 0;
    for (const list of this.priceCallbacks.values()) total += list.length;
    for (const list of this.candleCallbacks.values()) total += list.length;
    return total;
  }

  getPlatformName(): string {
    return this.account.platform;
  }

  async disconnect(): Promise<void> {
    if (!this.connector) return;
    try {
      await this.connector.disconnect();
    } catch (error) {
      logger.warn('Error during disconnect', {
        accountId: this.account.id,
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.connector = null;
    }
  }
}

function removeOne<T>(registry: Map<string, T[]>, key: string, item: T | undefined): void {
  const list = registry.get(key);
  if (!list || item === undefined) return;
  const index = list.indexOf(item);
  if (index >= 0) list.splice(index, 1);
  if (list.length === 0) registry.delete(key);
}
