/**
 * Trading platform connector interface (abstract)
 */
import { isAxiosError } from 'axios';
import {
  AuthenticationError,
  BrokerAPIError,
  BrokerConnectionError,
  ConnectionError,
  ConnectorError,
} from './errors';
import { isRecord, toStr } from './normalize';
import type {
  AccountInfo,
  AccountInfoListener,
  BrokerPayload,
  CandleCallback,
  CandleData,
  CandleRange,
  Platform,
  PositionClosedListener,
  PositionInfo,
  PositionUpdateListener,
  PriceCallback,
  PriceData,
  SymbolInfo,
  TradeRequest,
  TradeResult,
  TradeSyncData,
} from './types';

/**
 * Pull a human-readable message out of a broker error body.
 * Brokers use `detail`, `error` or `message` depending on the service.
 */
export function brokerMessage(body: unknown): string | null {
  if (typeof body === 'string') return body || null;
  if (!isRecord(body)) return null;
  for (const key of ['detail', 'error', 'message', 'errorMessage']) {
    const v = body[key];
    const s = toStr(v);
    if (s) return s;
    if (isRecord(v) || Array.isArray(v)) return JSON.stringify(v);
  }
  return null;
}

/**
 * Base connector - every broker adapter implements this contract so callers
 * never branch on platform type.
 */
export abstract class TradingPlatformConnector {
  abstract connect(): Promise<BrokerPayload>;
  abstract disconnect(): Promise<BrokerPayload>;
  abstract isConnected(): boolean;

  abstract getAccountInfo(): Promise<AccountInfo>;
  abstract placeTrade(request: TradeRequest): Promise<TradeResult>;
  abstract closePosition(positionId: string, volume: number, symbol: string): Promise<BrokerPayload>;
  abstract modifyPositionProtection(
    positionId: string,
    symbol: string,
    stopLoss?: number | null,
    takeProfit?: number | null
  ): Promise<BrokerPayload>;
  abstract getPositionDetails(positionId: string): Promise<PositionInfo>;
  abstract getOpenPositions(): Promise<PositionInfo[]>;
  abstract getPendingOrders(): Promise<BrokerPayload[]>;
  abstract cancelOrder(orderId: string): Promise<BrokerPayload>;
  abstract fetchTradeSyncData(positionId: string, symbol: string): Promise<TradeSyncData>;

  abstract getLivePrice(symbol: string): Promise<PriceData>;
  abstract getHistoricalCandles(symbol: string, timeframe: string, range: CandleRange): Promise<CandleData[]>;
  abstract getSymbolInfo(symbol: string): Promise<SymbolInfo>;

  abstract subscribePrice(symbol: string, callback?: PriceCallback): Promise<void>;
  abstract unsubscribePrice(symbol: string, callback?: PriceCallback): Promise<void>;
  abstract subscribeCandles(symbol: string, timeframe: string, callback?: CandleCallback): Promise<void>;
  abstract unsubscribeCandles(symbol: string, timeframe: string, callback?: CandleCallback): Promise<void>;

  abstract registerAccountInfoListener(listener: AccountInfoListener): void;
  abstract registerPositionUpdateListener(listener: PositionUpdateListener): void;
  abstract registerPositionClosedListener(listener: PositionClosedListener): void;

  abstract getPlatformName(): Platform;
  abstract getSupportedSymbols(): string[];
  abstract validateSymbol(symbol: string): Promise<boolean>;

  /**
   * Map broker-wrapper and network errors onto the connector taxonomy.
   * Errors already in the taxonomy pass through unchanged.
   */
  protected translateError(err: unknown, action: string): ConnectorError {
    if (err instanceof ConnectorError) {
      return err;
    }

    if (err instanceof BrokerAPIError) {
      const detail = brokerMessage(err.body) ?? err.message;
      if (err.status === 401 || err.status === 403) {
        return new AuthenticationError(`Failed to ${action}: ${detail}`);
      }
      return new ConnectionError(`Failed to ${action}: ${detail}`);
    }

    if (err instanceof BrokerConnectionError) {
      return new ConnectionError(`Failed to ${action}: ${err.message}`);
    }

    if (isAxiosError(err)) {
      const status = err.response?.status;
      const detail = brokerMessage(err.response?.data) ?? err.message;
      if (status === 401 || status === 403) {
        return new AuthenticationError(`Failed to ${action}: ${detail}`);
      }
      return new ConnectionError(`Failed to ${action}: ${detail}`);
    }

    const message = err instanceof Error ? err.message : String(err);
    return new ConnectionError(`Failed to ${action}: ${message}`);
  }

  /**
   * Run a broker call and translate its failure
   */
  protected async guard<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw this.translateError(err, action);
    }
  }
}
