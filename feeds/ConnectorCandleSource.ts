/**
 * CandleSource backed by the account's platform connector
 */

import { ConnectorFactory } from '../connectors/factory';
import { TradingPlatformConnector } from '../connectors/base';
import { CandleEvent, CandleSource, fromCandleData } from './types';

export class ConnectorCandleSource implements CandleSource {
  private connectors: Map<string, Promise<TradingPlatformConnector>> = new Map();

  constructor(private factory: ConnectorFactory) {}

  async fetchCandles(accountId: string, symbol: string, timeframe: string, count: number): Promise<CandleEvent[]> {
    const connector = await this.connectorFor(accountId);
    const candles = await connector.getHistoricalCandles(symbol, timeframe, { count });
    return candles.map((candle) => ({ ...fromCandleData(candle), timeframe }));
  }

  private connectorFor(accountId: string): Promise<TradingPlatformConnector> {
    let pending = this.connectors.get(accountId);
    if (!pending) {
      pending = this.factory.getConnectorById(accountId);
      this.connectors.set(accountId, pending);
      pending.catch(() => this.connectors.delete(accountId));
    }
    return pending;
  }
}
