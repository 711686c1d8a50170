/**
 * Bot market-data feed contract
 */

import { pick, toFloat, toStr, toEpochSeconds } from '../connectors/normalize';
import type { BrokerPayload, CandleData } from '../connectors/types';

export interface TickEvent {
  symbol: string;
  bid: number | null;
  ask: number | null;
  last: number | null;
  /** Epoch seconds */
  time: number;
}

export interface CandleEvent {
  symbol: string;
  timeframe: string;
  /** Epoch seconds, candle open */
  time: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type FeedEvent = { type: 'tick'; data: TickEvent } | { type: 'candle'; data: CandleEvent };

export interface MarketDataFeed {
  start(): Promise<void>;
  stop(): Promise<void>;
  warmupCandles(count: number): Promise<CandleEvent[]>;
  /** Resolves null when nothing arrives within timeoutMs */
  getEvent(timeoutMs?: number): Promise<FeedEvent | null>;
}

/**
 * Historical candles for one account, oldest first
 */
export interface CandleSource {
  fetchCandles(accountId: string, symbol: string, timeframe: string, count: number): Promise<CandleEvent[]>;
}

export function toTickEvent(raw: BrokerPayload, symbol: string, now: () => number = Date.now): TickEvent {
  const time = toEpochSeconds(pick(raw, 'time', 'timestamp'));
  return {
    symbol: (toStr(raw.symbol) ?? symbol).toUpperCase(),
    bid: toFloat(raw.bid),
    ask: toFloat(raw.ask),
    last: toFloat(raw.last),
    time: time ?? Math.floor(now() / 1000),
  };
}

/**
 * Null when the candle carries no usable timestamp
 */
export function toCandleEvent(raw: BrokerPayload, symbol: string, timeframe: string): CandleEvent | null {
  const time = toEpochSeconds(pick(raw, 'time', 'timestamp'));
  if (time === null) return null;
  return {
    symbol: symbol.toUpperCase(),
    timeframe,
    time,
    open: toFloat(raw.open, 0),
    high: toFloat(raw.high, 0),
    low: toFloat(raw.low, 0),
    close: toFloat(raw.close, 0),
    volume: toFloat(pick(raw, 'volume', 'tick_volume'), 0),
  };
}

export function fromCandleData(candle: CandleData): CandleEvent {
  return {
    symbol: candle.symbol.toUpperCase(),
    timeframe: candle.timeframe,
    time: Math.floor(candle.timestamp.getTime() / 1000),
    open: candle.open,
    high: candle.high,
    low: candle.low,
    close: candle.close,
    volume: candle.volume,
  };
}
