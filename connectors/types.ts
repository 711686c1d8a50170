/**
 * Platform-agnostic connector types
 */

export type Platform = 'MT5' | 'cTrader';
export type Direction = 'BUY' | 'SELL';
export type OrderType = 'MARKET' | 'LIMIT' | 'STOP';

export interface TradeRequest {
  symbol: string;
  lotSize: number;
  direction: Direction;
  stopLoss?: number;
  takeProfit?: number;
  orderType: OrderType;
  limitPrice?: number;
  // Distances (points) for MARKET orders; converted to absolute prices after fill
  slDistance?: number;
  tpDistance?: number;
}

export interface PositionInfo {
  positionId: string;
  symbol: string;
  direction: Direction;
  volume: number;
  openPrice: number;
  currentPrice: number;
  stopLoss?: number;
  takeProfit?: number;
  profit: number;
  swap: number;
  commission: number;
}

export interface AccountInfo {
  balance: number;
  equity: number;
  margin: number;
  freeMargin: number;
  marginLevel: number;
  currency: string;
}

export interface PriceData {
  symbol: string;
  bid: number;
  ask: number;
  timestamp: Date;
}

export interface CandleData {
  symbol: string;
  timeframe: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  timestamp: Date;
}

export type CandleRange =
  | { count: number }
  | { start: Date; end?: Date };

/** Raw broker response body; connectors keep these opaque apart from the fields they normalise */
export type BrokerPayload = Record<string, unknown>;

export type SymbolInfo = BrokerPayload & { symbol: string };

export interface TradeResult {
  orderId?: string;
  status: 'pending' | 'filled';
  openedPositionTicket?: string;
  raw: BrokerPayload;
}

export interface SyncDeal {
  ticket: string | null;
  symbol: string;
  type: 0 | 1 | null;
  volume: number | null;
  price: number | null;
  order: number | null;
  time: number | null;
  profit: number | null;
  commission: number | null;
  swap: number | null;
  reason: string | null;
}

export interface TradeSyncData {
  deals: SyncDeal[];
  platformRemainingSize: number;
  isClosedOnPlatform: boolean;
  lastDealPrice: number | null;
  latestDealTimestamp: number | null;
  finalProfit: number | null;
  finalCommission: number | null;
  finalSwap: number | null;
}

export type PriceCallback = (price: PriceData) => void;
export type CandleCallback = (candle: CandleData) => void;
export type AccountInfoListener = (info: AccountInfo) => void;
export type PositionUpdateListener = (positions: PositionInfo[]) => void;
export type PositionClosedListener = (event: BrokerPayload) => void;

export interface Mt5Credentials {
  baseUrl: string;
  login: number;
  password: string;
  brokerServer: string;
  internalAccountId: string;
}

export interface CTraderCredentials {
  accountId: string;
  accessToken: string;
  refreshToken?: string;
  isSandbox: boolean;
  ctidUserId?: string;
  internalAccountId: string;
}

export interface AccountRecord {
  id: string;
  platform: string;
  userId?: string;
}
