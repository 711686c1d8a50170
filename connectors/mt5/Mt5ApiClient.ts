/**
 * MT5 session client
 * One long-lived client per trading account. Talks REST to the MT5 gateway,
 * optionally holds a WebSocket to it, and falls back to HTTP polling for
 * live prices and candles when the socket is disabled or down.
 */

import axios, { AxiosAdapter, AxiosInstance, AxiosResponse, isAxiosError } from 'axios';
import WebSocket from 'ws';
import { EventEmitter } from 'events';
import { LoggerFactory } from '../../logging/logger';
import { BrokerAPIError, BrokerConnectionError } from '../errors';
import { asRecord, asRecordArray, isRecord, pick, toEpochSeconds, toStr } from '../normalize';
import type { BrokerPayload, Mt5Credentials } from '../types';

const logger = LoggerFactory.getLogger('Mt5ApiClient');

const RECONNECT_DELAY_MS = 5000;

export type RawListener = (payload: BrokerPayload) => void;
export type RawPositionsListener = (positions: BrokerPayload[]) => void;

export interface Mt5ApiClientOptions {
  sharedSecret?: string;
  timeoutMs?: number;
  wsEnabled?: boolean;
  wsBaseUrl?: string;
  pollIntervalMs?: number;
  /** Custom axios adapter (tests) */
  adapter?: AxiosAdapter;
}

export interface CandleQuery {
  symbol: string;
  timeframe: string;
  count?: number;
  start?: Date;
  end?: Date;
}

export interface PlaceTradeParams {
  symbol: string;
  lotSize: number;
  direction: string;
  stopLoss: number;
  takeProfit: number;
  orderType: string;
  limitPrice?: number;
}

const priceEvent = (symbol: string) => `price:${symbol}`;
const candleEvent = (symbol: string, timeframe: string) => `candle:${symbol}:${timeframe}`;
const candleKey = (symbol: string, timeframe: string) => `${symbol}|${timeframe}`;

/**
 * Emits:
 * - 'price:<SYMBOL>': raw price payload
 * - 'candle:<SYMBOL>:<TF>': raw candle payload
 * - 'account_info': raw account info
 * - 'open_positions': raw position list
 * - 'position_closed': raw closed-position event
 */
export class Mt5ApiClient extends EventEmitter {
  readonly credentials: Mt5Credentials;
  private http: AxiosInstance;
  private wsEnabled: boolean;
  private wsBaseUrl: string;
  private pollIntervalMs: number;

  private ws: WebSocket | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private pollTimer: NodeJS.Timeout | null = null;
  private polling = false;
  private closed = false;

  private priceSymbols: Set<string> = new Set();
  private candlePairs: Map<string, { symbol: string; timeframe: string }> = new Map();
  private lastCandleTs: Map<string, number> = new Map();

  private lastAccountInfo: BrokerPayload | null = null;
  private lastOpenPositions: BrokerPayload[] | null = null;
  private lastPrices: Map<string, BrokerPayload> = new Map();

  constructor(credentials: Mt5Credentials, options: Mt5ApiClientOptions = {}) {
    super();
    this.credentials = credentials;
    this.wsEnabled = options.wsEnabled ?? false;
    this.wsBaseUrl = (options.wsBaseUrl ?? credentials.baseUrl.replace(/^http/, 'ws')).replace(/\/+$/, '');
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (options.sharedSecret) {
      headers.Authorization = `Bearer ${options.sharedSecret}`;
    }

    this.http = axios.create({
      baseURL: credentials.baseUrl.replace(/\/+$/, ''),
      timeout: options.timeoutMs ?? 10000,
      headers,
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  get internalAccountId(): string {
    return this.credentials.internalAccountId;
  }

  // ==================== REST ====================

  private authPayload(): BrokerPayload {
    return {
      account_id: this.credentials.login,
      password: this.credentials.password,
      broker_server: this.credentials.brokerServer,
      internal_account_id: this.credentials.internalAccountId,
    };
  }

  private async post(endpoint: string, extra: BrokerPayload = {}): Promise<BrokerPayload> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post(endpoint, { ...this.authPayload(), ...extra });
    } catch (error) {
      if (isAxiosError(error) && error.code === 'ECONNABORTED') {
        throw new BrokerConnectionError(`Request to MT5 API ${endpoint} timed out`, error);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new BrokerConnectionError(`Request to MT5 API ${endpoint} failed: ${message}`, error);
    }

    if (response.status >= 400) {
      throw new BrokerAPIError(
        `MT5 API ${endpoint} returned HTTP ${response.status}`,
        response.status,
        response.data
      );
    }
    return asRecord(response.data);
  }

  connect(): Promise<BrokerPayload> {
    return this.post('/mt5/connect');
  }

  disconnect(): Promise<BrokerPayload> {
    return this.post('/mt5/disconnect');
  }

  async getAccountInfo(): Promise<BrokerPayload> {
    const body = await this.post('/mt5/account_info');
    const info = isRecord(body.account_info) ? body.account_info : body;
    this.lastAccountInfo = info;
    return info;
  }

  async getOpenPositions(): Promise<BrokerPayload[]> {
    const body = await this.post('/mt5/positions/open');
    const positions = asRecordArray(body.open_positions);
    this.lastOpenPositions = positions;
    return positions;
  }

  async getPositionByTicket(ticket: number): Promise<BrokerPayload> {
    const body = await this.post('/mt5/positions/details', { position_ticket: ticket });
    return isRecord(body.position) ? body.position : body;
  }

  placeTrade(params: PlaceTradeParams): Promise<BrokerPayload> {
    return this.post('/mt5/trade', {
      symbol: params.symbol,
      lot_size: params.lotSize,
      direction: params.direction,
      stop_loss: params.stopLoss,
      take_profit: params.takeProfit,
      order_type: params.orderType,
      limit_price: params.limitPrice ?? null,
    });
  }

  closeTrade(ticket: number, volume: number, symbol: string): Promise<BrokerPayload> {
    return this.post('/mt5/positions/close', { ticket, volume, symbol });
  }

  modifyPositionProtection(
    positionId: number,
    symbol: string,
    stopLoss: number | null,
    takeProfit: number | null
  ): Promise<BrokerPayload> {
    return this.post('/mt5/positions/modify_protection', {
      position_id: positionId,
      symbol,
      stop_loss: stopLoss,
      take_profit: takeProfit,
    });
  }

  cancelOrder(orderTicket: number): Promise<BrokerPayload> {
    return this.post('/mt5/orders/cancel', { order_ticket: orderTicket });
  }

  async getLivePrice(symbol: string): Promise<BrokerPayload> {
    const body = await this.post('/mt5/price', { symbol });
    this.lastPrices.set(symbol.toUpperCase(), body);
    return body;
  }

  getSymbolInfo(symbol: string): Promise<BrokerPayload> {
    return this.post('/mt5/symbol_info', { symbol });
  }

  async getHistoricalCandles(query: CandleQuery): Promise<BrokerPayload[]> {
    const extra: BrokerPayload = { symbol: query.symbol, timeframe: query.timeframe };
    if (query.count !== undefined) extra.count = query.count;
    if (query.start) extra.start_time = query.start.toISOString();
    if (query.end) extra.end_time = query.end.toISOString();
    const body = await this.post('/mt5/candles', extra);
    return asRecordArray(body.candles);
  }

  fetchTradeSyncData(positionId: number, instrumentSymbol: string): Promise<BrokerPayload> {
    return this.post('/mt5/deals/sync_data', {
      position_id: positionId,
      instrument_symbol: instrumentSymbol,
    });
  }

  // ==================== Headless poller control ====================

  headlessStart(): Promise<BrokerPayload> {
    return this.post('/mt5/headless/start');
  }

  headlessSubscribePrice(symbol: string): Promise<BrokerPayload> {
    return this.post('/mt5/headless/subscribe_price', { symbol });
  }

  headlessUnsubscribePrice(symbol: string): Promise<BrokerPayload> {
    return this.post('/mt5/headless/unsubscribe_price', { symbol });
  }

  headlessSubscribeCandles(symbol: string, timeframe: string): Promise<BrokerPayload> {
    return this.post('/mt5/headless/subscribe_candles', { symbol, timeframe });
  }

  headlessUnsubscribeCandles(symbol: string, timeframe: string): Promise<BrokerPayload> {
    return this.post('/mt5/headless/unsubscribe_candles', { symbol, timeframe });
  }

  // ==================== Caches ====================

  getCachedAccountInfo(): BrokerPayload | null {
    return this.lastAccountInfo;
  }

  getCachedOpenPositions(): BrokerPayload[] | null {
    return this.lastOpenPositions;
  }

  getCachedPrice(symbol: string): BrokerPayload | null {
    return this.lastPrices.get(symbol.toUpperCase()) ?? null;
  }

  // ==================== Listener registry ====================

  registerPriceListener(symbol: string, listener: RawListener): void {
    const sym = symbol.toUpperCase();
    this.on(priceEvent(sym), listener);
    if (!this.priceSymbols.has(sym)) {
      this.priceSymbols.add(sym);
      this.sendSocket({ action: 'subscribe_price', symbol: sym });
    }
    this.ensureStreaming();
  }

  unregisterPriceListener(symbol: string, listener: RawListener): void {
    const sym = symbol.toUpperCase();
    this.off(priceEvent(sym), listener);
    if (this.listenerCount(priceEvent(sym)) === 0 && this.priceSymbols.delete(sym)) {
      this.sendSocket({ action: 'unsubscribe_price', symbol: sym });
    }
    this.stopPollingIfIdle();
  }

  registerCandleListener(symbol: string, timeframe: string, listener: RawListener): void {
    const sym = symbol.toUpperCase();
    const tf = timeframe.toUpperCase();
    this.on(candleEvent(sym, tf), listener);
    const key = candleKey(sym, tf);
    if (!this.candlePairs.has(key)) {
      this.candlePairs.set(key, { symbol: sym, timeframe: tf });
      this.sendSocket({ action: 'subscribe_candles', symbol: sym, timeframe: tf });
    }
    this.ensureStreaming();
  }

  unregisterCandleListener(symbol: string, timeframe: string, listener: RawListener): void {
    const sym = symbol.toUpperCase();
    const tf = timeframe.toUpperCase();
    this.off(candleEvent(sym, tf), listener);
    const key = candleKey(sym, tf);
    if (this.listenerCount(candleEvent(sym, tf)) === 0 && this.candlePairs.delete(key)) {
      this.lastCandleTs.delete(key);
      this.sendSocket({ action: 'unsubscribe_candles', symbol: sym, timeframe: tf });
    }
    this.stopPollingIfIdle();
  }

  registerAccountInfoListener(listener: RawListener): void {
    this.on('account_info', listener);
    this.ensureStreaming();
  }

  registerOpenPositionsListener(listener: RawPositionsListener): void {
    this.on('open_positions', listener);
    this.ensureStreaming();
  }

  registerClosedPositionListener(listener: RawListener): void {
    this.on('position_closed', listener);
    this.ensureStreaming();
  }

  hasLocalSubscriptions(): boolean {
    return this.priceSymbols.size > 0 || this.candlePairs.size > 0;
  }

  getSubscribedSymbols(): string[] {
    return Array.from(this.priceSymbols);
  }

  // ==================== Message routing ====================

  /**
   * Route one gateway message (socket frame) into caches and listeners
   */
  dispatchMessage(message: BrokerPayload): void {
    const type = toStr(message.type);
    const data = isRecord(message.data) ? message.data : message;

    switch (type) {
      case 'account_info': {
        const info = isRecord(data.account_info) ? data.account_info : data;
        this.lastAccountInfo = info;
        this.emit('account_info', info);
        break;
      }
      case 'open_positions': {
        const positions = asRecordArray(Array.isArray(message.data) ? message.data : data.open_positions);
        this.lastOpenPositions = positions;
        this.emit('open_positions', positions);
        break;
      }
      case 'position_closed':
        this.emit('position_closed', data);
        break;
      case 'price': {
        const symbol = toStr(pick(data, 'symbol', 'instrument'))?.toUpperCase();
        if (!symbol) return;
        this.lastPrices.set(symbol, data);
        this.emit(priceEvent(symbol), data);
        break;
      }
      case 'candle': {
        const symbol = toStr(pick(data, 'symbol', 'instrument'))?.toUpperCase();
        const timeframe = toStr(data.timeframe)?.toUpperCase();
        if (!symbol || !timeframe) return;
        const candle = isRecord(data.candle) ? { ...data.candle, symbol, timeframe } : data;
        this.emit(candleEvent(symbol, timeframe), candle);
        break;
      }
      default:
        logger.debug(`Ignoring MT5 message type: ${type ?? 'unknown'}`);
    }
  }

  // ==================== WebSocket loop ====================

  private ensureStreaming(): void {
    if (this.closed) return;
    if (this.wsEnabled) {
      this.openSocket();
    }
    if (!this.isSocketOpen() && this.hasLocalSubscriptions()) {
      this.startPolling();
    }
  }

  isSocketOpen(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  private openSocket(): void {
    if (this.closed || this.ws) return;

    const url = `${this.wsBaseUrl}/mt5/ws/${this.credentials.login}`;
    logger.logAccount('info', `📡 Connecting MT5 socket: ${url}`, this.internalAccountId);
    const ws = new WebSocket(url);
    this.ws = ws;

    ws.on('open', () => {
      logger.logAccount('info', '✅ MT5 socket connected', this.internalAccountId);
      this.stopPolling();
      this.resubscribe();
    });

    ws.on('message', (data: WebSocket.RawData) => {
      try {
        const parsed: unknown = JSON.parse(data.toString());
        if (isRecord(parsed)) {
          this.dispatchMessage(parsed);
        }
      } catch (error) {
        logger.error('Failed to parse MT5 socket message', error);
      }
    });

    ws.on('close', () => {
      if (this.ws === ws) {
        this.ws = null;
      }
      if (this.closed) return;
      logger.logAccount('warn', '⚠️  MT5 socket closed, reconnecting in 5 seconds', this.internalAccountId);
      if (this.hasLocalSubscriptions()) {
        this.startPolling();
      }
      this.reconnectTimer = setTimeout(() => {
        this.reconnectTimer = null;
        this.openSocket();
      }, RECONNECT_DELAY_MS);
    });

    ws.on('error', (error: Error) => {
      logger.error('MT5 socket error', error, { accountId: this.internalAccountId });
    });
  }

  private resubscribe(): void {
    for (const symbol of this.priceSymbols) {
      this.sendSocket({ action: 'subscribe_price', symbol });
    }
    for (const { symbol, timeframe } of this.candlePairs.values()) {
      this.sendSocket({ action: 'subscribe_candles', symbol, timeframe });
    }
  }

  private sendSocket(message: BrokerPayload): void {
    if (this.ws && this.ws.readyState === WebSocket.OPEN) {
      this.ws.send(JSON.stringify(message));
    }
  }

  // ==================== HTTP fallback ====================

  private startPolling(): void {
    if (this.pollTimer || this.closed) return;
    logger.logAccount('debug', 'Starting MT5 HTTP poll fallback', this.internalAccountId, {
      intervalMs: this.pollIntervalMs,
    });
    this.pollTimer = setInterval(() => {
      this.pollOnce().catch((error: unknown) => {
        logger.error('MT5 poll cycle failed', error, { accountId: this.internalAccountId });
      });
    }, this.pollIntervalMs);
  }

  private stopPolling(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
  }

  private stopPollingIfIdle(): void {
    if (!this.hasLocalSubscriptions()) {
      this.stopPolling();
    }
  }

  isPolling(): boolean {
    return this.pollTimer !== null;
  }

  /**
   * One fallback cycle: a price for every subscribed symbol, and a candle for
   * every subscribed pair whose newest timestamp advanced.
   */
  async pollOnce(): Promise<void> {
    if (this.polling) return;
    this.polling = true;
    try {
      for (const symbol of Array.from(this.priceSymbols)) {
        try {
          const price = await this.getLivePrice(symbol);
          this.emit(priceEvent(symbol), { ...price, symbol });
        } catch (error) {
          logger.warn(`Price poll failed for ${symbol}`, {
            accountId: this.internalAccountId,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }

      for (const [key, { symbol, timeframe }] of Array.from(this.candlePairs.entries())) {
        try {
          const candles = await this.getHistoricalCandles({ symbol, timeframe, count: 2 });
          const newest = latestCandle(candles);
          if (!newest) continue;
          const ts = toEpochSeconds(pick(newest, 'time', 'timestamp'));
          if (ts === null) continue;
          const last = this.lastCandleTs.get(key);
          if (last === undefined || ts > last) {
            this.lastCandleTs.set(key, ts);
            this.emit(candleEvent(symbol, timeframe), { ...newest, symbol, timeframe });
          }
        } catch (error) {
          logger.warn(`Candle poll failed for ${symbol}@${timeframe}`, {
            accountId: this.internalAccountId,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
    } finally {
      this.polling = false;
    }
  }

  // ==================== Lifecycle ====================

  close(): void {
    this.closed = true;
    this.stopPolling();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.ws) {
      const ws = this.ws;
      this.ws = null;
      ws.close();
    }
    this.priceSymbols.clear();
    this.candlePairs.clear();
    this.lastCandleTs.clear();
    this.removeAllListeners();
  }

  isClosed(): boolean {
    return this.closed;
  }
}

function latestCandle(candles: BrokerPayload[]): BrokerPayload | null {
  let best: BrokerPayload | null = null;
  let bestTs = -Infinity;
  for (const candle of candles) {
    const ts = toEpochSeconds(pick(candle, 'time', 'timestamp'));
    if (ts !== null && ts > bestTs) {
      best = candle;
      bestTs = ts;
    }
  }
  return best;
}
