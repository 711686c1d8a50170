/**
 * cTrader HTTP connector
 * Delegates every call to the cTrader microservice under {base}{prefix}/.
 * Write calls carry Idempotency-Key / X-Request-ID headers. Live data is fanned
 * out headlessly by the microservice, so listener registration is a no-op.
 */

import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import { TradingPlatformConnector, brokerMessage } from '../base';
import { AuthenticationError, ConfigurationError, ConnectionError } from '../errors';
import {
  asRecord,
  asRecordArray,
  firstTruthy,
  isRecord,
  parseTimestamp,
  pick,
  toEpochSeconds,
  toFloat,
  toStr,
} from '../normalize';
import { LoggerFactory } from '../../logging/logger';
import { writeHeaders } from './idempotency';
import {
  AmendOutcomeListener,
  AmendPolicy,
  DEFAULT_AMEND_POLICY,
  ProtectionAmendTask,
  ProtectionLevels,
} from './ProtectionAmendTask';
import type {
  AccountInfo,
  BrokerPayload,
  CandleData,
  CandleRange,
  CTraderCredentials,
  Platform,
  PositionInfo,
  PriceData,
  SymbolInfo,
  SyncDeal,
  TradeRequest,
  TradeResult,
  TradeSyncData,
} from '../types';

const logger = LoggerFactory.getLogger('CTraderHttpConnector');

const SUPPORTED_SYMBOLS = ['EURUSD', 'GBPUSD', 'USDJPY', 'XAUUSD'];
const REQUEST_LOG_LIMIT = 2000;
const RESPONSE_LOG_LIMIT = 3000;
const OK_ERROR_CODES = new Set(['OK', 'SUCCESS', 'NONE']);

/** Local mirror of broker-side protection levels */
export interface TradeProtectionStore {
  updateProtection(accountId: string, positionId: string, levels: ProtectionLevels): Promise<number>;
}

export interface CTraderConnectorOptions {
  baseUrl?: string;
  apiPrefix: string;
  sharedSecret?: string;
  trades: TradeProtectionStore;
  amendPolicy?: AmendPolicy;
  onAmendOutcome?: AmendOutcomeListener;
  /** Custom axios adapter (tests) */
  adapter?: AxiosAdapter;
  /** Delay used between trade-update retries (tests) */
  sleep?: (ms: number) => Promise<void>;
}

/** position-details returned 404 */
export class PositionNotFoundError extends ConnectionError {}

export function truncate(text: string, limit: number): string {
  if (text.length <= limit) return text;
  return `${text.slice(0, limit)}... [truncated ${text.length - limit} chars]`;
}

function bodyText(data: unknown): string {
  if (data === undefined || data === null) return '';
  return typeof data === 'string' ? data : JSON.stringify(data);
}

// ==================== Payload conversion ====================

/**
 * Lots from volume_lots / lots, else units / units_per_lot, else legacy cent units / 100
 */
export function toCTraderPosition(p: BrokerPayload): PositionInfo {
  const netQty = toFloat(p.netQty, 0);
  const rawDirection = toStr(pick(p, 'direction', 'side')) || (netQty >= 0 ? 'BUY' : 'SELL');

  let lots: number;
  const explicit = typeof p.volume_lots === 'number' ? p.volume_lots : typeof p.lots === 'number' ? p.lots : null;
  if (explicit !== null) {
    lots = explicit;
  } else {
    const units = p.volume_units !== undefined && p.volume_units !== null ? p.volume_units : p.volume;
    const unitsPerLot = p.units_per_lot;
    if (typeof units === 'number' && typeof unitsPerLot === 'number' && unitsPerLot > 0) {
      lots = units / unitsPerLot;
    } else {
      const legacy = toFloat(pick(p, 'volume', 'quantity'), 0);
      lots = legacy ? legacy / 100 : 0;
    }
  }

  return {
    positionId: toStr(pick(p, 'position_id', 'positionId', 'id')) ?? '',
    symbol: toStr(p.symbol) ?? '',
    direction: rawDirection.toUpperCase().startsWith('B') ? 'BUY' : 'SELL',
    volume: lots,
    openPrice: toFloat(pick(p, 'open_price', 'openPrice'), 0),
    currentPrice: toFloat(pick(p, 'current_price', 'currentPrice', 'price'), 0),
    stopLoss: toFloat(p.sl) ?? undefined,
    takeProfit: toFloat(p.tp) ?? undefined,
    profit: toFloat(p.profit, 0),
    swap: toFloat(p.swap, 0),
    commission: toFloat(p.commission, 0),
  };
}

function num(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function toCTraderDeal(d: BrokerPayload, symbol: string, contractSize: number | null): SyncDeal {
  const direction = (toStr(d.direction) ?? '').toUpperCase();
  const volumeLots = num(d.volume_lots);
  const volumeUnits = num(d.volume_units);
  const unitsPerLot = num(d.units_per_lot);

  let volume: number | null = null;
  if (volumeLots !== null) {
    volume = volumeLots;
  } else if (volumeUnits !== null && unitsPerLot !== null && unitsPerLot > 0) {
    volume = volumeUnits / unitsPerLot;
  } else if (volumeUnits !== null && contractSize !== null && contractSize > 0) {
    volume = volumeUnits / contractSize;
  }

  const orderRaw = toStr(d.order_id);
  return {
    ticket: toStr(d.deal_id),
    symbol,
    type: direction === 'BUY' ? 0 : direction === 'SELL' ? 1 : null,
    volume,
    price: num(d.price),
    order: orderRaw !== null && /^\d+$/.test(orderRaw) ? Number(orderRaw) : null,
    time: toEpochSeconds(d.timestamp),
    profit: num(d.profit),
    commission: num(d.commission),
    swap: num(d.swap),
    reason: null,
  };
}

/**
 * cTrader reports tradeData.volume in cent units; scale to lots and keep the original
 */
export function scaleTradeVolume(data: BrokerPayload): BrokerPayload {
  const sr = asRecord(data.server_response);
  const order = asRecord(sr.order);
  const tradeData = asRecord(order.tradeData);
  const volume = toFloat(tradeData.volume);
  if (volume === null) return data;
  return {
    ...data,
    server_response: {
      ...sr,
      order: {
        ...order,
        tradeData: { ...tradeData, volume_original: tradeData.volume, volume: volume / 100 },
      },
    },
  };
}

export function normalizeTradeResult(data: BrokerPayload): TradeResult {
  const sr = asRecord(data.server_response);
  const order = asRecord(sr.order);
  const position = asRecord(sr.position);
  const orderId = toStr(pick(order, 'orderId') ?? pick(data, 'orderId')) ?? undefined;
  const positionId = toStr(position.positionId) ?? undefined;

  const executed = toFloat(order.executedVolume, 0);
  const volume = toFloat(asRecord(order.tradeData).volume) || toFloat(data.volume, 0);
  const positionPrice = toFloat(position.price, 0);
  const filled = (Boolean(positionId) && positionPrice > 0) || (volume > 0 && executed > 0 && executed >= volume);
  const status = filled ? 'filled' : 'pending';

  const normalized: BrokerPayload = {
    order_id: orderId ?? null,
    status,
    opened_position_ticket: positionId ?? null,
  };
  if (Object.keys(sr).length > 0) {
    normalized.server_response = sr;
  }
  for (const key of ['accepted', 'client_order_id', 'symbol', 'volume', 'side', 'order_type']) {
    if (key in data) {
      normalized[key] = data[key];
    }
  }

  return { orderId, status, openedPositionTicket: positionId, raw: normalized };
}

// ==================== Connector ====================

export class CTraderHttpConnector extends TradingPlatformConnector {
  readonly accountId: string;
  readonly internalAccountId: string;
  private http: AxiosInstance;
  private prefix: string;
  private connected = false;
  private amendTask: ProtectionAmendTask;
  private onAmendOutcome?: AmendOutcomeListener;

  constructor(credentials: CTraderCredentials, options: CTraderConnectorOptions) {
    super();
    const missing: string[] = [];
    if (!credentials.accountId) missing.push('accountId');
    if (!credentials.accessToken) missing.push('accessToken');
    if (!credentials.internalAccountId) missing.push('internalAccountId');
    if (missing.length > 0) {
      throw new ConfigurationError(`Missing required cTrader credentials: ${missing.join(', ')}`, missing);
    }
    if (!options.baseUrl) {
      throw new ConfigurationError('CTRADER_API_BASE_URL is not configured', ['CTRADER_API_BASE_URL']);
    }
    if (!options.sharedSecret) {
      throw new ConfigurationError('INTERNAL_SHARED_SECRET is not configured', ['INTERNAL_SHARED_SECRET']);
    }

    this.accountId = String(credentials.accountId);
    this.internalAccountId = String(credentials.internalAccountId);
    this.prefix = options.apiPrefix;
    this.onAmendOutcome = options.onAmendOutcome;

    this.http = axios.create({
      baseURL: options.baseUrl.replace(/\/+$/, ''),
      timeout: 20000,
      headers: { Authorization: `Bearer ${options.sharedSecret}` },
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });

    const trades = options.trades;
    this.amendTask = new ProtectionAmendTask(
      {
        fetchPrice: (symbol) => this.getJson('price', { account_id: this.accountId, symbol }, 'price'),
        fetchSymbolInfo: (symbol) => this.getJson('symbol-info', { account_id: this.accountId, symbol }, 'symbol-info'),
        amendProtection: (positionId, symbol, levels) => this.autofixProtection(positionId, symbol, levels),
        updateTrade: (accountId, positionId, levels) => trades.updateProtection(accountId, positionId, levels),
      },
      options.amendPolicy ?? DEFAULT_AMEND_POLICY,
      options.sleep
    );
  }

  private path(endpoint: string): string {
    return `${this.prefix}/${endpoint.replace(/^\/+/, '')}`;
  }

  // ==================== HTTP helpers ====================

  private async send(
    method: 'get' | 'post',
    endpoint: string,
    payload: BrokerPayload,
    headers: Record<string, string> = {},
    timeout?: number
  ): Promise<AxiosResponse<unknown>> {
    try {
      return method === 'get'
        ? await this.http.get(this.path(endpoint), { params: payload, headers, timeout })
        : await this.http.post(this.path(endpoint), payload, { headers, timeout });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConnectionError(`${endpoint} request failed: ${message}`);
    }
  }

  private ensureOk(resp: AxiosResponse<unknown>, endpoint: string): void {
    if (resp.status === 401) {
      throw new AuthenticationError('Unauthorized');
    }
    if (resp.status >= 400) {
      const err = isRecord(resp.data) ? resp.data.error : undefined;
      const msg = brokerMessage(err) ?? (bodyText(resp.data) || resp.statusText);
      throw new ConnectionError(`${endpoint} failed: ${resp.status} ${msg}`);
    }
  }

  private async getJson(endpoint: string, params: BrokerPayload, action: string): Promise<BrokerPayload> {
    const resp = await this.send('get', endpoint, params);
    this.ensureOk(resp, action);
    return asRecord(resp.data);
  }

  private async write(endpoint: string, operation: string, body: BrokerPayload): Promise<AxiosResponse<unknown>> {
    const headers = writeHeaders(this.accountId, operation, body);
    const xrid = headers['X-Request-ID'];
    const idem = headers['Idempotency-Key'];
    logger.info(
      `ctrader.${operation} request xrid=${xrid} idem=${idem} payload=${truncate(JSON.stringify(body), REQUEST_LOG_LIMIT)}`
    );
    const resp = await this.send('post', endpoint, body, { ...headers });
    logger.info(
      `ctrader.${operation} response xrid=${xrid} idem=${idem} status=${resp.status} body=${truncate(
        bodyText(resp.data),
        RESPONSE_LOG_LIMIT
      )}`
    );
    return resp;
  }

  private statusOr(resp: AxiosResponse<unknown>): BrokerPayload {
    return isRecord(resp.data) ? resp.data : { status: resp.status };
  }

  // ==================== Connection ====================

  async connect(): Promise<BrokerPayload> {
    const resp = await this.send('post', 'connect', { account_id: this.accountId }, {}, 15000);
    if (resp.status === 401) {
      throw new AuthenticationError('cTrader microservice auth failed');
    }
    this.connected = true;
    return this.statusOr(resp);
  }

  async disconnect(): Promise<BrokerPayload> {
    try {
      const resp = await this.send('post', 'disconnect', { account_id: this.accountId }, {}, 10000);
      return this.statusOr(resp);
    } catch (error) {
      logger.warn('cTrader disconnect failed', {
        accountId: this.internalAccountId,
        error: error instanceof Error ? error.message : String(error),
      });
      return { status: 'disconnected' };
    } finally {
      this.connected = false;
    }
  }

  isConnected(): boolean {
    return this.connected;
  }

  // ==================== Snapshots ====================

  async getAccountInfo(): Promise<AccountInfo> {
    const data = await this.getJson('account-info', { account_id: this.accountId, async: '1' }, 'account-info');
    return {
      balance: toFloat(data.balance, 0),
      equity: toFloat(data.equity, 0),
      margin: toFloat(data.margin, 0),
      freeMargin: toFloat(pick(data, 'free_margin', 'freeMargin'), 0),
      marginLevel: toFloat(pick(data, 'margin_level', 'marginLevel'), 0),
      currency: toStr(data.currency) || 'USD',
    };
  }

  async getOpenPositions(): Promise<PositionInfo[]> {
    const data = await this.getJson('open-positions', { account_id: this.accountId, async: '1' }, 'open-positions');
    return asRecordArray(data.open_positions).map(toCTraderPosition);
  }

  async getPositionDetails(positionId: string): Promise<PositionInfo> {
    const resp = await this.send(
      'get',
      'position-details',
      { account_id: this.accountId, position_id: positionId, async: '1' },
      {},
      15000
    );
    if (resp.status === 404) {
      throw new PositionNotFoundError('Position not found');
    }
    this.ensureOk(resp, 'position-details');
    return toCTraderPosition(asRecord(resp.data));
  }

  async getPendingOrders(): Promise<BrokerPayload[]> {
    const data = await this.getJson('pending-orders', { account_id: this.accountId, async: '1' }, 'pending-orders');
    return asRecordArray(pick(data, 'pending_orders', 'orders'));
  }

  // ==================== Writes ====================

  async placeTrade(request: TradeRequest): Promise<TradeResult> {
    const isMarket = request.orderType.toUpperCase() === 'MARKET';
    const body: BrokerPayload = {
      account_id: this.accountId,
      symbol: request.symbol,
      direction: request.direction,
      lot_size: request.lotSize,
      order_type: request.orderType,
    };
    if (request.limitPrice !== undefined) {
      body.limit_price = request.limitPrice;
    }
    if (isMarket) {
      // MARKET orders take SL/TP as distances; absolutes are set after the fill
      if (request.slDistance !== undefined) {
        body.sl_distance = request.slDistance;
        body.slDistance = request.slDistance;
      }
      if (request.tpDistance !== undefined) {
        body.tp_distance = request.tpDistance;
        body.tpDistance = request.tpDistance;
      }
    } else {
      if (request.stopLoss !== undefined) body.sl = request.stopLoss;
      if (request.takeProfit !== undefined) body.tp = request.takeProfit;
    }

    const resp = await this.write('trade/place', 'trade.place', body);
    if (resp.status >= 400 && resp.status !== 401) {
      logger.error('ctrader.place_trade error', undefined, {
        internalAccountId: this.internalAccountId,
        accountId: this.accountId,
        symbol: request.symbol,
        statusCode: resp.status,
      });
    }
    this.ensureOk(resp, 'trade/place');

    if (!isRecord(resp.data)) {
      return { status: 'pending', raw: { status: resp.status } };
    }
    const data = scaleTradeVolume(resp.data);
    const result = normalizeTradeResult(data);

    if (isMarket && (request.slDistance !== undefined || request.tpDistance !== undefined)) {
      this.scheduleAmend(request, data);
    }
    return result;
  }

  private scheduleAmend(request: TradeRequest, data: BrokerPayload): void {
    const sr = asRecord(data.server_response);
    const position = asRecord(sr.position);
    const order = asRecord(sr.order);
    const positionId = toStr(position.positionId ?? sr.positionId ?? order.positionId);
    if (!positionId) {
      logger.warn('Protection amend not scheduled: no position id in response', { symbol: request.symbol });
      return;
    }
    const fillPrice = toFloat(firstTruthy(position.price, position.openPrice, order.executionPrice, sr.executionPrice));

    logger.info('Scheduling protection amend', {
      positionId,
      fillPrice,
      direction: request.direction,
      slDistance: request.slDistance,
      tpDistance: request.tpDistance,
    });
    this.amendTask.launch(
      {
        internalAccountId: this.internalAccountId,
        positionId,
        symbol: request.symbol,
        direction: request.direction,
        slDistance: request.slDistance,
        tpDistance: request.tpDistance,
        fillPrice,
      },
      this.onAmendOutcome
    );
  }

  private async autofixProtection(positionId: string, symbol: string, levels: ProtectionLevels): Promise<void> {
    const body: BrokerPayload = {
      account_id: this.accountId,
      position_id: Number(positionId),
      symbol,
    };
    if (levels.stopLoss !== undefined) body.sl = levels.stopLoss;
    if (levels.takeProfit !== undefined) body.tp = levels.takeProfit;
    const resp = await this.write('trade/modify-protection', 'trade.modify_protection.autofix', body);
    this.ensureOk(resp, 'trade/modify-protection');
  }

  async closePosition(positionId: string, volume: number, symbol: string): Promise<BrokerPayload> {
    const body: BrokerPayload = {
      account_id: this.accountId,
      position_id: positionId,
      symbol,
    };
    // The microservice converts lots to native units; a bare `volume` is ambiguous
    if (volume > 0) {
      body.volume_lots = volume;
      body.lot_size = volume;
    }

    const resp = await this.write('trade/close', 'trade.close', body);
    if (resp.status >= 400 && resp.status !== 401) {
      logger.error('ctrader.close_position error', undefined, {
        internalAccountId: this.internalAccountId,
        accountId: this.accountId,
        symbol,
        positionId,
        statusCode: resp.status,
      });
    }
    this.ensureOk(resp, 'trade/close');

    const data = this.statusOr(resp);
    const sr = asRecord(data.server_response);
    const errorCode = toStr(sr.errorCode);
    if (errorCode && !OK_ERROR_CODES.has(errorCode.toUpperCase())) {
      throw new ConnectionError(`trade/close error: ${toStr(sr.description) || errorCode}`);
    }
    return data;
  }

  async modifyPositionProtection(
    positionId: string,
    symbol: string,
    stopLoss?: number | null,
    takeProfit?: number | null
  ): Promise<BrokerPayload> {
    const body: BrokerPayload = {
      account_id: this.accountId,
      position_id: positionId,
      symbol,
      // explicit nulls clear the level
      sl: stopLoss ?? null,
      tp: takeProfit ?? null,
    };
    const resp = await this.write('trade/modify-protection', 'trade.modify_protection', body);
    this.ensureOk(resp, 'trade/modify-protection');
    return this.statusOr(resp);
  }

  async cancelOrder(orderId: string): Promise<BrokerPayload> {
    const body: BrokerPayload = { account_id: this.accountId, order_id: orderId };
    const resp = await this.write('order/cancel', 'order.cancel', body);
    this.ensureOk(resp, 'order/cancel');
    return this.statusOr(resp);
  }

  // ==================== Trade sync ====================

  async fetchTradeSyncData(positionId: string, symbol: string): Promise<TradeSyncData> {
    let remaining = 0;
    let closed = false;
    try {
      const position = await this.getPositionDetails(positionId);
      remaining = position.volume || 0;
    } catch (error) {
      if (!(error instanceof PositionNotFoundError)) throw error;
      closed = true;
    }

    let contractSize: number | null = null;
    try {
      const info = await this.getSymbolInfo(symbol);
      contractSize = num(pick(info, 'contract_size', 'contractSize'));
    } catch (error) {
      logger.debug('Symbol info for deal conversion unavailable', {
        symbol,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    let rawDeals: BrokerPayload[] = [];
    try {
      const resp = await this.send('get', 'position-deals', { account_id: this.accountId, position_id: positionId }, {}, 15000);
      if (resp.status === 401) {
        throw new AuthenticationError('Unauthorized');
      }
      if (resp.status === 501) {
        rawDeals = [];
      } else if (resp.status >= 400) {
        logger.warn(`position-deals failed: ${resp.status} ${truncate(bodyText(resp.data), RESPONSE_LOG_LIMIT)}`);
      } else {
        rawDeals = asRecordArray(asRecord(resp.data).deals);
      }
    } catch (error) {
      if (error instanceof AuthenticationError) throw error;
      logger.warn('position-deals http error', { error: error instanceof Error ? error.message : String(error) });
    }

    const deals = rawDeals.map((d) => toCTraderDeal(d, symbol, contractSize));

    let lastDealPrice: number | null = null;
    let latestTs: number | null = null;
    let profit = 0;
    let commission = 0;
    let swap = 0;
    for (const deal of deals) {
      profit += deal.profit ?? 0;
      commission += deal.commission ?? 0;
      swap += deal.swap ?? 0;
      if (deal.time !== null && (latestTs === null || deal.time > latestTs)) {
        latestTs = deal.time;
        lastDealPrice = deal.price ?? lastDealPrice;
      }
    }

    const hasDeals = deals.length > 0;
    return {
      deals,
      platformRemainingSize: remaining,
      isClosedOnPlatform: closed,
      lastDealPrice,
      latestDealTimestamp: latestTs,
      finalProfit: hasDeals ? profit : null,
      finalCommission: hasDeals ? commission : null,
      finalSwap: hasDeals ? swap : null,
    };
  }

  // ==================== Market data ====================

  async getLivePrice(symbol: string): Promise<PriceData> {
    const resp = await this.send('get', 'price', { account_id: this.accountId, symbol }, {}, 10000);
    this.ensureOk(resp, 'price');
    if (!isRecord(resp.data)) {
      throw new ConnectionError('price returned empty or non-JSON body');
    }
    return {
      symbol,
      bid: toFloat(resp.data.bid, 0),
      ask: toFloat(resp.data.ask, 0),
      timestamp: parseTimestamp(resp.data.timestamp),
    };
  }

  async getHistoricalCandles(symbol: string, timeframe: string, range: CandleRange): Promise<CandleData[]> {
    const params: BrokerPayload = { account_id: this.accountId, symbol, timeframe, async: '1' };
    if ('count' in range) {
      params.count = range.count;
    } else {
      params.start_time = range.start.toISOString();
      if (range.end) params.end_time = range.end.toISOString();
    }
    const data = await this.getJson('candles', params, 'candles');
    return asRecordArray(data.candles).map((c) => ({
      symbol,
      timeframe,
      open: toFloat(c.open, 0),
      high: toFloat(c.high, 0),
      low: toFloat(c.low, 0),
      close: toFloat(c.close, 0),
      volume: toFloat(pick(c, 'volume', 'tick_volume'), 0),
      timestamp: parseTimestamp(pick(c, 'time', 'timestamp')),
    }));
  }

  async getSymbolInfo(symbol: string): Promise<SymbolInfo> {
    const data = await this.getJson('symbol-info', { account_id: this.accountId, symbol }, 'symbol-info');
    return { ...data, symbol: toStr(data.symbol) || symbol };
  }

  // ==================== Live subscriptions (headless fan-out) ====================

  private async subscription(endpoint: string, body: BrokerPayload): Promise<void> {
    const resp = await this.send('post', endpoint, { account_id: this.accountId, ...body }, {}, 10000);
    this.ensureOk(resp, endpoint);
    logger.logAccount('info', `cTrader ${endpoint} ${JSON.stringify(body)}`, this.internalAccountId);
  }

  subscribePrice(symbol: string): Promise<void> {
    return this.subscription('subscribe/price', { symbol });
  }

  unsubscribePrice(symbol: string): Promise<void> {
    return this.subscription('unsubscribe/price', { symbol });
  }

  subscribeCandles(symbol: string, timeframe: string): Promise<void> {
    return this.subscription('subscribe/candles', { symbol, timeframe });
  }

  unsubscribeCandles(symbol: string, timeframe: string): Promise<void> {
    return this.subscription('unsubscribe/candles', { symbol, timeframe });
  }

  registerAccountInfoListener(): void {
    // fan-out is headless
  }

  registerPositionUpdateListener(): void {
    // fan-out is headless
  }

  registerPositionClosedListener(): void {
    // fan-out is headless
  }

  // ==================== Utility ====================

  getPlatformName(): Platform {
    return 'cTrader';
  }

  getSupportedSymbols(): string[] {
    return [...SUPPORTED_SYMBOLS];
  }

  async validateSymbol(symbol: string): Promise<boolean> {
    return typeof symbol === 'string' && symbol.length > 0;
  }
}
