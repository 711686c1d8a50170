/**
 * Mt5Connector Unit Tests
 * Payload conversion, error translation and headless subscriptions
 */

import { Mt5Connector, toMt5Candle, toMt5Position, toMt5TradeSyncData } from '../connectors/mt5/Mt5Connector';
import { Mt5ConnectionManager } from '../connectors/mt5/Mt5ConnectionManager';
import { HeadlessSubscriptionOrchestrator } from '../connectors/mt5/HeadlessOrchestrator';
import { AuthenticationError, ConfigurationError, ConnectionError } from '../connectors/errors';
import type { PriceData } from '../connectors/types';
import { ACCOUNT_ID, mockUpstream, mt5Credentials, RecordedRequest, StubResponse, stubAdapter } from './fixtures';

describe('Mt5Connector', () => {
  let manager: Mt5ConnectionManager;

  function build(handler: (req: RecordedRequest) => StubResponse) {
    const stub = stubAdapter(handler);
    manager = new Mt5ConnectionManager({ adapter: stub.adapter, pollIntervalMs: 60000 });
    const upstream = mockUpstream();
    const orchestrator = new HeadlessSubscriptionOrchestrator(upstream);
    const connector = new Mt5Connector(mt5Credentials(), { manager, orchestrator });
    return { connector, upstream, orchestrator, requests: stub.requests };
  }

  afterEach(() => {
    manager.closeAll();
  });

  it('should reject incomplete credentials', () => {
    manager = new Mt5ConnectionManager();
    const orchestrator = new HeadlessSubscriptionOrchestrator(mockUpstream());

    expect(() => new Mt5Connector(mt5Credentials({ login: 0, password: '' }), { manager, orchestrator })).toThrow(
      new ConfigurationError('Missing required MT5 credentials: login, password')
    );
  });

  it('should translate a 401 into AuthenticationError with the broker detail', async () => {
    const { connector } = build(() => ({ status: 401, data: { detail: 'Invalid credentials' } }));

    const call = connector.getAccountInfo();

    await expect(call).rejects.toBeInstanceOf(AuthenticationError);
    await expect(call).rejects.toThrow('Failed to get MT5 account info: Invalid credentials');
  });

  it('should translate other HTTP failures into ConnectionError', async () => {
    const { connector } = build(() => ({ status: 502, data: { error: 'gateway down' } }));

    await expect(connector.getLivePrice('EURUSD')).rejects.toThrow(
      new ConnectionError('Failed to get MT5 live price: gateway down')
    );
  });

  it('should split pending orders out of the open positions list', async () => {
    const { connector } = build(() => ({
      status: 200,
      data: {
        open_positions: [
          { ticket: 11, symbol: 'EURUSD', type: 0, volume: 0.1, price_open: 1.1, sl: 0, tp: 1.2 },
          { ticket: 12, symbol: 'GBPUSD', type: 'pending_order', volume: 0.2 },
        ],
      },
    }));

    const positions = await connector.getOpenPositions();
    const pending = await connector.getPendingOrders();

    expect(positions).toHaveLength(1);
    expect(positions[0]).toMatchObject({ positionId: '11', direction: 'BUY', stopLoss: undefined, takeProfit: 1.2 });
    expect(pending).toEqual([{ ticket: 12, symbol: 'GBPUSD', type: 'pending_order', volume: 0.2 }]);
  });

  it('should reject a non-numeric ticket before calling the gateway', async () => {
    const { connector, requests } = build(() => ({ status: 200, data: {} }));

    await expect(connector.closePosition('abc', 0.1, 'EURUSD')).rejects.toThrow('Invalid MT5 position id: abc');
    expect(requests).toHaveLength(0);
  });

  it('should report a filled trade when the gateway returns a position', async () => {
    const { connector, requests } = build(() => ({ status: 200, data: { order_id: 77, position_id: 88 } }));

    const result = await connector.placeTrade({ symbol: 'EURUSD', lotSize: 0.1, direction: 'SELL', orderType: 'MARKET' });

    expect(result).toMatchObject({ orderId: '77', openedPositionTicket: '88', status: 'filled' });
    expect(requests[0].body).toMatchObject({ stop_loss: 0, take_profit: 0, limit_price: null });
  });

  it('should subscribe headlessly and feed socket prices to the callback', async () => {
    const { connector, upstream, orchestrator } = build(() => ({ status: 200, data: {} }));
    const prices: PriceData[] = [];

    await connector.subscribePrice('eurusd', (price) => prices.push(price));
    const client = manager.peek(ACCOUNT_ID);
    client?.dispatchMessage({ type: 'price', data: { symbol: 'EURUSD', bid: 1.1, ask: 1.1002, time: 1700000000 } });

    expect(upstream.start).toHaveBeenCalledTimes(1);
    expect(upstream.subscribePrice).toHaveBeenCalledWith(mt5Credentials(), 'EURUSD');
    expect(orchestrator.getPriceRefCount(ACCOUNT_ID, 'EURUSD')).toBe(1);
    expect(prices).toEqual([{ symbol: 'EURUSD', bid: 1.1, ask: 1.1002, timestamp: new Date(1700000000 * 1000) }]);
  });

  it('should detach the callback and release the upstream reference on unsubscribe', async () => {
    const { connector, upstream, orchestrator } = build(() => ({ status: 200, data: {} }));
    const callback = jest.fn();

    await connector.subscribePrice('EURUSD', callback);
    await connector.unsubscribePrice('EURUSD', callback);
    manager.peek(ACCOUNT_ID)?.dispatchMessage({ type: 'price', data: { symbol: 'EURUSD', bid: 1, ask: 1 } });

    expect(callback).not.toHaveBeenCalled();
    expect(upstream.unsubscribePrice).toHaveBeenCalledWith(mt5Credentials(), 'EURUSD');
    expect(orchestrator.getPriceRefCount(ACCOUNT_ID, 'EURUSD')).toBe(0);
  });

  it('should keep a callback registered twice until it is unsubscribed twice', async () => {
    const { connector, orchestrator } = build(() => ({ status: 200, data: {} }));
    const callback = jest.fn();
    const tick = { type: 'price', data: { symbol: 'EURUSD', bid: 1.1, ask: 1.2, time: 1700000000 } };

    await connector.subscribePrice('EURUSD', callback);
    await connector.subscribePrice('EURUSD', callback);
    await connector.unsubscribePrice('EURUSD', callback);
    manager.peek(ACCOUNT_ID)?.dispatchMessage(tick);

    expect(orchestrator.getPriceRefCount(ACCOUNT_ID, 'EURUSD')).toBe(1);
    expect(callback).toHaveBeenCalledTimes(1);

    await connector.unsubscribePrice('EURUSD', callback);
    manager.peek(ACCOUNT_ID)?.dispatchMessage(tick);

    expect(orchestrator.getPriceRefCount(ACCOUNT_ID, 'EURUSD')).toBe(0);
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('should count candle callback registrations the same way', async () => {
    const { connector, orchestrator } = build(() => ({ status: 200, data: {} }));
    const callback = jest.fn();
    const bar = {
      type: 'candle',
      data: { symbol: 'EURUSD', timeframe: 'M1', candle: { time: 1700000040, open: 1, high: 1, low: 1, close: 1 } },
    };

    await connector.subscribeCandles('EURUSD', 'M1', callback);
    await connector.subscribeCandles('EURUSD', 'M1', callback);
    await connector.unsubscribeCandles('EURUSD', 'M1', callback);
    manager.peek(ACCOUNT_ID)?.dispatchMessage(bar);

    expect(orchestrator.getCandleRefCount(ACCOUNT_ID, 'EURUSD', 'M1')).toBe(1);
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('should drop the shared client on disconnect', async () => {
    const { connector, requests } = build(() => ({ status: 200, data: { status: 'disconnected' } }));
    await connector.getAccountInfo();
    const client = manager.peek(ACCOUNT_ID);

    await connector.disconnect();

    expect(requests.map((r) => r.url).pop()).toMatch(/disconnect$/);
    expect(client?.isClosed()).toBe(true);
    expect(manager.peek(ACCOUNT_ID)).toBeUndefined();
    expect(connector.isConnected()).toBe(false);
  });
});

describe('MT5 payload conversion', () => {
  it('should map a SELL position and keep non-zero protection', () => {
    expect(
      toMt5Position({
        ticket: 5,
        symbol: 'XAUUSD',
        type: 1,
        volume: '0.3',
        price_open: 1900,
        price_current: 1890,
        sl: 1950,
        tp: 0,
        profit: 30,
      })
    ).toEqual({
      positionId: '5',
      symbol: 'XAUUSD',
      direction: 'SELL',
      volume: 0.3,
      openPrice: 1900,
      currentPrice: 1890,
      stopLoss: 1950,
      takeProfit: undefined,
      profit: 30,
      swap: 0,
      commission: 0,
    });
  });

  it('should prefer tick volume for candles', () => {
    const candle = toMt5Candle('EURUSD', 'M5', { time: 1700000000, open: 1, high: 2, low: 0.5, close: 1.5, tick_volume: 42, volume: 7 });

    expect(candle.volume).toBe(42);
    expect(candle.timestamp).toEqual(new Date(1700000000 * 1000));
  });

  it('should keep absent trade sync totals as null', () => {
    const sync = toMt5TradeSyncData(
      { deals: [{ ticket: 1, type: 1, volume: 0.1, price: 1.1, time: 1700000000 }], is_closed_on_platform: true },
      'EURUSD'
    );

    expect(sync).toEqual({
      deals: [
        {
          ticket: '1',
          symbol: 'EURUSD',
          type: 1,
          volume: 0.1,
          price: 1.1,
          order: null,
          time: 1700000000,
          profit: null,
          commission: null,
          swap: null,
          reason: null,
        },
      ],
      platformRemainingSize: 0,
      isClosedOnPlatform: true,
      lastDealPrice: null,
      latestDealTimestamp: null,
      finalProfit: null,
      finalCommission: null,
      finalSwap: null,
    });
  });
});
