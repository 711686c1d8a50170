/**
 * CTraderHttpConnector Unit Tests
 * Request shapes, idempotency headers and error mapping against a stubbed microservice
 */

import { CTraderHttpConnector, PositionNotFoundError, toCTraderPosition } from '../connectors/ctrader/CTraderHttpConnector';
import type { AmendOutcome } from '../connectors/ctrader/ProtectionAmendTask';
import { idempotencyKey } from '../connectors/ctrader/idempotency';
import { AuthenticationError, ConfigurationError, ConnectionError } from '../connectors/errors';
import { ctraderCredentials, header, RecordedRequest, StubResponse, stubAdapter } from './fixtures';

function build(handler: (req: RecordedRequest) => StubResponse, onAmendOutcome?: (outcome: AmendOutcome) => void) {
  const { adapter, requests } = stubAdapter(handler);
  const trades = { updateProtection: jest.fn().mockResolvedValue(1) };
  const connector = new CTraderHttpConnector(ctraderCredentials(), {
    baseUrl: 'http://ctrader.test/',
    apiPrefix: '/api/v1',
    sharedSecret: 'test-secret',
    trades,
    adapter,
    amendPolicy: { attempts: 2, delayMs: 0 },
    sleep: () => Promise.resolve(),
    onAmendOutcome,
  });
  return { connector, requests, trades };
}

describe('CTraderHttpConnector', () => {
  describe('construction', () => {
    it('should require the microservice base URL', () => {
      const { adapter } = stubAdapter(() => ({ status: 200 }));
      expect(
        () =>
          new CTraderHttpConnector(ctraderCredentials(), {
            apiPrefix: '/api/v1',
            sharedSecret: 'test-secret',
            trades: { updateProtection: jest.fn() },
            adapter,
          })
      ).toThrow(ConfigurationError);
    });

    it('should list every missing credential field', () => {
      let caught: unknown;
      try {
        new CTraderHttpConnector(ctraderCredentials({ accountId: '', accessToken: '' }), {
          baseUrl: 'http://ctrader.test',
          apiPrefix: '/api/v1',
          sharedSecret: 'test-secret',
          trades: { updateProtection: jest.fn() },
        });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ConfigurationError);
      expect(caught).toMatchObject({ issues: ['accountId', 'accessToken'] });
    });
  });

  describe('closePosition', () => {
    it('should send lots under volume_lots and lot_size with an idempotency key', async () => {
      const { connector, requests } = build(() => ({ status: 200, data: { server_response: { errorCode: 'OK' } } }));

      await connector.closePosition('555', 0.5, 'EURUSD');

      expect(requests).toHaveLength(1);
      const [req] = requests;
      expect(req.method).toBe('POST');
      expect(req.url).toBe('/api/v1/trade/close');
      expect(req.body).toEqual({
        account_id: '12345',
        position_id: '555',
        symbol: 'EURUSD',
        volume_lots: 0.5,
        lot_size: 0.5,
      });
      expect(req.body).not.toHaveProperty('volume');
      expect(header(req, 'Idempotency-Key')).toBe(idempotencyKey('12345', 'trade.close', req.body));
      expect(header(req, 'X-Request-ID')).toMatch(/^[0-9a-f]{32}$/);
      expect(header(req, 'Authorization')).toBe('Bearer test-secret');
    });

    it('should omit the volume for a full close', async () => {
      const { connector, requests } = build(() => ({ status: 200, data: {} }));

      await connector.closePosition('555', 0, 'EURUSD');

      expect(requests[0].body).toEqual({ account_id: '12345', position_id: '555', symbol: 'EURUSD' });
    });

    it('should raise when the broker reports an error code in a 200 body', async () => {
      const { connector } = build(() => ({
        status: 200,
        data: { server_response: { errorCode: 'POSITION_NOT_FOUND', description: 'Position is closed' } },
      }));

      await expect(connector.closePosition('555', 0.5, 'EURUSD')).rejects.toThrow(
        new ConnectionError('trade/close error: Position is closed')
      );
    });

    it('should map 401 to AuthenticationError', async () => {
      const { connector } = build(() => ({ status: 401, data: { detail: 'bad secret' } }));

      await expect(connector.closePosition('555', 0.5, 'EURUSD')).rejects.toBeInstanceOf(AuthenticationError);
    });
  });

  describe('placeTrade', () => {
    it('should send distances for MARKET orders and amend protection after the fill', async () => {
      let resolveOutcome: (outcome: AmendOutcome) => void = () => undefined;
      const outcome = new Promise<AmendOutcome>((resolve) => {
        resolveOutcome = resolve;
      });
      const { connector, requests, trades } = build((req) => {
        if (req.url.endsWith('/trade/place')) {
          return {
            status: 200,
            data: { server_response: { order: { orderId: 9 }, position: { positionId: 555, price: 1.2 } } },
          };
        }
        if (req.url.endsWith('/symbol-info')) {
          return { status: 200, data: { symbol: 'EURUSD', digits: 5 } };
        }
        return { status: 200, data: {} };
      }, resolveOutcome);

      const result = await connector.placeTrade({
        symbol: 'EURUSD',
        lotSize: 0.1,
        direction: 'BUY',
        orderType: 'MARKET',
        slDistance: 200,
        tpDistance: 300,
      });

      expect(result).toMatchObject({ orderId: '9', status: 'filled', openedPositionTicket: '555' });
      expect(requests[0].body).toEqual({
        account_id: '12345',
        symbol: 'EURUSD',
        direction: 'BUY',
        lot_size: 0.1,
        order_type: 'MARKET',
        sl_distance: 200,
        slDistance: 200,
        tp_distance: 300,
        tpDistance: 300,
      });

      const settled = await outcome;
      expect(settled.status).toBe('updated');

      const amend = requests.find((r) => r.url === '/api/v1/trade/modify-protection');
      expect(amend?.body.position_id).toBe(555);
      expect(amend?.body.sl).toBeCloseTo(1.198, 10);
      expect(amend?.body.tp).toBeCloseTo(1.203, 10);
      expect(trades.updateProtection).toHaveBeenCalledWith('3f0c2a9e-1d2b-4c5d-8e9f-0a1b2c3d4e5f', '555', {
        stopLoss: expect.closeTo(1.198, 10),
        takeProfit: expect.closeTo(1.203, 10),
      });
    });

    it('should take the open price when the reported fill price is zero', async () => {
      let resolveOutcome: (outcome: AmendOutcome) => void = () => undefined;
      const outcome = new Promise<AmendOutcome>((resolve) => {
        resolveOutcome = resolve;
      });
      const { connector, requests } = build((req) => {
        if (req.url.endsWith('/trade/place')) {
          return {
            status: 200,
            data: { server_response: { position: { positionId: 555, price: 0, openPrice: 1.2 } } },
          };
        }
        if (req.url.endsWith('/symbol-info')) {
          return { status: 200, data: { digits: 5 } };
        }
        return { status: 200, data: {} };
      }, resolveOutcome);

      await connector.placeTrade({ symbol: 'EURUSD', lotSize: 0.1, direction: 'BUY', orderType: 'MARKET', slDistance: 200 });

      expect((await outcome).status).toBe('updated');
      const amend = requests.find((r) => r.url === '/api/v1/trade/modify-protection');
      expect(amend?.body.sl).toBeCloseTo(1.198, 10);
      expect(requests.some((r) => r.url.endsWith('/price'))).toBe(false);
    });

    it('should send absolute levels for LIMIT orders and schedule nothing', async () => {
      const { connector, requests } = build(() => ({ status: 200, data: { server_response: { order: { orderId: 4 } } } }));

      const result = await connector.placeTrade({
        symbol: 'EURUSD',
        lotSize: 0.2,
        direction: 'SELL',
        orderType: 'LIMIT',
        limitPrice: 1.105,
        stopLoss: 1.11,
        takeProfit: 1.09,
      });

      expect(result.status).toBe('pending');
      expect(requests).toHaveLength(1);
      expect(requests[0].body).toMatchObject({ limit_price: 1.105, sl: 1.11, tp: 1.09 });
    });
  });

  describe('reads', () => {
    it('should raise PositionNotFoundError on a 404 position lookup', async () => {
      const { connector } = build(() => ({ status: 404, data: { detail: 'not found' } }));

      await expect(connector.getPositionDetails('777')).rejects.toBeInstanceOf(PositionNotFoundError);
    });

    it('should pass the account id and async flag as query parameters', async () => {
      const { connector, requests } = build(() => ({
        status: 200,
        data: { balance: '1000.5', equity: 990, margin: 10, free_margin: 980, margin_level: 9900 },
      }));

      const info = await connector.getAccountInfo();

      expect(requests[0].params).toEqual({ account_id: '12345', async: '1' });
      expect(info).toEqual({
        balance: 1000.5,
        equity: 990,
        margin: 10,
        freeMargin: 980,
        marginLevel: 9900,
        currency: 'USD',
      });
    });

    it('should report a closed position with summed deal totals during trade sync', async () => {
      const { connector } = build((req) => {
        if (req.url.endsWith('/position-details')) return { status: 404 };
        if (req.url.endsWith('/symbol-info')) return { status: 200, data: { contract_size: 100000 } };
        return {
          status: 200,
          data: {
            deals: [
              { deal_id: 1, direction: 'BUY', volume_units: 10000, price: 1.1, timestamp: 1700000000, profit: 0 },
              { deal_id: 2, direction: 'SELL', volume_units: 10000, price: 1.105, timestamp: 1700000600, profit: 50, commission: -1 },
            ],
          },
        };
      });

      const sync = await connector.fetchTradeSyncData('555', 'EURUSD');

      expect(sync.isClosedOnPlatform).toBe(true);
      expect(sync.platformRemainingSize).toBe(0);
      expect(sync.deals.map((d) => d.volume)).toEqual([0.1, 0.1]);
      expect(sync.lastDealPrice).toBe(1.105);
      expect(sync.latestDealTimestamp).toBe(1700000600);
      expect(sync.finalProfit).toBe(50);
      expect(sync.finalCommission).toBe(-1);
      expect(sync.finalSwap).toBe(0);
    });
  });

  describe('toCTraderPosition', () => {
    it('should derive lots from units per lot', () => {
      expect(toCTraderPosition({ position_id: 1, volume_units: 5000, units_per_lot: 100000 }).volume).toBe(0.05);
    });

    it('should treat a bare volume as cent units', () => {
      expect(toCTraderPosition({ positionId: 2, volume: 25, direction: 'sell' })).toMatchObject({
        positionId: '2',
        volume: 0.25,
        direction: 'SELL',
      });
    });
  });
});
