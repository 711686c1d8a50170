/**
 * ProtectionAmendTask Unit Tests
 * Distance-to-price conversion and the retrying trade update
 */

import {
  AmendPorts,
  ProtectionAmendTask,
  computeProtection,
  referenceFromQuote,
  resolvePointSize,
} from '../connectors/ctrader/ProtectionAmendTask';
import { ACCOUNT_ID } from './fixtures';

function mockPorts(): jest.Mocked<AmendPorts> {
  return {
    fetchPrice: jest.fn().mockResolvedValue({ bid: 1.0998, ask: 1.1002 }),
    fetchSymbolInfo: jest.fn().mockResolvedValue({ digits: 5 }),
    amendProtection: jest.fn().mockResolvedValue(undefined),
    updateTrade: jest.fn().mockResolvedValue(1),
  };
}

describe('computeProtection', () => {
  it('should place BUY stop loss below and take profit above the entry', () => {
    const levels = computeProtection(1.1, 0.00001, 'BUY', 200, 300);

    expect(levels.stopLoss).toBeCloseTo(1.098, 10);
    expect(levels.takeProfit).toBeCloseTo(1.103, 10);
  });

  it('should invert the offsets for SELL', () => {
    const levels = computeProtection(1.1, 0.00001, 'SELL', 200, 300);

    expect(levels.stopLoss).toBeCloseTo(1.102, 10);
    expect(levels.takeProfit).toBeCloseTo(1.097, 10);
  });

  it('should only compute the requested levels', () => {
    expect(computeProtection(150, 0.01, 'BUY', undefined, 50)).toEqual({ takeProfit: 150.5 });
  });
});

describe('resolvePointSize', () => {
  it('should prefer digits', () => {
    expect(resolvePointSize({ digits: 3, pip_size: 0.1 })).toBeCloseTo(0.001, 12);
  });

  it('should fall back to pip size, then to 1', () => {
    expect(resolvePointSize({ pipSize: 0.01 })).toBe(0.01);
    expect(resolvePointSize({})).toBe(1);
  });

  it('should skip zero fields in favour of the next one', () => {
    expect(resolvePointSize({ digits: 0, money_digits: 2 })).toBeCloseTo(0.01, 12);
    expect(resolvePointSize({ digits: 0, pip_size: 0.0001 })).toBe(0.0001);
    expect(resolvePointSize({ moneyDigits: 0 })).toBe(1);
  });
});

describe('referenceFromQuote', () => {
  it('should use ask for BUY, bid for SELL', () => {
    expect(referenceFromQuote('BUY', { bid: 1.0, ask: 1.2 })).toBe(1.2);
    expect(referenceFromQuote('SELL', { bid: 1.0, ask: 1.2 })).toBe(1.0);
  });

  it('should return null without a usable quote', () => {
    expect(referenceFromQuote('BUY', { bid: 1.0 })).toBeNull();
  });
});

describe('ProtectionAmendTask', () => {
  const sleep = jest.fn().mockResolvedValue(undefined);

  beforeEach(() => {
    sleep.mockClear();
  });

  const request = {
    internalAccountId: ACCOUNT_ID,
    positionId: '555',
    symbol: 'EURUSD',
    direction: 'BUY' as const,
    slDistance: 200,
    tpDistance: 300,
    fillPrice: 1.1,
  };

  it('should amend at the broker and retry the trade update until the row exists', async () => {
    const ports = mockPorts();
    ports.updateTrade.mockResolvedValueOnce(0).mockResolvedValueOnce(0).mockResolvedValueOnce(1);
    const task = new ProtectionAmendTask(ports, { attempts: 5, delayMs: 500 }, sleep);

    const outcome = await task.run(request);

    expect(outcome.status).toBe('updated');
    expect(outcome).toMatchObject({ attempts: 3 });
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(500);
    expect(ports.fetchPrice).not.toHaveBeenCalled();

    const [positionId, symbol, levels] = ports.amendProtection.mock.calls[0];
    expect(positionId).toBe('555');
    expect(symbol).toBe('EURUSD');
    expect(levels.stopLoss).toBeCloseTo(1.098, 10);
    expect(levels.takeProfit).toBeCloseTo(1.103, 10);
  });

  it('should fall back to the live quote when the fill price is missing', async () => {
    const ports = mockPorts();
    const task = new ProtectionAmendTask(ports, { attempts: 1, delayMs: 0 }, sleep);

    await task.run({ ...request, fillPrice: null });

    expect(ports.fetchPrice).toHaveBeenCalledWith('EURUSD');
    const levels = ports.amendProtection.mock.calls[0][2];
    expect(levels.stopLoss).toBeCloseTo(1.1002 - 0.002, 10);
  });

  it('should report not_found once attempts are exhausted', async () => {
    const ports = mockPorts();
    ports.updateTrade.mockResolvedValue(0);
    const task = new ProtectionAmendTask(ports, { attempts: 3, delayMs: 10 }, sleep);

    const outcome = await task.run(request);

    expect(outcome).toMatchObject({ status: 'not_found', attempts: 3 });
    expect(ports.updateTrade).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('should not touch the trade row when the broker rejects the amend', async () => {
    const ports = mockPorts();
    ports.amendProtection.mockRejectedValue(new Error('TRADING_BAD_STOPS'));
    const task = new ProtectionAmendTask(ports, { attempts: 3, delayMs: 10 }, sleep);

    const outcome = await task.run(request);

    expect(outcome).toMatchObject({ status: 'amend_failed', error: 'TRADING_BAD_STOPS' });
    expect(ports.updateTrade).not.toHaveBeenCalled();
  });

  it('should skip when there is no reference price', async () => {
    const ports = mockPorts();
    ports.fetchPrice.mockResolvedValue({});
    const task = new ProtectionAmendTask(ports, { attempts: 1, delayMs: 0 }, sleep);

    await expect(task.run({ ...request, fillPrice: null })).resolves.toEqual({
      status: 'skipped',
      positionId: '555',
      reason: 'no reference price',
    });
    expect(ports.amendProtection).not.toHaveBeenCalled();
  });

  it('should deliver the outcome to the listener when launched detached', async () => {
    const ports = mockPorts();
    const task = new ProtectionAmendTask(ports, { attempts: 1, delayMs: 0 }, sleep);

    const outcome = await new Promise((resolve) => task.launch(request, resolve));

    expect(outcome).toMatchObject({ status: 'updated', positionId: '555' });
  });
});
