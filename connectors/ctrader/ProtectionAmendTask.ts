/**
 * Protection Amend Task
 *
 * After a MARKET order placed with SL/TP distances, converts the distances to
 * absolute prices around the fill, amends the position at the broker, then
 * mirrors the levels onto the local trade row. The row may not exist yet when
 * the task starts (the caller persists it after placeTrade returns), so the
 * update is retried per AmendPolicy.
 *
 * Runs detached from placeTrade. Every outcome is reported, never thrown.
 */

import { LoggerFactory } from '../../logging/logger';
import { firstTruthy, toFloat, toInt } from '../normalize';
import type { BrokerPayload, Direction } from '../types';

const logger = LoggerFactory.getLogger('ProtectionAmendTask');

export interface AmendPolicy {
  attempts: number;
  delayMs: number;
}

export const DEFAULT_AMEND_POLICY: AmendPolicy = { attempts: 10, delayMs: 500 };

export interface ProtectionLevels {
  stopLoss?: number;
  takeProfit?: number;
}

export interface AmendRequest {
  internalAccountId: string;
  positionId: string;
  symbol: string;
  direction: Direction;
  slDistance?: number;
  tpDistance?: number;
  /** Fill price from the order response, when the broker reported one */
  fillPrice: number | null;
}

export type AmendOutcome =
  | { status: 'updated'; positionId: string; levels: ProtectionLevels; attempts: number }
  | { status: 'not_found'; positionId: string; levels: ProtectionLevels; attempts: number }
  | { status: 'skipped'; positionId: string; reason: string }
  | { status: 'amend_failed'; positionId: string; levels: ProtectionLevels; error: string }
  | { status: 'error'; positionId: string; error: string };

export type AmendOutcomeListener = (outcome: AmendOutcome) => void;

/**
 * Broker and persistence calls the task needs
 */
export interface AmendPorts {
  fetchPrice(symbol: string): Promise<BrokerPayload>;
  fetchSymbolInfo(symbol: string): Promise<BrokerPayload>;
  /** Throws when the broker rejects the amend */
  amendProtection(positionId: string, symbol: string, levels: ProtectionLevels): Promise<void>;
  /** Returns the number of trade rows updated */
  updateTrade(internalAccountId: string, positionId: string, levels: ProtectionLevels): Promise<number>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Price step: 10^-digits when digits are known, else pip/point/tick size, else 1.
 * A zero field falls through to the next one.
 */
export function resolvePointSize(info: BrokerPayload): number {
  const digits = toInt(firstTruthy(info.digits, info.money_digits, info.moneyDigits));
  if (digits !== null && digits >= 0) {
    return Math.pow(10, -digits);
  }
  const step = toFloat(firstTruthy(info.pip_size, info.pipSize, info.point, info.tick_size, info.tickSize));
  if (step !== null && step > 0) {
    return step;
  }
  return 1;
}

/**
 * Live-price fallback: ask for BUY, bid for SELL, else mid
 */
export function referenceFromQuote(direction: Direction, quote: BrokerPayload): number | null {
  const bid = toFloat(quote.bid);
  const ask = toFloat(quote.ask);
  if (direction === 'BUY' && ask !== null) return ask;
  if (direction === 'SELL' && bid !== null) return bid;
  if (ask !== null && bid !== null) return (ask + bid) / 2;
  return null;
}

/**
 * BUY: SL below entry, TP above. SELL: inverted.
 */
export function computeProtection(
  entry: number,
  point: number,
  direction: Direction,
  slDistance?: number,
  tpDistance?: number
): ProtectionLevels {
  const sign = direction === 'BUY' ? 1 : -1;
  const levels: ProtectionLevels = {};
  if (slDistance !== undefined) {
    levels.stopLoss = entry - sign * slDistance * point;
  }
  if (tpDistance !== undefined) {
    levels.takeProfit = entry + sign * tpDistance * point;
  }
  return levels;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ProtectionAmendTask {
  constructor(
    private ports: AmendPorts,
    readonly policy: AmendPolicy = DEFAULT_AMEND_POLICY,
    private sleep: (ms: number) => Promise<void> = defaultSleep
  ) {}

  /**
   * Start the task without awaiting it
   */
  launch(request: AmendRequest, onOutcome?: AmendOutcomeListener): void {
    this.run(request)
      .then((outcome) => onOutcome?.(outcome))
      .catch((error: unknown) => {
        logger.error('Protection amend outcome listener failed', error, { positionId: request.positionId });
      });
  }

  async run(request: AmendRequest): Promise<AmendOutcome> {
    const { positionId } = request;
    let outcome: AmendOutcome;
    try {
      outcome = await this.execute(request);
    } catch (error) {
      outcome = { status: 'error', positionId, error: errorMessage(error) };
    }
    this.report(request, outcome);
    return outcome;
  }

  private async execute(request: AmendRequest): Promise<AmendOutcome> {
    const { positionId, symbol, direction } = request;

    if (request.slDistance === undefined && request.tpDistance === undefined) {
      return { status: 'skipped', positionId, reason: 'no distances requested' };
    }

    let entry = request.fillPrice;
    if (entry === null || entry <= 0) {
      try {
        entry = referenceFromQuote(direction, await this.ports.fetchPrice(symbol));
      } catch (error) {
        logger.warn('Live price lookup for protection amend failed', { positionId, error: errorMessage(error) });
        entry = null;
      }
    }
    if (entry === null || entry <= 0) {
      return { status: 'skipped', positionId, reason: 'no reference price' };
    }

    let point = 1;
    try {
      point = resolvePointSize(await this.ports.fetchSymbolInfo(symbol));
    } catch (error) {
      logger.warn('Symbol info lookup for protection amend failed', { positionId, error: errorMessage(error) });
    }

    const levels = computeProtection(entry, point, direction, request.slDistance, request.tpDistance);
    logger.info('Computed absolute protection', { positionId, entry, point, ...levels });

    try {
      await this.ports.amendProtection(positionId, symbol, levels);
    } catch (error) {
      return { status: 'amend_failed', positionId, levels, error: errorMessage(error) };
    }

    for (let attempt = 1; attempt <= this.policy.attempts; attempt++) {
      try {
        const updated = await this.ports.updateTrade(request.internalAccountId, positionId, levels);
        if (updated > 0) {
          return { status: 'updated', positionId, levels, attempts: attempt };
        }
      } catch (error) {
        logger.debug('Trade protection update attempt failed', { positionId, attempt, error: errorMessage(error) });
      }
      if (attempt < this.policy.attempts) {
        await this.sleep(this.policy.delayMs);
      }
    }
    return { status: 'not_found', positionId, levels, attempts: this.policy.attempts };
  }

  private report(request: AmendRequest, outcome: AmendOutcome): void {
    const meta = { positionId: request.positionId, symbol: request.symbol, outcome };
    switch (outcome.status) {
      case 'updated':
      case 'skipped':
        logger.logAccount('info', `Protection amend ${outcome.status}`, request.internalAccountId, meta);
        break;
      case 'not_found':
      case 'amend_failed':
        logger.logAccount('warn', `Protection amend ${outcome.status}`, request.internalAccountId, meta);
        break;
      case 'error':
        logger.logAccount('error', 'Protection amend error', request.internalAccountId, meta);
        break;
    }
  }
}
