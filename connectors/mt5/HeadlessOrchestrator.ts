/**
 * Headless Subscription Orchestrator
 *
 * Ref-counts live price and candle subscriptions per (account, symbol[, timeframe])
 * so that every consumer (dashboard socket, bot feed, chart snapshot) shares one
 * upstream subscription on the gateway's headless poller.
 *
 * - upstream subscribe fires only on the 0 -> 1 transition
 * - upstream unsubscribe fires only on the 1 -> 0 transition
 * - counts never go negative; unsubscribing at 0 is a no-op
 * - all state for one account is guarded by that account's lock
 *
 * Counts are process-local. A second process running its own orchestrator may
 * disagree with the gateway, which is why 409 (already subscribed) and 404
 * (already gone) from upstream are treated as success.
 */

import { LoggerFactory } from '../../logging/logger';
import { KeyedMutex } from '../../utils/KeyedMutex';
import { BrokerAPIError, ConnectionError, ConnectorError } from '../errors';
import { Mt5ConnectionManager } from './Mt5ConnectionManager';
import type { Mt5Credentials } from '../types';

const logger = LoggerFactory.getLogger('HeadlessOrchestrator');

/**
 * Control surface of the broker-side headless poller
 */
export interface HeadlessUpstream {
  start(credentials: Mt5Credentials): Promise<void>;
  subscribePrice(credentials: Mt5Credentials, symbol: string): Promise<void>;
  unsubscribePrice(credentials: Mt5Credentials, symbol: string): Promise<void>;
  subscribeCandles(credentials: Mt5Credentials, symbol: string, timeframe: string): Promise<void>;
  unsubscribeCandles(credentials: Mt5Credentials, symbol: string, timeframe: string): Promise<void>;
}

/**
 * HeadlessUpstream backed by the account's MT5 session client
 */
export class Mt5HeadlessGateway implements HeadlessUpstream {
  constructor(private manager: Mt5ConnectionManager) {}

  async start(credentials: Mt5Credentials): Promise<void> {
    const client = await this.manager.getClient(credentials);
    await client.headlessStart();
  }

  async subscribePrice(credentials: Mt5Credentials, symbol: string): Promise<void> {
    const client = await this.manager.getClient(credentials);
    await client.headlessSubscribePrice(symbol);
  }

  async unsubscribePrice(credentials: Mt5Credentials, symbol: string): Promise<void> {
    const client = await this.manager.getClient(credentials);
    await client.headlessUnsubscribePrice(symbol);
  }

  async subscribeCandles(credentials: Mt5Credentials, symbol: string, timeframe: string): Promise<void> {
    const client = await this.manager.getClient(credentials);
    await client.headlessSubscribeCandles(symbol, timeframe);
  }

  async unsubscribeCandles(credentials: Mt5Credentials, symbol: string, timeframe: string): Promise<void> {
    const client = await this.manager.getClient(credentials);
    await client.headlessUnsubscribeCandles(symbol, timeframe);
  }
}

export interface OrchestratorSnapshot {
  ready: string[];
  prices: Record<string, Record<string, number>>;
  candles: Record<string, Record<string, number>>;
}

const candleKey = (symbol: string, timeframe: string) => `${symbol}:${timeframe}`;

function hasStatus(err: unknown, status: number): boolean {
  return err instanceof BrokerAPIError && err.status === status;
}

function toConnectionError(err: unknown, action: string): ConnectorError {
  if (err instanceof ConnectorError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new ConnectionError(`Failed to ${action}: ${message}`);
}

export class HeadlessSubscriptionOrchestrator {
  private locks = new KeyedMutex();
  private ready: Set<string> = new Set();
  private priceRefs: Map<string, Map<string, number>> = new Map();
  private candleRefs: Map<string, Map<string, number>> = new Map();

  constructor(private upstream: HeadlessUpstream) {}

  /**
   * Start the account's headless poller once per process
   */
  async ensureReady(credentials: Mt5Credentials): Promise<void> {
    const id = credentials.internalAccountId;
    await this.locks.runExclusive(id, () => this.ensureReadyLocked(credentials));
  }

  isReady(internalAccountId: string): boolean {
    return this.ready.has(internalAccountId);
  }

  /**
   * Returns the count after the increment
   */
  async subscribePrice(credentials: Mt5Credentials, symbol: string): Promise<number> {
    const id = credentials.internalAccountId;
    const sym = symbol.toUpperCase();
    return this.locks.runExclusive(id, () =>
      this.increment(credentials, this.refsFor(this.priceRefs, id), sym, `subscribe price ${sym}`, () =>
        this.upstream.subscribePrice(credentials, sym)
      )
    );
  }

  /**
   * Returns the count after the decrement
   */
  async unsubscribePrice(credentials: Mt5Credentials, symbol: string): Promise<number> {
    const id = credentials.internalAccountId;
    const sym = symbol.toUpperCase();
    return this.locks.runExclusive(id, () =>
      this.decrement(id, this.priceRefs, sym, `unsubscribe price ${sym}`, () =>
        this.upstream.unsubscribePrice(credentials, sym)
      )
    );
  }

  async subscribeCandles(credentials: Mt5Credentials, symbol: string, timeframe: string): Promise<number> {
    const id = credentials.internalAccountId;
    const sym = symbol.toUpperCase();
    const tf = timeframe.toUpperCase();
    return this.locks.runExclusive(id, () =>
      this.increment(
        credentials,
        this.refsFor(this.candleRefs, id),
        candleKey(sym, tf),
        `subscribe candles ${sym}@${tf}`,
        () => this.upstream.subscribeCandles(credentials, sym, tf)
      )
    );
  }

  async unsubscribeCandles(credentials: Mt5Credentials, symbol: string, timeframe: string): Promise<number> {
    const id = credentials.internalAccountId;
    const sym = symbol.toUpperCase();
    const tf = timeframe.toUpperCase();
    return this.locks.runExclusive(id, () =>
      this.decrement(id, this.candleRefs, candleKey(sym, tf), `unsubscribe candles ${sym}@${tf}`, () =>
        this.upstream.unsubscribeCandles(credentials, sym, tf)
      )
    );
  }

  getPriceRefCount(internalAccountId: string, symbol: string): number {
    return this.priceRefs.get(internalAccountId)?.get(symbol.toUpperCase()) ?? 0;
  }

  getCandleRefCount(internalAccountId: string, symbol: string, timeframe: string): number {
    return (
      this.candleRefs.get(internalAccountId)?.get(candleKey(symbol.toUpperCase(), timeframe.toUpperCase())) ?? 0
    );
  }

  snapshot(): OrchestratorSnapshot {
    const dump = (source: Map<string, Map<string, number>>) => {
      const out: Record<string, Record<string, number>> = {};
      for (const [account, refs] of source) {
        out[account] = Object.fromEntries(refs);
      }
      return out;
    };
    return {
      ready: Array.from(this.ready),
      prices: dump(this.priceRefs),
      candles: dump(this.candleRefs),
    };
  }

  // ==================== Internals (caller holds the account lock) ====================

  private async ensureReadyLocked(credentials: Mt5Credentials): Promise<void> {
    const id = credentials.internalAccountId;
    if (this.ready.has(id)) return;
    try {
      await this.upstream.start(credentials);
    } catch (err) {
      throw toConnectionError(err, 'start headless poller');
    }
    this.ready.add(id);
    logger.logAccount('info', 'Headless poller started', id);
  }

  private refsFor(source: Map<string, Map<string, number>>, id: string): Map<string, number> {
    let refs = source.get(id);
    if (!refs) {
      refs = new Map();
      source.set(id, refs);
    }
    return refs;
  }

  private async increment(
    credentials: Mt5Credentials,
    refs: Map<string, number>,
    key: string,
    action: string,
    fire: () => Promise<void>
  ): Promise<number> {
    const id = credentials.internalAccountId;
    const before = refs.get(key) ?? 0;
    const after = before + 1;
    refs.set(key, after);
    if (before !== 0) {
      return after;
    }

    try {
      await this.ensureReadyLocked(credentials);
      await fire();
      logger.logAccount('info', `Upstream ${action}`, id);
    } catch (err) {
      if (hasStatus(err, 409)) {
        logger.logAccount('debug', `Upstream already has ${key} (409), treating as subscribed`, id);
        return after;
      }
      // Roll back so the next subscriber retries the upstream call
      refs.delete(key);
      logger.error(`Upstream ${action} failed`, err, { accountId: id });
      throw toConnectionError(err, action);
    }
    return after;
  }

  private async decrement(
    id: string,
    source: Map<string, Map<string, number>>,
    key: string,
    action: string,
    fire: () => Promise<void>
  ): Promise<number> {
    const refs = source.get(id);
    const before = refs?.get(key) ?? 0;
    if (!refs || before <= 0) {
      return 0;
    }

    const after = before - 1;
    if (after > 0) {
      refs.set(key, after);
      return after;
    }

    refs.delete(key);
    if (refs.size === 0) {
      source.delete(id);
    }

    try {
      await fire();
      logger.logAccount('info', `Upstream ${action}`, id);
    } catch (err) {
      if (hasStatus(err, 404)) {
        logger.logAccount('debug', `Upstream no longer has ${key} (404), treating as unsubscribed`, id);
        return 0;
      }
      logger.error(`Upstream ${action} failed`, err, { accountId: id });
      throw toConnectionError(err, action);
    }
    return 0;
  }
}
