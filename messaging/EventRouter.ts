/**
 * Event Router
 *
 * Handles one broker event end to end: parse, de-duplicate, resolve the
 * internal account, then fan out by event type. Fan-out and enqueue failures
 * are logged and do not fail the event; a failure before dispatch releases
 * the dedupe key and is rethrown so the transport can redeliver.
 */

import { LoggerFactory } from '../logging/logger';
import { asRecord, asRecordArray, toStr } from '../connectors/normalize';
import { AccountResolver } from './AccountResolver';
import { accountGroup, candleGroup, ChannelLayer, GroupMessage, priceGroup } from './ChannelLayer';
import { DedupeStore } from './DedupeStore';
import { CanonicalEventType, EventEnvelope, parseEnvelope, ParsedEvent } from './envelope';
import { TradeSyncQueue } from './TradeSyncQueue';

const logger = LoggerFactory.getLogger('EventRouter');

export type ProcessOutcome = 'processed' | 'duplicate' | 'unresolved' | 'ignored';

export interface EventStats {
  received: number;
  processed: number;
  duplicates: number;
  unresolved: number;
  failed: number;
}

export interface EventRouterDeps {
  dedupe: DedupeStore;
  resolver: AccountResolver;
  channels: ChannelLayer;
  tradeSync: TradeSyncQueue;
  now?: () => Date;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class EventRouter {
  private counters: EventStats = { received: 0, processed: 0, duplicates: 0, unresolved: 0, failed: 0 };
  private now: () => Date;

  constructor(private deps: EventRouterDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  stats(): EventStats {
    return { ...this.counters };
  }

  /**
   * Throws when the event could not be handled and should be redelivered
   */
  async handle(body: Buffer | string, routingKey?: string): Promise<ProcessOutcome> {
    this.counters.received++;

    let event: ParsedEvent;
    try {
      event = parseEnvelope(body);
    } catch (error) {
      this.counters.failed++;
      logger.error('Invalid event envelope', error, { routingKey });
      throw error;
    }

    const { eventId } = event;
    logger.logEvent('debug', 'Received event', eventId, { routingKey, type: event.rawType });

    if (!(await this.deps.dedupe.markIfNew(eventId))) {
      this.counters.duplicates++;
      logger.logEvent('debug', 'Duplicate event ignored', eventId, { routingKey });
      return 'duplicate';
    }

    let outcome: ProcessOutcome;
    try {
      outcome = await this.dispatch(event, routingKey);
    } catch (error) {
      this.counters.failed++;
      logger.error('Failed to process event', error, { eventId, routingKey });
      await this.deps.dedupe.release(eventId).catch((releaseError: unknown) => {
        logger.warn('Failed to release dedupe key', { eventId, error: errorMessage(releaseError) });
      });
      throw error;
    }

    if (outcome === 'unresolved') {
      this.counters.unresolved++;
    } else {
      this.counters.processed++;
    }
    return outcome;
  }

  private async dispatch(event: ParsedEvent, routingKey?: string): Promise<ProcessOutcome> {
    const { envelope, eventId, type } = event;
    if (type === null) {
      logger.logEvent('warn', 'Unknown event type', eventId, { routingKey, type: event.rawType });
      return 'ignored';
    }

    const accountId = await this.deps.resolver.resolve(envelope);
    if (accountId === null) {
      logger.logEvent('warn', `${type} missing resolvable account`, eventId, {
        routingKey,
        ...identifiers(envelope),
      });
      return 'unresolved';
    }

    const payload = envelope.payload;
    switch (type) {
      case 'position.closed':
        await this.enqueueSync(accountId, eventId, type);
        return 'processed';
      case 'positions.snapshot':
        await this.send(eventId, accountGroup(accountId), {
          type: 'open_positions_update',
          open_positions: asRecordArray(payload.open_positions),
        });
        return 'processed';
      case 'account.info':
        await this.send(eventId, accountGroup(accountId), { type: 'account_info_update', account_info: payload });
        return 'processed';
      case 'orders.pending':
        await this.send(eventId, accountGroup(accountId), {
          type: 'pending_orders_update',
          pending_orders: asRecordArray(payload.pending_orders ?? payload.orders),
        });
        return 'processed';
      case 'price.tick':
        return this.forwardPrice(eventId, accountId, payload);
      case 'candle.update':
        return this.forwardCandle(eventId, accountId, payload);
    }
  }

  private async forwardPrice(eventId: string, accountId: string, payload: Record<string, unknown>): Promise<ProcessOutcome> {
    const symbol = (toStr(payload.symbol) ?? '').toUpperCase();
    if (!symbol) {
      logger.logEvent('warn', 'price.tick without symbol', eventId, { accountId });
      return 'ignored';
    }
    await this.send(eventId, priceGroup(accountId, symbol), { type: 'price_tick', price: payload });
    return 'processed';
  }

  private async forwardCandle(eventId: string, accountId: string, payload: Record<string, unknown>): Promise<ProcessOutcome> {
    const symbol = (toStr(payload.symbol) ?? '').toUpperCase();
    const timeframe = toStr(payload.timeframe) ?? '';
    if (!symbol || !timeframe) {
      logger.logEvent('warn', 'candle.update without symbol or timeframe', eventId, { accountId, symbol, timeframe });
      return 'ignored';
    }
    await this.send(eventId, candleGroup(accountId, symbol, timeframe), {
      type: 'candle_update',
      candle: asRecord(payload.candle),
    });
    return 'processed';
  }

  private async enqueueSync(accountId: string, eventId: string, reason: CanonicalEventType): Promise<void> {
    try {
      await this.deps.tradeSync.enqueue({ accountId, reason, eventId, enqueuedAt: this.now().toISOString() });
      logger.logAccount('info', 'Enqueued trade synchronisation', accountId, { eventId });
    } catch (error) {
      logger.error('Failed to enqueue trade synchronisation', error, { accountId, eventId });
    }
  }

  private async send(eventId: string, group: string, message: GroupMessage): Promise<void> {
    try {
      await this.deps.channels.groupSend(group, message);
      logger.logEvent('debug', `Forwarded ${message.type}`, eventId, { group });
    } catch (error) {
      logger.logEvent('warn', `Failed to send to group ${group}`, eventId, { error: errorMessage(error) });
    }
  }
}

function identifiers(envelope: EventEnvelope): Record<string, unknown> {
  return {
    accountId: envelope.account_id ?? null,
    brokerLogin: envelope.broker_login ?? null,
    internalAccountId: envelope.internal_account_id ?? null,
  };
}
