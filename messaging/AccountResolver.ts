/**
 * Account Resolver
 *
 * Maps the identifiers found on a broker event to the internal account UUID:
 *   1. internal_account_id, when UUID-shaped
 *   2. account_id, when UUID-shaped
 *   3. numeric broker identifiers (broker_login, else account_id) looked up
 *      against the credential tables, behind a TTL cache. Every identifier
 *      kind is checked in the cache before any table is queried.
 *
 * Only successful lookups are cached. A login that does not resolve today is
 * looked up again on the next event.
 */

import type Redis from 'ioredis';
import { LoggerFactory } from '../logging/logger';
import type { AccountStore } from '../database/repositories/AccountRepository';
import type { EventEnvelope } from './envelope';

const logger = LoggerFactory.getLogger('AccountResolver');

const UUID_RE = /^[0-9a-f]{8}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{12}$/i;

export type IdentifierKind = 'mt5_login' | 'ctrader_ctid' | 'ctrader_account';

export interface AccountIdCache {
  get(kind: IdentifierKind, value: string): Promise<string | null>;
  set(kind: IdentifierKind, value: string, accountId: string): Promise<void>;
}

export const accountCacheKey = (kind: IdentifierKind, value: string) => `acctmap:${kind}:${value}`;

export function isUuid(value: unknown): value is string {
  return typeof value === 'string' && UUID_RE.test(value.trim());
}

export class RedisAccountIdCache implements AccountIdCache {
  constructor(
    private redis: Redis,
    private ttlSec: number
  ) {}

  get(kind: IdentifierKind, value: string): Promise<string | null> {
    return this.redis.get(accountCacheKey(kind, value));
  }

  async set(kind: IdentifierKind, value: string, accountId: string): Promise<void> {
    await this.redis.set(accountCacheKey(kind, value), accountId, 'EX', this.ttlSec);
  }
}

export class MemoryAccountIdCache implements AccountIdCache {
  private entries: Map<string, { accountId: string; expiresAt: number }> = new Map();

  constructor(
    private ttlSec: number,
    private now: () => number = Date.now
  ) {}

  async get(kind: IdentifierKind, value: string): Promise<string | null> {
    const key = accountCacheKey(kind, value);
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.accountId;
  }

  async set(kind: IdentifierKind, value: string, accountId: string): Promise<void> {
    this.entries.set(accountCacheKey(kind, value), {
      accountId,
      expiresAt: this.now() + this.ttlSec * 1000,
    });
  }
}

function lookupOrder(platform: string | null | undefined): IdentifierKind[] {
  const value = (platform ?? '').trim().toLowerCase();
  if (value === 'mt5') return ['mt5_login'];
  if (value === 'ctrader') return ['ctrader_ctid', 'ctrader_account'];
  return ['mt5_login', 'ctrader_ctid', 'ctrader_account'];
}

function numericIdentifier(value: unknown): string | null {
  if (typeof value === 'number' && Number.isInteger(value)) return String(value);
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return value.trim();
  return null;
}

export class AccountResolver {
  constructor(
    private accounts: AccountStore,
    private cache: AccountIdCache
  ) {}

  async resolve(envelope: EventEnvelope): Promise<string | null> {
    if (isUuid(envelope.internal_account_id)) {
      return envelope.internal_account_id.trim();
    }
    if (isUuid(envelope.account_id)) {
      return envelope.account_id.trim();
    }

    const candidate = numericIdentifier(envelope.broker_login ?? envelope.account_id);
    if (candidate === null) {
      logger.debug('No numeric broker identifier on event', {
        accountId: envelope.account_id ?? null,
        brokerLogin: envelope.broker_login ?? null,
      });
      return null;
    }

    const kinds = lookupOrder(envelope.platform);
    for (const kind of kinds) {
      const cached = await this.cache.get(kind, candidate);
      if (cached) return cached;
    }

    for (const kind of kinds) {
      const resolved = await this.lookup(kind, candidate);
      if (resolved) {
        await this.cache.set(kind, candidate, resolved);
        return resolved;
      }
    }

    logger.warn('Could not map broker identifier to an internal account', {
      identifier: candidate,
      platform: envelope.platform ?? null,
    });
    return null;
  }

  private lookup(kind: IdentifierKind, value: string): Promise<string | null> {
    switch (kind) {
      case 'mt5_login':
        return this.accounts.findIdByMt5Login(Number(value));
      case 'ctrader_ctid':
        return this.accounts.findIdByCTraderCtid(Number(value));
      case 'ctrader_account':
        return this.accounts.findIdByCTraderAccountNumber(value);
    }
  }
}
