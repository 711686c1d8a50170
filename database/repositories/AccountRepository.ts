/**
 * Account Repository
 * Read-only access to trading accounts and their platform credential records
 */

import { Pool } from 'pg';
import { LoggerFactory } from '../../logging/logger';
import type { AccountRecord } from '../../connectors/types';

const logger = LoggerFactory.getLogger('AccountRepository');

export interface Mt5CredentialRow {
  accountNumber: number;
  brokerServer: string;
  password: string;
}

export interface CTraderCredentialRow {
  ctidTraderAccountId: string | null;
  accountNumber: string | null;
  accessToken: string | null;
  refreshToken: string | null;
  isSandbox: boolean;
}

/**
 * Lookups the connector layer and the event consumer need
 */
export interface AccountStore {
  findById(id: string): Promise<AccountRecord | null>;
  findMt5Credentials(accountId: string): Promise<Mt5CredentialRow | null>;
  findCTraderCredentials(accountId: string): Promise<CTraderCredentialRow | null>;
  findIdByMt5Login(login: number): Promise<string | null>;
  findIdByCTraderCtid(ctid: number): Promise<string | null>;
  findIdByCTraderAccountNumber(accountNumber: string): Promise<string | null>;
}

export class AccountRepository implements AccountStore {
  constructor(private pool: Pool) {}

  async findById(id: string): Promise<AccountRecord | null> {
    const result = await this.pool.query<{ id: string; platform: string; user_id: string | null }>(
      'SELECT id, platform, user_id FROM accounts WHERE id = $1',
      [id]
    );
    const row = result.rows[0];
    if (!row) return null;
    return { id: String(row.id), platform: row.platform, userId: row.user_id ?? undefined };
  }

  async findMt5Credentials(accountId: string): Promise<Mt5CredentialRow | null> {
    const result = await this.pool.query<{
      account_number: string;
      broker_server: string;
      encrypted_password: string;
    }>(
      'SELECT account_number, broker_server, encrypted_password FROM mt5_accounts WHERE account_id = $1',
      [accountId]
    );
    const row = result.rows[0];
    if (!row) return null;
    // BIGINT arrives as a string from pg
    return {
      accountNumber: Number(row.account_number),
      brokerServer: row.broker_server,
      password: row.encrypted_password,
    };
  }

  async findCTraderCredentials(accountId: string): Promise<CTraderCredentialRow | null> {
    const result = await this.pool.query<{
      ctid_trader_account_id: string | null;
      account_number: string | null;
      access_token: string | null;
      refresh_token: string | null;
      is_sandbox: boolean;
    }>(
      `SELECT ctid_trader_account_id, account_number, access_token, refresh_token, is_sandbox
         FROM ctrader_accounts WHERE account_id = $1`,
      [accountId]
    );
    const row = result.rows[0];
    if (!row) return null;
    return {
      ctidTraderAccountId: row.ctid_trader_account_id === null ? null : String(row.ctid_trader_account_id),
      accountNumber: row.account_number,
      accessToken: row.access_token,
      refreshToken: row.refresh_token,
      isSandbox: Boolean(row.is_sandbox),
    };
  }

  findIdByMt5Login(login: number): Promise<string | null> {
    return this.findAccountId('SELECT account_id FROM mt5_accounts WHERE account_number = $1 LIMIT 1', login);
  }

  findIdByCTraderCtid(ctid: number): Promise<string | null> {
    return this.findAccountId(
      'SELECT account_id FROM ctrader_accounts WHERE ctid_trader_account_id = $1 LIMIT 1',
      ctid
    );
  }

  findIdByCTraderAccountNumber(accountNumber: string): Promise<string | null> {
    return this.findAccountId(
      'SELECT account_id FROM ctrader_accounts WHERE account_number = $1 LIMIT 1',
      accountNumber
    );
  }

  private async findAccountId(sql: string, value: string | number): Promise<string | null> {
    try {
      const result = await this.pool.query<{ account_id: string }>(sql, [value]);
      const row = result.rows[0];
      return row ? String(row.account_id) : null;
    } catch (error) {
      logger.error('Account id lookup failed', error, { value: String(value) });
      throw error;
    }
  }
}
