/**
 * Connector factory
 * Maps an account's platform to a connector implementation and a credential
 * mapper. The platform string is normalised once, at construction time.
 */

import type { AxiosAdapter } from 'axios';
import { TradingPlatformConnector } from './base';
import { ConfigurationError, UnsupportedOperationError } from './errors';
import { Mt5Connector } from './mt5/Mt5Connector';
import { Mt5ConnectionManager } from './mt5/Mt5ConnectionManager';
import { HeadlessSubscriptionOrchestrator } from './mt5/HeadlessOrchestrator';
import { CTraderHttpConnector, TradeProtectionStore } from './ctrader/CTraderHttpConnector';
import type { AmendOutcomeListener, AmendPolicy } from './ctrader/ProtectionAmendTask';
import type { AccountStore } from '../database/repositories/AccountRepository';
import type { Settings } from '../config/settings';
import type { AccountRecord, CTraderCredentials, Mt5Credentials, Platform } from './types';

export interface ConnectorFactoryDeps {
  settings: Settings;
  accounts: AccountStore;
  trades: TradeProtectionStore;
  mt5Manager: Mt5ConnectionManager;
  orchestrator: HeadlessSubscriptionOrchestrator;
  amendPolicy?: AmendPolicy;
  onAmendOutcome?: AmendOutcomeListener;
  /** Custom axios adapter for the cTrader connector (tests) */
  ctraderAdapter?: AxiosAdapter;
}

export type PlatformCredentials =
  | { platform: 'MT5'; credentials: Mt5Credentials }
  | { platform: 'cTrader'; credentials: CTraderCredentials };

interface PlatformEntry<C> {
  create(credentials: C, deps: ConnectorFactoryDeps): TradingPlatformConnector;
  mapCredentials(account: AccountRecord, deps: ConnectorFactoryDeps): Promise<C>;
}

type Registry = {
  MT5: PlatformEntry<Mt5Credentials>;
  cTrader: PlatformEntry<CTraderCredentials>;
};

/**
 * 'mt5' -> MT5, 'ctrader' -> cTrader (case-insensitive)
 */
export function normalizePlatform(platform: string | null | undefined): Platform {
  const value = (platform ?? '').trim().toLowerCase();
  if (value === 'mt5') return 'MT5';
  if (value === 'ctrader') return 'cTrader';
  throw new UnsupportedOperationError(`Unsupported platform: ${platform ?? ''}`);
}

const REGISTRY: Registry = {
  MT5: {
    create: (credentials, deps) =>
      new Mt5Connector(credentials, { manager: deps.mt5Manager, orchestrator: deps.orchestrator }),
    mapCredentials: async (account, deps) => {
      const row = await deps.accounts.findMt5Credentials(account.id);
      if (!row) {
        throw new ConfigurationError(`No MT5 credentials for account ${account.id}`, ['mt5_accounts']);
      }
      return {
        baseUrl: deps.settings.mt5.baseUrl,
        login: row.accountNumber,
        password: row.password,
        brokerServer: row.brokerServer,
        internalAccountId: account.id,
      };
    },
  },
  cTrader: {
    create: (credentials, deps) =>
      new CTraderHttpConnector(credentials, {
        baseUrl: deps.settings.ctrader.baseUrl,
        apiPrefix: deps.settings.ctrader.apiPrefix,
        sharedSecret: deps.settings.internalSharedSecret,
        trades: deps.trades,
        amendPolicy: deps.amendPolicy,
        onAmendOutcome: deps.onAmendOutcome,
        adapter: deps.ctraderAdapter,
      }),
    mapCredentials: async (account, deps) => {
      const row = await deps.accounts.findCTraderCredentials(account.id);
      if (!row) {
        throw new ConfigurationError(`No cTrader credentials for account ${account.id}`, ['ctrader_accounts']);
      }
      const brokerAccountId = row.ctidTraderAccountId ?? row.accountNumber;
      if (!brokerAccountId || !row.accessToken) {
        throw new ConfigurationError(`Incomplete cTrader credentials for account ${account.id}`, [
          'ctid_trader_account_id',
          'access_token',
        ]);
      }
      return {
        accountId: brokerAccountId,
        accessToken: row.accessToken,
        refreshToken: row.refreshToken ?? undefined,
        isSandbox: row.isSandbox,
        ctidUserId: row.ctidTraderAccountId ?? undefined,
        internalAccountId: account.id,
      };
    },
  },
};

export class ConnectorFactory {
  constructor(private deps: ConnectorFactoryDeps) {}

  /**
   * Build a connector from credentials already loaded by the caller
   */
  createConnector(account: AccountRecord, loaded: PlatformCredentials): TradingPlatformConnector {
    const platform = normalizePlatform(account.platform);
    if (platform !== loaded.platform) {
      throw new ConfigurationError(
        `Account ${account.id} is ${platform} but ${loaded.platform} credentials were supplied`,
        ['platform']
      );
    }
    return loaded.platform === 'MT5'
      ? REGISTRY.MT5.create(loaded.credentials, this.deps)
      : REGISTRY.cTrader.create(loaded.credentials, this.deps);
  }

  /**
   * Load the account's credential record, then build its connector
   */
  async getConnector(account: AccountRecord): Promise<TradingPlatformConnector> {
    const loaded = await this.loadCredentials(account);
    return this.createConnector(account, loaded);
  }

  async getConnectorById(accountId: string): Promise<TradingPlatformConnector> {
    const account = await this.deps.accounts.findById(accountId);
    if (!account) {
      throw new ConfigurationError(`Account ${accountId} not found`, ['account']);
    }
    return this.getConnector(account);
  }

  async loadCredentials(account: AccountRecord): Promise<PlatformCredentials> {
    const platform = normalizePlatform(account.platform);
    if (platform === 'MT5') {
      return { platform, credentials: await REGISTRY.MT5.mapCredentials(account, this.deps) };
    }
    return { platform, credentials: await REGISTRY.cTrader.mapCredentials(account, this.deps) };
  }
}
