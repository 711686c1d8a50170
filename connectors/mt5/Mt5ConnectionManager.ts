/**
 * MT5 Connection Manager
 * Holds at most one live Mt5ApiClient per internal account id.
 * Creation is serialised by a single process-wide lock (check-then-create);
 * steady-state lookups never take it.
 */

import { LoggerFactory } from '../../logging/logger';
import { KeyedMutex } from '../../utils/KeyedMutex';
import { Mt5ApiClient, Mt5ApiClientOptions } from './Mt5ApiClient';
import type { Mt5Credentials } from '../types';

const logger = LoggerFactory.getLogger('Mt5ConnectionManager');

const CREATE_LOCK = 'mt5:create';

export type Mt5ClientFactory = (credentials: Mt5Credentials, options: Mt5ApiClientOptions) => Mt5ApiClient;

function sameCredentials(a: Mt5Credentials, b: Mt5Credentials): boolean {
  return (
    a.baseUrl === b.baseUrl &&
    a.login === b.login &&
    a.password === b.password &&
    a.brokerServer === b.brokerServer
  );
}

export class Mt5ConnectionManager {
  private clients: Map<string, Mt5ApiClient> = new Map();
  private lock = new KeyedMutex();

  constructor(
    private clientOptions: Mt5ApiClientOptions = {},
    private createClient: Mt5ClientFactory = (creds, options) => new Mt5ApiClient(creds, options)
  ) {}

  /**
   * Return the account's live client, creating it on first use.
   * A client built from stale credentials is closed and replaced.
   */
  async getClient(credentials: Mt5Credentials): Promise<Mt5ApiClient> {
    const id = credentials.internalAccountId;
    const existing = this.clients.get(id);
    if (existing && !existing.isClosed() && sameCredentials(existing.credentials, credentials)) {
      return existing;
    }

    return this.lock.runExclusive(CREATE_LOCK, async () => {
      const current = this.clients.get(id);
      if (current && !current.isClosed()) {
        if (sameCredentials(current.credentials, credentials)) {
          return current;
        }
        logger.logAccount('info', 'MT5 credentials changed, replacing client', id);
        current.close();
      }

      const client = this.createClient(credentials, this.clientOptions);
      this.clients.set(id, client);
      logger.logAccount('debug', `Created MT5 client for login ${credentials.login}`, id);
      return client;
    });
  }

  peek(internalAccountId: string): Mt5ApiClient | undefined {
    return this.clients.get(internalAccountId);
  }

  removeClient(internalAccountId: string): boolean {
    const client = this.clients.get(internalAccountId);
    if (!client) return false;
    client.close();
    this.clients.delete(internalAccountId);
    return true;
  }

  closeAll(): void {
    for (const client of this.clients.values()) {
      client.close();
    }
    this.clients.clear();
  }

  get size(): number {
    return this.clients.size;
  }
}
