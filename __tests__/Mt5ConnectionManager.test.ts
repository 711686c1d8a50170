/**
 * Mt5ConnectionManager Unit Tests
 */

import { Mt5ApiClient } from '../connectors/mt5/Mt5ApiClient';
import { Mt5ConnectionManager } from '../connectors/mt5/Mt5ConnectionManager';
import { mt5Credentials, OTHER_ACCOUNT_ID } from './fixtures';

describe('Mt5ConnectionManager', () => {
  let manager: Mt5ConnectionManager;
  let createClient: jest.Mock<Mt5ApiClient, ConstructorParameters<typeof Mt5ApiClient>>;

  beforeEach(() => {
    createClient = jest.fn((creds, options) => new Mt5ApiClient(creds, options));
    manager = new Mt5ConnectionManager({ pollIntervalMs: 60000 }, createClient);
  });

  afterEach(() => {
    manager.closeAll();
  });

  it('should reuse the client for the same account and credentials', async () => {
    const first = await manager.getClient(mt5Credentials());
    const second = await manager.getClient(mt5Credentials());

    expect(second).toBe(first);
    expect(createClient).toHaveBeenCalledTimes(1);
  });

  it('should create a single client for concurrent first requests', async () => {
    const [a, b] = await Promise.all([manager.getClient(mt5Credentials()), manager.getClient(mt5Credentials())]);

    expect(a).toBe(b);
    expect(createClient).toHaveBeenCalledTimes(1);
  });

  it('should replace the client when the credentials change', async () => {
    const first = await manager.getClient(mt5Credentials());
    const second = await manager.getClient(mt5Credentials({ password: 'rotated-password' }));

    expect(second).not.toBe(first);
    expect(first.isClosed()).toBe(true);
    expect(manager.size).toBe(1);
    expect(manager.peek(second.credentials.internalAccountId)).toBe(second);
  });

  it('should replace a client that was closed elsewhere', async () => {
    const first = await manager.getClient(mt5Credentials());
    first.close();

    const second = await manager.getClient(mt5Credentials());

    expect(second).not.toBe(first);
    expect(createClient).toHaveBeenCalledTimes(2);
  });

  it('should keep one client per account', async () => {
    await manager.getClient(mt5Credentials());
    await manager.getClient(mt5Credentials({ internalAccountId: OTHER_ACCOUNT_ID, login: 5002 }));

    expect(manager.size).toBe(2);
  });

  it('should close and forget a removed client', async () => {
    const client = await manager.getClient(mt5Credentials());

    expect(manager.removeClient(client.credentials.internalAccountId)).toBe(true);
    expect(client.isClosed()).toBe(true);
    expect(manager.peek(client.credentials.internalAccountId)).toBeUndefined();
    expect(manager.removeClient(client.credentials.internalAccountId)).toBe(false);
  });

  it('should close every client on closeAll', async () => {
    const a = await manager.getClient(mt5Credentials());
    const b = await manager.getClient(mt5Credentials({ internalAccountId: OTHER_ACCOUNT_ID }));

    manager.closeAll();

    expect(a.isClosed() && b.isClosed()).toBe(true);
    expect(manager.size).toBe(0);
  });
});
