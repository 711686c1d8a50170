/**
 * Channel layer
 * Group fan-out to WebSocket subscribers. Group names are part of the wire
 * contract with the UI and bot consumers.
 */

import type Redis from 'ioredis';

export type GroupMessage = { type: string } & Record<string, unknown>;
export type GroupListener = (message: GroupMessage) => void;

export interface ChannelLayer {
  groupSend(group: string, message: GroupMessage): Promise<void>;
}

export const accountGroup = (accountId: string) => `account_${accountId}`;
export const priceGroup = (accountId: string, symbol: string) => `prices_${accountId}_${symbol.toUpperCase()}`;
export const candleGroup = (accountId: string, symbol: string, timeframe: string) =>
  `candles_${accountId}_${symbol.toUpperCase()}_${timeframe}`;

/**
 * Publishes each group message on `{prefix}{group}`
 */
export class RedisChannelLayer implements ChannelLayer {
  constructor(
    private redis: Redis,
    private prefix = 'channels:group:'
  ) {}

  async groupSend(group: string, message: GroupMessage): Promise<void> {
    await this.redis.publish(`${this.prefix}${group}`, JSON.stringify(message));
  }
}

/**
 * In-process groups. `sent` keeps the most recent `historyLimit` messages.
 */
export class MemoryChannelLayer implements ChannelLayer {
  private groups: Map<string, Set<GroupListener>> = new Map();
  readonly sent: Array<{ group: string; message: GroupMessage }> = [];

  constructor(readonly historyLimit = 1000) {}

  async groupSend(group: string, message: GroupMessage): Promise<void> {
    this.sent.push({ group, message });
    if (this.sent.length > this.historyLimit) this.sent.shift();
    this.groups.get(group)?.forEach((listener) => listener(message));
  }

  groupAdd(group: string, listener: GroupListener): void {
    const listeners = this.groups.get(group) ?? new Set<GroupListener>();
    listeners.add(listener);
    this.groups.set(group, listeners);
  }

  groupDiscard(group: string, listener: GroupListener): void {
    const listeners = this.groups.get(group);
    if (!listeners) return;
    listeners.delete(listener);
    if (listeners.size === 0) this.groups.delete(group);
  }
}
