/**
 * Shared test doubles
 */

import type { AxiosAdapter } from 'axios';
import type { ConsumeMessage } from 'amqplib';
import { loadSettings, Settings } from '../config/settings';
import { asRecord } from '../connectors/normalize';
import type { AccountStore } from '../database/repositories/AccountRepository';
import type { AmqpConnection } from '../messaging/amqp';
import type { HeadlessUpstream } from '../connectors/mt5/HeadlessOrchestrator';
import type { BrokerPayload, CTraderCredentials, Mt5Credentials } from '../connectors/types';

export const ACCOUNT_ID = '3f0c2a9e-1d2b-4c5d-8e9f-0a1b2c3d4e5f';
export const OTHER_ACCOUNT_ID = '9b7e6d5c-4b3a-4f2e-9d1c-0b2a3c4d5e6f';

export const mt5Credentials = (overrides: Partial<Mt5Credentials> = {}): Mt5Credentials => ({
  baseUrl: 'http://mt5.test',
  login: 5001,
  password: 'test-password',
  brokerServer: 'Demo-Server',
  internalAccountId: ACCOUNT_ID,
  ...overrides,
});

export const ctraderCredentials = (overrides: Partial<CTraderCredentials> = {}): CTraderCredentials => ({
  accountId: '12345',
  accessToken: 'test-token',
  isSandbox: true,
  internalAccountId: ACCOUNT_ID,
  ...overrides,
});

export function testSettings(env: Record<string, string> = {}): Settings {
  return loadSettings({
    MT5_API_BASE_URL: 'http://mt5.test',
    CTRADER_API_BASE_URL: 'http://ctrader.test',
    INTERNAL_SHARED_SECRET: 'test-secret',
    ...env,
  });
}

export function mockAccountStore(): jest.Mocked<AccountStore> {
  return {
    findById: jest.fn().mockResolvedValue(null),
    findMt5Credentials: jest.fn().mockResolvedValue(null),
    findCTraderCredentials: jest.fn().mockResolvedValue(null),
    findIdByMt5Login: jest.fn().mockResolvedValue(null),
    findIdByCTraderCtid: jest.fn().mockResolvedValue(null),
    findIdByCTraderAccountNumber: jest.fn().mockResolvedValue(null),
  };
}

export function mockUpstream(): jest.Mocked<HeadlessUpstream> {
  return {
    start: jest.fn().mockResolvedValue(undefined),
    subscribePrice: jest.fn().mockResolvedValue(undefined),
    unsubscribePrice: jest.fn().mockResolvedValue(undefined),
    subscribeCandles: jest.fn().mockResolvedValue(undefined),
    unsubscribeCandles: jest.fn().mockResolvedValue(undefined),
  };
}

export interface RecordedRequest {
  method: string;
  url: string;
  body: BrokerPayload;
  params: BrokerPayload;
  headers: Record<string, unknown>;
}

export interface StubResponse {
  status: number;
  data?: unknown;
}

/** Case-insensitive header lookup */
export function header(req: RecordedRequest, name: string): unknown {
  const key = Object.keys(req.headers).find((k) => k.toLowerCase() === name.toLowerCase());
  return key === undefined ? undefined : req.headers[key];
}

/**
 * axios adapter answering from a handler and recording every request
 */
export function stubAdapter(handler: (req: RecordedRequest) => StubResponse) {
  const requests: RecordedRequest[] = [];
  const adapter: AxiosAdapter = async (config) => {
    const req: RecordedRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      body: typeof config.data === 'string' ? asRecord(JSON.parse(config.data)) : {},
      params: asRecord(config.params),
      headers: config.headers.toJSON(),
    };
    requests.push(req);
    const { status, data } = handler(req);
    return { data, status, statusText: String(status), headers: {}, config };
  };
  return { adapter, requests };
}

export function consumeMessage(body: string, routingKey: string, redelivered = false): ConsumeMessage {
  return {
    content: Buffer.from(body),
    fields: { deliveryTag: 1, redelivered, exchange: 'mt5.events', routingKey, consumerTag: 'ctag-1' },
    properties: {
      contentType: 'application/json',
      contentEncoding: undefined,
      headers: {},
      deliveryMode: undefined,
      priority: undefined,
      correlationId: undefined,
      replyTo: undefined,
      expiration: undefined,
      messageId: undefined,
      timestamp: undefined,
      type: undefined,
      userId: undefined,
      appId: undefined,
      clusterId: undefined,
    },
  };
}

/**
 * In-process AMQP connection and channel; deliver() pushes a message to the consumer
 */
export function fakeAmqp() {
  let deliver: (msg: ConsumeMessage | null) => void = () => undefined;
  const channel = {
    assertExchange: jest.fn().mockResolvedValue({ exchange: 'mt5.events' }),
    assertQueue: jest.fn().mockResolvedValue({ queue: 'backend.mt5.events', messageCount: 0, consumerCount: 0 }),
    bindQueue: jest.fn().mockResolvedValue({}),
    prefetch: jest.fn().mockResolvedValue(undefined),
    consume: jest.fn(async (_queue: string, onMessage: (msg: ConsumeMessage | null) => void, _options?: object) => {
      deliver = onMessage;
      return { consumerTag: 'ctag-1' };
    }),
    cancel: jest.fn().mockResolvedValue({ consumerTag: 'ctag-1' }),
    ack: jest.fn(),
    nack: jest.fn(),
    publish: jest.fn().mockReturnValue(true),
    close: jest.fn().mockResolvedValue(undefined),
  };
  const connection: AmqpConnection = {
    createChannel: jest.fn().mockResolvedValue(channel),
    close: jest.fn().mockResolvedValue(undefined),
    on: jest.fn(),
  };
  return { channel, connection, deliver: (msg: ConsumeMessage) => deliver(msg) };
}

/** Let every pending promise continuation run */
export const flush = () => new Promise<void>((resolve) => setImmediate(resolve));
