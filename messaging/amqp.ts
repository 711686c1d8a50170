/**
 * Narrow amqplib surfaces used by the consumer and the broker feed, so tests
 * can drive them with an in-process fake channel.
 */

import amqp, { Channel } from 'amqplib';

export type AmqpChannel = Pick<
  Channel,
  | 'assertExchange'
  | 'assertQueue'
  | 'bindQueue'
  | 'prefetch'
  | 'consume'
  | 'cancel'
  | 'ack'
  | 'nack'
  | 'publish'
  | 'close'
>;

export interface AmqpConnection {
  createChannel(): Promise<AmqpChannel>;
  close(): Promise<void>;
  on(event: 'error' | 'close', listener: (error?: Error) => void): unknown;
}

export type AmqpConnect = (url: string) => Promise<AmqpConnection>;

export const connectAmqp: AmqpConnect = (url) => amqp.connect(url);
