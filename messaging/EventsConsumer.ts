/**
 * Events Consumer
 * Drains the broker-event queue into the EventRouter.
 *
 * Emits events:
 * - 'started': consuming
 * - 'closed': (error?) the AMQP connection closed without stop() being called
 */

import { EventEmitter } from 'events';
import type { ConsumeMessage } from 'amqplib';
import { LoggerFactory } from '../logging/logger';
import { AmqpChannel, AmqpConnect, AmqpConnection, connectAmqp } from './amqp';
import { EventRouter, EventStats } from './EventRouter';

const logger = LoggerFactory.getLogger('EventsConsumer');

export const EVENT_BINDINGS = ['account.#', 'price.#', 'candle.#', 'positions.#', 'position.#'];

export interface EventsConsumerOptions {
  url: string;
  exchange: string;
  queue: string;
  bindings?: string[];
  prefetch?: number;
  connect?: AmqpConnect;
}

export class EventsConsumer extends EventEmitter {
  private connection: AmqpConnection | null = null;
  private channel: AmqpChannel | null = null;
  private consumerTag: string | null = null;
  private stopping = false;

  constructor(
    private router: EventRouter,
    private options: EventsConsumerOptions
  ) {
    super();
  }

  async start(): Promise<void> {
    if (this.channel) {
      logger.debug('Consumer already started');
      return;
    }
    this.stopping = false;
    const { exchange, queue } = this.options;
    const bindings = this.options.bindings ?? EVENT_BINDINGS;
    const connect = this.options.connect ?? connectAmqp;

    const connection = await connect(this.options.url);
    connection.on('error', (error) => {
      logger.error('AMQP connection error', error);
    });
    connection.on('close', (error) => {
      this.channel = null;
      this.connection = null;
      this.consumerTag = null;
      if (!this.stopping) {
        logger.warn('⚠️  AMQP connection closed', { error: error?.message });
        this.emit('closed', error);
      }
    });
    this.connection = connection;

    const channel = await connection.createChannel();
    await channel.assertExchange(exchange, 'topic', { durable: true });
    await channel.assertQueue(queue, { durable: true });
    for (const pattern of bindings) {
      await channel.bindQueue(queue, exchange, pattern);
    }
    logger.info('AMQP bindings applied', { exchange, queue, bindings });

    await channel.prefetch(this.options.prefetch ?? 1);
    this.channel = channel;

    const reply = await channel.consume(queue, (msg) => {
      this.onMessage(msg).catch((error: unknown) => {
        logger.error('Failed to settle delivery', error);
      });
    });
    this.consumerTag = reply.consumerTag;
    logger.info('✅ Events consumer started. Waiting for messages...', { queue });
    this.emit('started');
  }

  async stop(): Promise<void> {
    this.stopping = true;
    const { channel, connection, consumerTag } = this;
    this.channel = null;
    this.connection = null;
    this.consumerTag = null;

    try {
      if (channel && consumerTag) await channel.cancel(consumerTag);
      if (channel) await channel.close();
    } catch (error) {
      logger.warn('Error closing AMQP channel', { error: error instanceof Error ? error.message : String(error) });
    }
    if (connection) {
      await connection.close();
    }
    logger.info('Events consumer stopped', { ...this.router.stats() });
  }

  isRunning(): boolean {
    return this.channel !== null;
  }

  stats(): EventStats {
    return this.router.stats();
  }

  private async onMessage(msg: ConsumeMessage | null): Promise<void> {
    if (msg === null) {
      logger.warn('Consumer cancelled by broker');
      return;
    }
    const channel = this.channel;
    if (!channel) return;

    const { routingKey, deliveryTag, redelivered } = msg.fields;
    try {
      await this.router.handle(msg.content, routingKey);
      channel.ack(msg);
    } catch (error) {
      if (redelivered) {
        logger.error('Dropping event that failed after redelivery', error, { routingKey, deliveryTag });
      } else {
        logger.warn('Requeueing failed event', { routingKey, deliveryTag });
      }
      channel.nack(msg, false, !redelivered);
    }
  }
}
