/**
 * CLI: Publish Stub Events
 * Publishes one price.tick and one candle.update for an account, for smoke
 * testing the consumer and the AMQP bot feed.
 *
 * Usage: publish-stub-events <accountId> <symbol> [timeframe]
 */

import * as dotenv from 'dotenv';
import { randomUUID } from 'crypto';
import { loadSettings } from '../config/settings';
import { connectAmqp } from '../messaging/amqp';

dotenv.config();

export function stubEvents(accountId: string, symbol: string, timeframe: string, nowSec: number) {
  const sym = symbol.toUpperCase();
  return [
    {
      routingKey: `account.${accountId}.price.tick`,
      body: {
        event_id: randomUUID(),
        type: 'price.tick',
        account_id: accountId,
        payload: { symbol: sym, bid: 1.1, ask: 1.1002, last: 1.1001, time: nowSec },
      },
    },
    {
      routingKey: `account.${accountId}.candle.update`,
      body: {
        event_id: randomUUID(),
        type: 'candle.update',
        account_id: accountId,
        payload: {
          symbol: sym,
          timeframe,
          candle: { time: nowSec - (nowSec % 60), open: 1.1, high: 1.101, low: 1.099, close: 1.1005, volume: 42 },
        },
      },
    },
  ];
}

async function main() {
  const [accountId, symbol, timeframe = 'M1'] = process.argv.slice(2);
  if (!accountId || !symbol) {
    console.error('Error: <accountId> and <symbol> are required');
    console.log('');
    console.log('Usage: publish-stub-events <accountId> <symbol> [timeframe]');
    console.log('');
    console.log('Example: publish-stub-events 3f0c2a9e-1d2b-4c5d-8e9f-0a1b2c3d4e5f EURUSD M1');
    process.exit(1);
  }

  const settings = loadSettings();
  const connection = await connectAmqp(settings.amqp.url);
  try {
    const channel = await connection.createChannel();
    await channel.assertExchange(settings.amqp.exchange, 'topic', { durable: true });
    for (const { routingKey, body } of stubEvents(accountId, symbol, timeframe, Math.floor(Date.now() / 1000))) {
      channel.publish(settings.amqp.exchange, routingKey, Buffer.from(JSON.stringify(body)), {
        contentType: 'application/json',
        persistent: false,
      });
      console.log(`Published ${body.type} -> ${routingKey}`);
    }
    await channel.close();
  } finally {
    await connection.close();
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
