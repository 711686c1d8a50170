/**
 * Broker event envelope
 * Outer JSON wrapper published by the gateways on the events exchange.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';

export const EventEnvelopeSchema = z
  .object({
    event_id: z
      .union([z.string(), z.number()])
      .nullish()
      .transform((value) => (value === null || value === undefined || value === '' ? undefined : String(value))),
    type: z
      .string()
      .nullish()
      .transform((value) => value ?? undefined),
    account_id: z.union([z.string(), z.number()]).optional().nullable(),
    broker_login: z.union([z.string(), z.number()]).optional().nullable(),
    internal_account_id: z.string().optional().nullable(),
    platform: z.string().optional().nullable(),
    occurred_at: z.union([z.string(), z.number()]).optional().nullable(),
    payload: z.preprocess((value) => value ?? {}, z.record(z.unknown())),
  })
  .passthrough();

export type EventEnvelope = z.infer<typeof EventEnvelopeSchema>;

export type CanonicalEventType =
  | 'position.closed'
  | 'positions.snapshot'
  | 'account.info'
  | 'orders.pending'
  | 'price.tick'
  | 'candle.update';

const EVENT_ALIASES: Record<CanonicalEventType, string[]> = {
  'position.closed': ['position_closed', 'positions.closed'],
  'positions.snapshot': ['positions.update', 'open_positions'],
  'account.info': ['account_info', 'account.update'],
  'orders.pending': ['pending_orders.snapshot', 'pending_orders'],
  'price.tick': ['price.update', 'tick'],
  'candle.update': ['candle', 'candles.update'],
};

const TYPE_LOOKUP: Map<string, CanonicalEventType> = new Map();
for (const [canonical, aliases] of Object.entries(EVENT_ALIASES)) {
  if (!isCanonical(canonical)) continue;
  TYPE_LOOKUP.set(canonical, canonical);
  aliases.forEach((alias) => TYPE_LOOKUP.set(alias, canonical));
}

function isCanonical(value: string): value is CanonicalEventType {
  return Object.prototype.hasOwnProperty.call(EVENT_ALIASES, value);
}

/**
 * Canonical event type for a raw type string, or null when unknown
 */
export function canonicalEventType(type: string | undefined): CanonicalEventType | null {
  if (!type) return null;
  return TYPE_LOOKUP.get(type.trim().toLowerCase()) ?? null;
}

export interface ParsedEvent {
  eventId: string;
  /** True when the envelope carried no event_id and one was generated */
  generatedId: boolean;
  type: CanonicalEventType | null;
  rawType: string | undefined;
  envelope: EventEnvelope;
}

/**
 * Parse a message body. Throws on invalid JSON or a non-object envelope.
 * A null or empty event_id gets a generated one.
 */
export function parseEnvelope(body: Buffer | string): ParsedEvent {
  const text = typeof body === 'string' ? body : body.toString('utf8');
  const envelope = EventEnvelopeSchema.parse(JSON.parse(text));
  return {
    eventId: envelope.event_id ?? randomUUID(),
    generatedId: envelope.event_id === undefined,
    type: canonicalEventType(envelope.type),
    rawType: envelope.type,
    envelope,
  };
}
