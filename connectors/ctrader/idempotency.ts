/**
 * Idempotency headers for cTrader write calls
 */
import { createHash, randomUUID } from 'crypto';

/**
 * Compact JSON with object keys sorted at every level
 */
export function stableStringify(value: unknown): string {
  if (value === undefined) return 'null';
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map((v) => stableStringify(v)).join(',')}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',')}}`;
}

/**
 * SHA-256 hex of {account_id, natural, operation}; identical for retries of the same write
 */
export function idempotencyKey(accountId: string, operation: string, natural: Record<string, unknown>): string {
  const canonical = stableStringify({ account_id: accountId, natural, operation });
  return createHash('sha256').update(canonical, 'utf8').digest('hex');
}

export function newRequestId(): string {
  return randomUUID().replace(/-/g, '');
}

export type WriteHeaders = {
  'Idempotency-Key': string;
  'X-Request-ID': string;
};

export function writeHeaders(accountId: string, operation: string, natural: Record<string, unknown>): WriteHeaders {
  return {
    'Idempotency-Key': idempotencyKey(accountId, operation, natural),
    'X-Request-ID': newRequestId(),
  };
}
