/**
 * Helpers for reading loosely-typed broker payloads
 */
import type { BrokerPayload } from './types';

export function isRecord(value: unknown): value is BrokerPayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): BrokerPayload {
  return isRecord(value) ? value : {};
}

export function asRecordArray(value: unknown): BrokerPayload[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

/**
 * Numeric coercion; returns fallback for null/undefined/NaN/unparseable input
 */
export function toFloat(value: unknown, fallback: number): number;
export function toFloat(value: unknown, fallback?: number | null): number | null;
export function toFloat(value: unknown, fallback: number | null = null): number | null {
  if (value === null || value === undefined || value === '') return fallback;
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : fallback;
}

export function toInt(value: unknown, fallback: number | null = null): number | null {
  const n = toFloat(value, null);
  return n === null ? fallback : Math.trunc(n);
}

export function toStr(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return null;
}

/** First present (non-null, non-undefined) value among the keys */
export function pick(source: BrokerPayload, ...keys: string[]): unknown {
  for (const key of keys) {
    const v = source[key];
    if (v !== null && v !== undefined) return v;
  }
  return undefined;
}

/**
 * First truthy value, else the last one. Zero and empty strings fall through.
 */
export function firstTruthy(...values: unknown[]): unknown {
  for (const v of values) {
    if (v) return v;
  }
  return values[values.length - 1];
}

/**
 * Epoch seconds from an ISO string, seconds, or milliseconds.
 * Values above 1e12 are treated as milliseconds.
 */
export function toEpochSeconds(value: unknown): number | null {
  if (value === null || value === undefined || value === '') return null;
  if (value instanceof Date) {
    const ms = value.getTime();
    return Number.isFinite(ms) ? Math.floor(ms / 1000) : null;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    return value > 1e12 ? Math.floor(value / 1000) : Math.floor(value);
  }
  if (typeof value === 'string') {
    const numeric = Number(value);
    if (Number.isFinite(numeric)) {
      return toEpochSeconds(numeric);
    }
    const ms = Date.parse(value);
    return Number.isFinite(ms) ? Math.floor(ms / 1000) : null;
  }
  return null;
}

/** Date from epoch seconds / ms / ISO string; falls back to now */
export function parseTimestamp(value: unknown, now: () => Date = () => new Date()): Date {
  const seconds = toEpochSeconds(value);
  return seconds === null ? now() : new Date(seconds * 1000);
}
