import type { RangeSpec, TrendRangeKey } from './types';

const HOUR_MS = 60 * 60 * 1000;

export const RANGE_SPECS: Readonly<Record<TrendRangeKey, RangeSpec>> = {
  '1h': { key: '1h', lookbackMs: HOUR_MS, maxResults: 20, serverFiltered: true, labelStyle: 'time' },
  '4h': { key: '4h', lookbackMs: 4 * HOUR_MS, maxResults: 60, serverFiltered: true, labelStyle: 'time' },
  '12h': { key: '12h', lookbackMs: 12 * HOUR_MS, maxResults: 150, serverFiltered: true, labelStyle: 'date-time' },
  '24h': { key: '24h', lookbackMs: 24 * HOUR_MS, maxResults: 300, serverFiltered: true, labelStyle: 'date-time' },
  '7d': { key: '7d', lookbackMs: 7 * 24 * HOUR_MS, maxResults: 50_000, serverFiltered: false, labelStyle: 'date' }
};

export const DEFAULT_RANGE: TrendRangeKey = '1h';

export function isTrendRangeKey(value: string): value is TrendRangeKey {
  return Object.prototype.hasOwnProperty.call(RANGE_SPECS, value);
}

/** Unknown or missing keys fall back to the one-hour window. */
export function resolveRange(value: string | undefined | null): RangeSpec {
  const key = value?.trim() ?? '';
  return isTrendRangeKey(key) ? RANGE_SPECS[key] : RANGE_SPECS[DEFAULT_RANGE];
}

// The gateway expects second precision with a literal Z.
export function formatGatewayInstant(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

export interface RangeWindow {
  start: Date;
  end: Date;
}

export function rangeWindow(range: RangeSpec, now: Date): RangeWindow {
  return { start: new Date(now.getTime() - range.lookbackMs), end: now };
}

export function buildLogBufferQuery(range: RangeSpec, window: RangeWindow): Record<string, string | number> {
  const query: Record<string, string | number> = {
    alt: 'json',
    'max-results': range.maxResults
  };
  if (range.serverFiltered) {
    query['published-ge'] = formatGatewayInstant(window.start);
    query['published-le'] = formatGatewayInstant(window.end);
  }
  return query;
}
