import { isPlainObject } from '@thermobridge/shared';
import { readLogDatum } from './logDatum';
import type { RawSample } from './types';

export const METADATA_KEYS: ReadonlySet<string> = new Set(['$base', '$next']);

export type SkipReason = 'not-an-object' | 'missing-timestamp' | 'status-row' | 'no-numeric-value' | 'invalid-timestamp';

export interface SkippedRecord {
  key: string;
  reason: SkipReason;
  detail?: string;
}

export interface ExtractionResult {
  samples: RawSample[];
  skipped: SkippedRecord[];
  unknownTags: string[];
}

function readTimestamp(entry: Record<string, unknown>): string | null {
  const raw = entry.timestamp;
  if (typeof raw === 'string') {
    return raw;
  }
  if (isPlainObject(raw) && typeof raw.value === 'string') {
    return raw.value;
  }
  return null;
}

/**
 * Flattens one log-buffer page into `(timestamp, value)` samples. Malformed entries are
 * skipped and reported, never thrown.
 */
export function extractRecords(body: Record<string, unknown>): ExtractionResult {
  const samples: RawSample[] = [];
  const skipped: SkippedRecord[] = [];
  const unknownTags = new Set<string>();

  for (const [key, entry] of Object.entries(body)) {
    if (METADATA_KEYS.has(key)) {
      continue;
    }
    if (!isPlainObject(entry)) {
      skipped.push({ key, reason: 'not-an-object' });
      continue;
    }

    const timestamp = readTimestamp(entry);
    if (timestamp === null) {
      skipped.push({ key, reason: 'missing-timestamp' });
      continue;
    }

    const datum = isPlainObject(entry.logDatum) ? entry.logDatum : {};
    const reading = readLogDatum(datum);
    for (const tag of reading.unknownTags) {
      unknownTags.add(tag);
    }

    if (reading.value === null) {
      skipped.push({
        key,
        reason: reading.statusOnly ? 'status-row' : 'no-numeric-value',
        detail: Object.keys(datum).join(',') || undefined
      });
      continue;
    }

    samples.push({ key, timestamp, value: reading.value });
  }

  return { samples, skipped, unknownTags: [...unknownTags] };
}
