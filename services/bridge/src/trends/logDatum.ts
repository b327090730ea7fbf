import { isPlainObject } from '@thermobridge/shared';

export type DecodedContainer =
  | { kind: 'numeric'; tag: string; value: number }
  | { kind: 'status'; tag: string }
  | { kind: 'empty'; tag: string }
  | { kind: 'unknown'; tag: string; value: number | null };

export interface DatumReading {
  value: number | null;
  /** Tag of the container the value came from. */
  tag: string | null;
  statusOnly: boolean;
  unknownTags: string[];
}

const PREFERRED_TAG = 'real-value';

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

// Logger state changes and text markers, never measurements.
export const STATUS_TAGS: ReadonlySet<string> = new Set([
  'log-status',
  'event-state',
  'string-value',
  'time-change',
  'failure',
  'null-value'
]);

export function coerceNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!DECIMAL_PATTERN.test(trimmed)) {
      return null;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function coerceInteger(value: unknown): number | null {
  const parsed = coerceNumber(value);
  return parsed !== null && Number.isInteger(parsed) ? parsed : null;
}

function coerceBoolean(value: unknown): number | null {
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  const normalized = String(value).trim().toLowerCase();
  if (['true', 'active', '1'].includes(normalized)) {
    return 1;
  }
  if (['false', 'inactive', '0'].includes(normalized)) {
    return 0;
  }
  return null;
}

const NUMERIC_DECODERS: Readonly<Record<string, (value: unknown) => number | null>> = {
  'real-value': coerceNumber,
  'double-value': coerceNumber,
  'unsigned-value': coerceInteger,
  'signed-value': coerceInteger,
  'integer-value': coerceInteger,
  'enumerated-value': coerceInteger,
  'boolean-value': coerceBoolean
};

function embeddedValue(container: unknown): { present: true; value: unknown } | { present: false } {
  if (isPlainObject(container) && 'value' in container) {
    return { present: true, value: container.value };
  }
  return { present: false };
}

export function decodeContainer(tag: string, container: unknown): DecodedContainer {
  if (STATUS_TAGS.has(tag)) {
    return { kind: 'status', tag };
  }
  const embedded = embeddedValue(container);
  const decoder = Object.prototype.hasOwnProperty.call(NUMERIC_DECODERS, tag) ? NUMERIC_DECODERS[tag] : undefined;
  if (!decoder) {
    return { kind: 'unknown', tag, value: embedded.present ? coerceNumber(embedded.value) : null };
  }
  if (!embedded.present) {
    return { kind: 'empty', tag };
  }
  const value = decoder(embedded.value);
  return value === null ? { kind: 'empty', tag } : { kind: 'numeric', tag, value };
}

/**
 * Picks the measurement out of a `logDatum` mapping. A decodable `real-value` wins; otherwise
 * the first container, in payload order, holding a numeric value. Unknown tags are scanned
 * for any numeric `value` leaf and reported back in `unknownTags`.
 */
export function readLogDatum(datum: Record<string, unknown>): DatumReading {
  let chosen: { tag: string; value: number } | null = null;
  let sawStatus = false;
  const unknownTags: string[] = [];

  for (const [tag, container] of Object.entries(datum)) {
    const decoded = decodeContainer(tag, container);
    switch (decoded.kind) {
      case 'status':
        sawStatus = true;
        break;
      case 'unknown':
        unknownTags.push(tag);
        if (decoded.value !== null && chosen === null) {
          chosen = { tag, value: decoded.value };
        }
        break;
      case 'numeric':
        if (chosen === null || tag === PREFERRED_TAG) {
          chosen = { tag, value: decoded.value };
        }
        break;
      case 'empty':
        break;
    }
  }

  return {
    value: chosen?.value ?? null,
    tag: chosen?.tag ?? null,
    statusOnly: chosen === null && sawStatus,
    unknownTags
  };
}
