export type TrendRangeKey = '1h' | '4h' | '12h' | '24h' | '7d';

export type LabelStyle = 'time' | 'date-time' | 'date';

export interface RangeSpec {
  key: TrendRangeKey;
  lookbackMs: number;
  /** Sent as `max-results`; also a rough proxy for the expected volume. */
  maxResults: number;
  /** When false the log buffer is read in full, without `published-*` filters. */
  serverFiltered: boolean;
  labelStyle: LabelStyle;
}

/** An absolute instant plus the UTC offset (minutes) it was written in. */
export interface NormalizedTimestamp {
  epochMs: number;
  offsetMinutes: number;
}

export interface RawSample {
  key: string;
  timestamp: string;
  value: number;
}

export interface TimedSample extends NormalizedTimestamp {
  timestamp: string;
  value: number;
  interpolated: boolean;
}

export interface TrendSample extends TimedSample {
  label: string;
}
