import type { TrendFailure, TrendFailureCode, TrendResult } from './pipeline';

export interface TrendRecord {
  timestamp: string;
  temperature: number;
  formatted_time: string;
  interpolated?: true;
}

export interface TrendResponseBody {
  records: TrendRecord[];
  time_range: string;
  actual_range: string;
  start_time: string;
  end_time: string;
  total_records: number;
  interpolated_records: number;
  partial: boolean;
}

export interface TrendErrorBody {
  error: string;
  code: TrendFailureCode;
  records: [];
  total_records: 0;
  actual_range: 'Error';
  time_range: string;
  partial: false;
}

export function toTrendResponse(result: TrendResult): TrendResponseBody {
  const records = result.samples.map((sample): TrendRecord => {
    const record: TrendRecord = {
      timestamp: sample.timestamp,
      temperature: sample.value,
      formatted_time: sample.label
    };
    if (sample.interpolated) {
      record.interpolated = true;
    }
    return record;
  });

  return {
    records,
    time_range: result.range.key,
    actual_range: records.length > 0 ? `${records.length} points` : 'No data',
    start_time: result.window.start.toISOString(),
    end_time: result.window.end.toISOString(),
    total_records: records.length,
    interpolated_records: records.filter((record) => record.interpolated).length,
    partial: result.stats.truncated
  };
}

export function toTrendErrorBody(failure: TrendFailure): TrendErrorBody {
  return {
    error: failure.message,
    code: failure.code,
    records: [],
    total_records: 0,
    actual_range: 'Error',
    time_range: failure.range.key,
    partial: false
  };
}
