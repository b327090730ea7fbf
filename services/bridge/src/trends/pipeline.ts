import pino, { type BaseLogger } from 'pino';
import { GatewayError, TransportError, UpstreamError, type TrendLogReader } from '@thermobridge/gateway-client';
import { downsample, DEFAULT_MAX_DISPLAY_POINTS } from './downsample';
import { extractRecords, type SkipReason } from './extractor';
import { DEFAULT_EXPECTED_INTERVAL_MS, DEFAULT_MAX_GAP_STEPS, fillGaps } from './interpolation';
import { formatLabel } from './labels';
import { buildLogBufferQuery, rangeWindow, resolveRange, type RangeWindow } from './ranges';
import { normalizeTimestamp, TimestampError } from './timestamps';
import type { RangeSpec, RawSample, TimedSample, TrendSample } from './types';

export interface TrendPipelineOptions {
  client: TrendLogReader;
  trendLogInstance: number;
  expectedIntervalMs?: number;
  maxGapSteps?: number;
  maxDisplayPoints?: number;
  maxPages?: number;
  timeoutMs?: number;
  logger?: BaseLogger;
  clock?: () => Date;
}

export interface TrendRunOptions {
  signal?: AbortSignal;
  logger?: BaseLogger;
}

export interface TrendStats {
  pagesFetched: number;
  truncated: boolean;
  extracted: number;
  skipped: Partial<Record<SkipReason, number>>;
  interpolated: number;
  unknownTags: string[];
}

export interface TrendResult {
  range: RangeSpec;
  window: RangeWindow;
  samples: TrendSample[];
  stats: TrendStats;
}

export type TrendFailureCode =
  | 'GATEWAY_TIMEOUT'
  | 'GATEWAY_UNREACHABLE'
  | 'GATEWAY_ERROR'
  | 'GATEWAY_FORMAT'
  | 'REQUEST_ABORTED'
  | 'INTERNAL';

export interface TrendFailure {
  code: TrendFailureCode;
  /** Safe to show to dashboard users. */
  message: string;
  /** Internal detail for logs only. */
  diagnostic: string;
  statusCode: number;
  range: RangeSpec;
  stats: TrendStats;
}

export type TrendOutcome = { ok: true; result: TrendResult } | { ok: false; failure: TrendFailure };

function emptyStats(): TrendStats {
  return { pagesFetched: 0, truncated: false, extracted: 0, skipped: {}, interpolated: 0, unknownTags: [] };
}

function countSkip(stats: TrendStats, reason: SkipReason): void {
  stats.skipped[reason] = (stats.skipped[reason] ?? 0) + 1;
}

export function describeFailure(error: unknown): Pick<TrendFailure, 'code' | 'message' | 'diagnostic' | 'statusCode'> {
  if (error instanceof TransportError) {
    const diagnostic = `${error.message} (${error.url})`;
    switch (error.code) {
      case 'TIMEOUT':
        return { code: 'GATEWAY_TIMEOUT', message: 'The building gateway did not respond in time', diagnostic, statusCode: 504 };
      case 'ABORTED':
        return { code: 'REQUEST_ABORTED', message: 'The trend request was cancelled', diagnostic, statusCode: 503 };
      default:
        return { code: 'GATEWAY_UNREACHABLE', message: 'The building gateway could not be reached', diagnostic, statusCode: 502 };
    }
  }
  if (error instanceof UpstreamError) {
    return {
      code: 'GATEWAY_ERROR',
      message: `The building gateway rejected the trend request (HTTP ${error.statusCode})`,
      diagnostic: `${error.message} (${error.url})${error.body ? `: ${error.body}` : ''}`,
      statusCode: 502
    };
  }
  if (error instanceof GatewayError) {
    return {
      code: 'GATEWAY_FORMAT',
      message: 'The building gateway returned an unreadable trend log',
      diagnostic: `${error.message} (${error.url})`,
      statusCode: 502
    };
  }
  return {
    code: 'INTERNAL',
    message: 'Unexpected error while building trend data',
    diagnostic: error instanceof Error ? error.stack ?? error.message : String(error),
    statusCode: 500
  };
}

/**
 * Fetches a trend log for one named range and turns it into display samples:
 * paginate, extract, normalize, sort, fill gaps, downsample, label.
 *
 * Per-record problems are skipped and counted. Gateway failures abort the run and come back
 * as `{ ok: false }`; partial history is never returned after an upstream error.
 */
export class TrendPipeline {
  private readonly client: TrendLogReader;
  private readonly trendLogInstance: number;
  private readonly expectedIntervalMs: number;
  private readonly maxGapSteps: number;
  private readonly maxDisplayPoints: number;
  private readonly maxPages?: number;
  private readonly timeoutMs?: number;
  private readonly logger: BaseLogger;
  private readonly clock: () => Date;

  constructor(options: TrendPipelineOptions) {
    this.client = options.client;
    this.trendLogInstance = options.trendLogInstance;
    this.expectedIntervalMs = options.expectedIntervalMs ?? DEFAULT_EXPECTED_INTERVAL_MS;
    this.maxGapSteps = options.maxGapSteps ?? DEFAULT_MAX_GAP_STEPS;
    this.maxDisplayPoints = options.maxDisplayPoints ?? DEFAULT_MAX_DISPLAY_POINTS;
    this.maxPages = options.maxPages;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? pino({ level: 'silent' });
    this.clock = options.clock ?? (() => new Date());
  }

  async run(rangeKey: string | undefined, options: TrendRunOptions = {}): Promise<TrendOutcome> {
    const logger = options.logger ?? this.logger;
    const range = resolveRange(rangeKey);
    const stats = emptyStats();

    try {
      const window = rangeWindow(range, this.clock());
      const raw = await this.collect(range, window, stats, options.signal, logger);
      const normalized = this.normalize(raw, stats, logger);
      normalized.sort((left, right) => left.epochMs - right.epochMs);

      const filled = fillGaps(normalized, {
        expectedIntervalMs: this.expectedIntervalMs,
        maxGapSteps: this.maxGapSteps
      });
      stats.interpolated = filled.length - normalized.length;

      const samples = downsample(filled, this.maxDisplayPoints).map((sample) => ({
        ...sample,
        label: formatLabel(sample, range.labelStyle)
      }));

      if (stats.truncated) {
        logger.warn({ range: range.key, pages: stats.pagesFetched }, 'trend log pagination stopped at page cap');
      }
      logger.info(
        {
          range: range.key,
          pages: stats.pagesFetched,
          extracted: stats.extracted,
          skipped: stats.skipped,
          interpolated: stats.interpolated,
          returned: samples.length
        },
        'trend log processed'
      );

      return { ok: true, result: { range, window, samples, stats } };
    } catch (error) {
      const failure = { ...describeFailure(error), range, stats };
      logger.error(
        { range: range.key, code: failure.code, diagnostic: failure.diagnostic, pages: stats.pagesFetched },
        'trend log request failed'
      );
      return { ok: false, failure };
    }
  }

  private async collect(
    range: RangeSpec,
    window: RangeWindow,
    stats: TrendStats,
    signal: AbortSignal | undefined,
    logger: BaseLogger
  ): Promise<RawSample[]> {
    const url = this.client.trendLogUrl(this.trendLogInstance);
    const query = buildLogBufferQuery(range, window);
    logger.debug({ range: range.key, url, query }, 'requesting trend log');

    const iterator = this.client.paginate(url, query, {
      signal,
      timeoutMs: this.timeoutMs,
      maxPages: this.maxPages
    });
    const collected: RawSample[] = [];
    const unknownTags = new Set<string>();

    let step = await iterator.next();
    while (!step.done) {
      stats.pagesFetched += 1;
      const extraction = extractRecords(step.value.body);
      for (const sample of extraction.samples) {
        collected.push(sample);
      }
      for (const skip of extraction.skipped) {
        countSkip(stats, skip.reason);
        logger.debug({ key: skip.key, reason: skip.reason, detail: skip.detail }, 'skipped trend record');
      }
      for (const tag of extraction.unknownTags) {
        unknownTags.add(tag);
      }
      step = await iterator.next();
    }

    stats.pagesFetched = step.value.pagesFetched;
    stats.truncated = step.value.truncated;
    stats.unknownTags = [...unknownTags];
    if (unknownTags.size > 0) {
      logger.warn({ tags: stats.unknownTags }, 'trend log contained unrecognised datum tags');
    }
    return collected;
  }

  private normalize(raw: RawSample[], stats: TrendStats, logger: BaseLogger): TimedSample[] {
    const samples: TimedSample[] = [];
    for (const record of raw) {
      try {
        const instant = normalizeTimestamp(record.timestamp);
        samples.push({ ...instant, timestamp: record.timestamp, value: record.value, interpolated: false });
      } catch (error) {
        if (!(error instanceof TimestampError)) {
          throw error;
        }
        countSkip(stats, 'invalid-timestamp');
        logger.debug({ key: record.key, timestamp: record.timestamp }, 'skipped trend record with invalid timestamp');
      }
    }
    stats.extracted = samples.length;
    return samples;
  }
}
