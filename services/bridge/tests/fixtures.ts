import type {
  LogBufferPage,
  PaginateOptions,
  PaginationSummary,
  PropertyDocument,
  PropertyReader,
  QueryParams,
  RequestOptions,
  TrendLogReader
} from '@thermobridge/gateway-client';

export const MINUTE_MS = 60_000;
export const BASE_MS = Date.UTC(2025, 6, 1, 10, 0, 0);

export const logRecord = (timestamp: string, value: number | string) => ({
  timestamp: { value: timestamp },
  logDatum: { 'real-value': { value } }
});

/** One log-buffer page with numbered entries, as the gateway lays them out. */
export const logPage = (records: unknown[]): Record<string, unknown> => {
  const body: Record<string, unknown> = { $base: 'List' };
  records.forEach((record, index) => {
    body[String(index + 1)] = record;
  });
  return body;
};

/** Records spaced `spacingMinutes` apart from {@link BASE_MS}. */
export const evenlySpaced = (count: number, spacingMinutes = 5, startValue = 70): unknown[] =>
  Array.from({ length: count }, (_, index) =>
    logRecord(new Date(BASE_MS + index * spacingMinutes * MINUTE_MS).toISOString(), startValue + index * 0.1)
  );

export interface PaginateCall {
  url: string;
  query: QueryParams;
  options?: PaginateOptions;
}

export class FakeTrendLog implements TrendLogReader {
  readonly calls: PaginateCall[] = [];

  constructor(
    private readonly pages: Array<Record<string, unknown> | Error>,
    private readonly truncated = false
  ) {}

  trendLogUrl(instance: number): string {
    return `http://gateway.test/trend-log,${instance}/log-buffer`;
  }

  async *paginate(
    url: string,
    query: QueryParams,
    options?: PaginateOptions
  ): AsyncGenerator<LogBufferPage, PaginationSummary, void> {
    this.calls.push({ url, query, options });
    let pagesFetched = 0;
    for (const page of this.pages) {
      if (page instanceof Error) {
        throw page;
      }
      pagesFetched += 1;
      yield { url, body: page, next: null };
    }
    return { pagesFetched, truncated: this.truncated };
  }
}

export class FakeProperties implements PropertyReader {
  readonly requests: Array<{ objectId: string; property: string; options?: RequestOptions }> = [];

  constructor(private readonly documents: Record<string, PropertyDocument | Error>) {}

  async readProperty(objectId: string, property: string, options?: RequestOptions): Promise<PropertyDocument> {
    this.requests.push({ objectId, property, options });
    const document = this.documents[`${objectId}/${property}`];
    if (document === undefined) {
      throw new Error(`no fixture for ${objectId}/${property}`);
    }
    if (document instanceof Error) {
      throw document;
    }
    return document;
  }
}

export const baseEnv = (overrides: Record<string, string> = {}): Record<string, string> => ({
  GATEWAY_BASE_URL: 'http://gateway.test',
  GATEWAY_SITE: 'site-a',
  GATEWAY_DEVICE: '100',
  GATEWAY_USERNAME: 'test-user',
  GATEWAY_PASSWORD: 'test-secret',
  TREND_LOG_INSTANCE: '7',
  ...overrides
});
