export type QueryParams = Record<string, string | number | undefined>;

export interface GatewayClientOptions {
  /** Gateway origin, e.g. `https://gateway.example.com`. */
  baseUrl: string;
  /** Path between the origin and the site segment. */
  apiRoot?: string;
  site: string;
  device: string;
  username: string;
  password: string;
  userAgent?: string;
  timeoutMs?: number;
  maxPages?: number;
}

export interface RequestOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface PaginateOptions extends RequestOptions {
  maxPages?: number;
}

/** One decoded log-buffer response. `body` still holds the metadata keys. */
export interface LogBufferPage {
  url: string;
  body: Record<string, unknown>;
  next: string | null;
}

export interface PaginationSummary {
  pagesFetched: number;
  /** True when the page cap stopped a chain that still had a continuation reference. */
  truncated: boolean;
}

export type PropertyDocument = Record<string, unknown>;

export interface TrendLogReader {
  trendLogUrl(instance: number): string;
  paginate(
    url: string,
    query: QueryParams,
    options?: PaginateOptions
  ): AsyncGenerator<LogBufferPage, PaginationSummary, void>;
}

export interface PropertyReader {
  readProperty(objectId: string, property: string, options?: RequestOptions): Promise<PropertyDocument>;
}

export type GatewayReader = TrendLogReader & PropertyReader;
