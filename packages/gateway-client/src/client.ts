import { Buffer } from 'node:buffer';
import { fetch, Headers } from 'undici';
import type { Response } from 'undici';
import { isPlainObject } from '@thermobridge/shared';
import { FormatError, GatewayError, TransportError, UpstreamError } from './errors';
import type {
  GatewayClientOptions,
  GatewayReader,
  LogBufferPage,
  PaginateOptions,
  PaginationSummary,
  PropertyDocument,
  QueryParams,
  RequestOptions
} from './types';

export const DEFAULT_API_ROOT = 'enteliweb/api/.bacnet';
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_PAGES = 50;
export const CONTINUATION_KEY = '$next';

const ERROR_BODY_LIMIT = 512;

function combineSignals(primary: AbortController, external?: AbortSignal): () => void {
  if (!external) {
    return () => undefined;
  }
  if (external.aborted) {
    primary.abort(external.reason);
    return () => undefined;
  }
  const onAbort = () => {
    primary.abort(external.reason);
  };
  external.addEventListener('abort', onAbort, { once: true });
  return () => external.removeEventListener('abort', onAbort);
}

// Object ids such as `analog-input,201001` keep their comma.
function encodeSegment(segment: string): string {
  return encodeURIComponent(segment).replace(/%2C/gi, ',');
}

export class GatewayClient implements GatewayReader {
  private readonly origin: string;
  private readonly deviceRoot: string;
  private readonly authorization: string;
  private readonly userAgent?: string;
  private readonly timeoutMs: number;
  private readonly maxPages: number;

  constructor(options: GatewayClientOptions) {
    if (!options.baseUrl) {
      throw new Error('GatewayClient requires a baseUrl');
    }
    const base = new URL(options.baseUrl);
    this.origin = base.origin;
    const prefix = base.pathname.replace(/\/+$/, '');

    const segments = (options.apiRoot ?? DEFAULT_API_ROOT)
      .split('/')
      .filter((segment) => segment.length > 0)
      .map(encodeSegment);
    segments.push(encodeSegment(options.site), encodeSegment(options.device));
    this.deviceRoot = `${this.origin}${prefix}/${segments.join('/')}`;

    const credentials = Buffer.from(`${options.username}:${options.password}`, 'utf8').toString('base64');
    this.authorization = `Basic ${credentials}`;
    this.userAgent = options.userAgent;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  }

  objectUrl(objectId: string, property?: string): string {
    const suffix = property ? `/${encodeSegment(property)}` : '';
    return `${this.deviceRoot}/${encodeSegment(objectId)}${suffix}`;
  }

  trendLogUrl(instance: number): string {
    return this.objectUrl(`trend-log,${instance}`, 'log-buffer');
  }

  /**
   * Resolves a continuation reference, absolute or host-relative, against the gateway origin.
   * Only the format selector is added; the reference already carries the paging state.
   * References to another origin are refused so credentials never leave the gateway.
   */
  resolveContinuation(reference: string): string {
    const url = new URL(reference, `${this.origin}/`);
    if (url.origin !== this.origin) {
      throw new FormatError(`Continuation reference points outside the gateway origin: ${url.origin}`, {
        url: url.toString()
      });
    }
    if (!url.searchParams.has('alt')) {
      url.searchParams.set('alt', 'json');
    }
    return url.toString();
  }

  async readProperty(objectId: string, property: string, options: RequestOptions = {}): Promise<PropertyDocument> {
    const url = this.buildUrl(this.objectUrl(objectId, property), { alt: 'json' });
    return this.getJson(url, options);
  }

  async fetchPage(url: string, query?: QueryParams, options: RequestOptions = {}): Promise<LogBufferPage> {
    const target = query ? this.buildUrl(url, query) : url;
    const body = await this.getJson(target, options);
    const continuation = body[CONTINUATION_KEY];
    return {
      url: target,
      body,
      next: typeof continuation === 'string' && continuation.trim().length > 0 ? continuation.trim() : null
    };
  }

  async *paginate(
    url: string,
    query: QueryParams,
    options: PaginateOptions = {}
  ): AsyncGenerator<LogBufferPage, PaginationSummary, void> {
    const maxPages = options.maxPages ?? this.maxPages;
    let pagesFetched = 0;
    let page = await this.fetchPage(url, query, options);

    for (;;) {
      pagesFetched += 1;
      yield page;
      if (!page.next) {
        return { pagesFetched, truncated: false };
      }
      if (pagesFetched >= maxPages) {
        return { pagesFetched, truncated: true };
      }
      page = await this.fetchPage(this.resolveContinuation(page.next), undefined, options);
    }
  }

  private buildUrl(url: string, query: QueryParams): string {
    const target = new URL(url);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        target.searchParams.set(key, String(value));
      }
    }
    return target.toString();
  }

  private buildHeaders(): Headers {
    const headers = new Headers({
      Accept: 'application/json',
      Authorization: this.authorization
    });
    if (this.userAgent) {
      headers.set('User-Agent', this.userAgent);
    }
    return headers;
  }

  private async getJson(url: string, options: RequestOptions): Promise<Record<string, unknown>> {
    const controller = new AbortController();
    const detach = combineSignals(controller, options.signal);
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    let timedOut = false;
    let timeout: NodeJS.Timeout | undefined;
    if (timeoutMs > 0) {
      timeout = setTimeout(() => {
        timedOut = true;
        controller.abort(new Error('Request timed out'));
      }, timeoutMs);
    }

    try {
      const response = await fetch(url, { method: 'GET', headers: this.buildHeaders(), signal: controller.signal });
      if (!response.ok) {
        const body = await response.text().catch(() => null);
        throw new UpstreamError(`Gateway responded with HTTP ${response.status}`, {
          url,
          statusCode: response.status,
          body: body === null ? null : body.slice(0, ERROR_BODY_LIMIT)
        });
      }
      const text = await response.text();
      return this.decodeBody(url, response, text);
    } catch (error) {
      if (error instanceof GatewayError) {
        throw error;
      }
      if (timedOut) {
        throw new TransportError(`Gateway request timed out after ${timeoutMs}ms`, {
          url,
          code: 'TIMEOUT',
          cause: error
        });
      }
      if (controller.signal.aborted) {
        throw new TransportError('Gateway request aborted', { url, code: 'ABORTED', cause: error });
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Gateway request failed: ${reason}`, { url, cause: error });
    } finally {
      if (timeout) {
        clearTimeout(timeout);
      }
      detach();
    }
  }

  private decodeBody(url: string, response: Response, text: string): Record<string, unknown> {
    const contentType = response.headers.get('content-type');
    if (contentType && !contentType.toLowerCase().includes('json')) {
      throw new FormatError(`Expected a JSON response but received '${contentType}'`, { url });
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new FormatError('Gateway response is not valid JSON', { url, cause: error });
    }
    if (!isPlainObject(parsed)) {
      throw new FormatError('Gateway response is not a JSON object', { url });
    }
    return parsed;
  }
}
