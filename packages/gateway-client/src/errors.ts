export type GatewayErrorCode = 'TRANSPORT' | 'TIMEOUT' | 'ABORTED' | 'UPSTREAM' | 'FORMAT';

export class GatewayError extends Error {
  readonly code: GatewayErrorCode;
  readonly url: string;

  constructor(message: string, options: { code: GatewayErrorCode; url: string; cause?: unknown }) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'GatewayError';
    this.code = options.code;
    this.url = options.url;
  }
}

/** The gateway could not be reached, or the request was cut short by a timeout or abort. */
export class TransportError extends GatewayError {
  constructor(message: string, options: { url: string; code?: 'TRANSPORT' | 'TIMEOUT' | 'ABORTED'; cause?: unknown }) {
    super(message, { code: options.code ?? 'TRANSPORT', url: options.url, cause: options.cause });
    this.name = 'TransportError';
  }

  get timedOut(): boolean {
    return this.code === 'TIMEOUT';
  }
}

export class UpstreamError extends GatewayError {
  readonly statusCode: number;
  readonly body: string | null;

  constructor(message: string, options: { url: string; statusCode: number; body?: string | null }) {
    super(message, { code: 'UPSTREAM', url: options.url });
    this.name = 'UpstreamError';
    this.statusCode = options.statusCode;
    this.body = options.body ?? null;
  }
}

export class FormatError extends GatewayError {
  constructor(message: string, options: { url: string; cause?: unknown }) {
    super(message, { code: 'FORMAT', url: options.url, cause: options.cause });
    this.name = 'FormatError';
  }
}
