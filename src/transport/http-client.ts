/**
 * HTTP transport for the Prism client.
 *
 * An `HttpClient` performs exactly one request and reports the status and
 * body; it never turns an HTTP status into an exception. Connection failures
 * and timeouts are the only errors it raises. Status policy belongs to the
 * services that call it.
 */

import type { AuthProvider } from '../auth/index.js';
import { NetworkError, PrismError, TimeoutError } from '../errors/index.js';
import {
  MetricNames,
  createNoopObservability,
  logElapsed,
  type Observability,
} from '../observability/index.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH';

export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * A file sent as the `file` part of a multipart upload.
 */
export interface UploadFile {
  filename: string;
  content: Uint8Array;
  contentType?: string;
}

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  query?: QueryParams;
  /** JSON body */
  body?: unknown;
  /** Multipart file; takes the place of `body` */
  file?: UploadFile;
  headers?: Record<string, string>;
}

export interface HttpResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  /** Parsed JSON body, or undefined when the body is empty or not JSON */
  body: unknown;
  /** Raw response text */
  text: string;
}

/**
 * Single-request HTTP collaborator used by every service.
 */
export interface HttpClient {
  request(request: HttpRequest): Promise<HttpResponse>;
  get(url: string, query?: QueryParams): Promise<HttpResponse>;
  post(url: string, body?: unknown): Promise<HttpResponse>;
  put(url: string, body: unknown): Promise<HttpResponse>;
  patch(url: string, body: unknown): Promise<HttpResponse>;
  upload(url: string, file: UploadFile): Promise<HttpResponse>;
}

/**
 * Convenience verbs expressed through `request`.
 */
export abstract class BaseHttpClient implements HttpClient {
  abstract request(request: HttpRequest): Promise<HttpResponse>;

  get(url: string, query?: QueryParams): Promise<HttpResponse> {
    return this.request({ method: 'GET', url, query });
  }

  post(url: string, body?: unknown): Promise<HttpResponse> {
    return this.request({ method: 'POST', url, body });
  }

  put(url: string, body: unknown): Promise<HttpResponse> {
    return this.request({ method: 'PUT', url, body });
  }

  patch(url: string, body: unknown): Promise<HttpResponse> {
    return this.request({ method: 'PATCH', url, body });
  }

  upload(url: string, file: UploadFile): Promise<HttpResponse> {
    return this.request({ method: 'POST', url, file });
  }
}

export interface FetchHttpClientOptions {
  auth: AuthProvider;
  timeout: number;
  headers?: Record<string, string>;
  fetch?: typeof fetch;
  observability?: Observability;
}

/**
 * Implementation of HttpClient using the Fetch API
 */
export class FetchHttpClient extends BaseHttpClient {
  private readonly auth: AuthProvider;
  private readonly timeout: number;
  private readonly defaultHeaders: Record<string, string>;
  private readonly fetchImpl: typeof fetch;
  private readonly observability: Observability;

  constructor(options: FetchHttpClientOptions) {
    super();
    this.auth = options.auth;
    this.timeout = options.timeout;
    this.defaultHeaders = options.headers ?? {};
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.observability = options.observability ?? createNoopObservability();
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    const { logger, metrics } = this.observability;
    const url = buildUrl(request.url, request.query);

    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...this.defaultHeaders,
      ...(await this.auth.getAuthHeaders()),
      ...request.headers,
    };

    let body: string | FormData | undefined;
    if (request.file !== undefined) {
      // fetch sets the multipart boundary itself
      const form = new FormData();
      const blob = new Blob([request.file.content], {
        type: request.file.contentType ?? 'application/octet-stream',
      });
      form.append('file', blob, request.file.filename);
      body = form;
    } else if (request.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(request.body);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    const startTime = Date.now();

    logger.debug('HTTP request', { method: request.method, url });

    try {
      const response = await this.fetchImpl(url, {
        method: request.method,
        headers,
        body,
        signal: controller.signal,
      });

      const result = await this.toHttpResponse(response);
      const durationMs = Date.now() - startTime;

      metrics.incrementCounter(MetricNames.REQUEST_COUNT, 1, {
        method: request.method,
        status: String(result.status),
      });
      metrics.recordHistogram(MetricNames.REQUEST_DURATION_MS, durationMs, { method: request.method });
      logElapsed(logger, request.method, url, result.status, durationMs);

      if (result.status === 401) {
        // the next request obtains a fresh session
        this.auth.invalidate();
      }

      if (!isSuccess(result.status)) {
        logger.warn('Unexpected HTTP status', {
          method: request.method,
          url,
          status: result.status,
          reason: result.statusText,
          text: result.text,
        });
      }

      return result;
    } catch (error) {
      const failure = this.toTransportFailure(error, url);
      metrics.incrementCounter(MetricNames.REQUEST_ERRORS, 1, {
        method: request.method,
        code: failure.code,
      });
      throw failure;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async toHttpResponse(response: Response): Promise<HttpResponse> {
    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });

    const text = await response.text();
    const contentType = headers['content-type'] ?? '';

    let body: unknown;
    if (text.length > 0 && contentType.includes('json')) {
      try {
        body = JSON.parse(text);
      } catch (error) {
        this.observability.logger.warn('Response declared JSON but could not be parsed', {
          status: response.status,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return {
      status: response.status,
      statusText: response.statusText,
      headers,
      body,
      text,
    };
  }

  private toTransportFailure(error: unknown, url: string): PrismError {
    if (error instanceof PrismError) {
      return error;
    }

    if (error instanceof Error && error.name === 'AbortError') {
      return new TimeoutError(this.timeout, url);
    }

    return new NetworkError(`Request to ${url} failed`, error);
  }
}

/**
 * True for 2xx statuses
 */
export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Appends query parameters, skipping undefined values.
 */
export function buildUrl(url: string, query?: QueryParams): string {
  if (!query) {
    return url;
  }

  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      params.set(key, String(value));
    }
  }

  const qs = params.toString();
  if (qs.length === 0) {
    return url;
  }

  return `${url}${url.includes('?') ? '&' : '?'}${qs}`;
}
