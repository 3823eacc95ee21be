import { BaseHttpClient, type HttpMethod, type HttpRequest, type HttpResponse } from '../transport/index.js';

export type Responder = (request: HttpRequest) => HttpResponse | Promise<HttpResponse>;

interface Route {
  method: HttpMethod;
  path: string | RegExp;
  respond: Responder;
  once: boolean;
  used: boolean;
}

export function jsonResponse(status: number, body: unknown, statusText = ''): HttpResponse {
  return {
    status,
    statusText,
    headers: { 'content-type': 'application/json' },
    body,
    text: JSON.stringify(body),
  };
}

export function textResponse(status: number, text: string, statusText = ''): HttpResponse {
  return {
    status,
    statusText,
    headers: { 'content-type': 'text/plain' },
    body: undefined,
    text,
  };
}

/**
 * In-process HttpClient that answers from registered routes and records every request.
 *
 * A string path matches when the request URL ends with it. One-shot routes
 * are consumed in registration order before persistent routes are tried.
 */
export class MockHttpClient extends BaseHttpClient {
  readonly requests: HttpRequest[] = [];
  private readonly routes: Route[] = [];

  on(method: HttpMethod, path: string | RegExp, response: HttpResponse | Responder): this {
    this.routes.push({ method, path, respond: toResponder(response), once: false, used: false });
    return this;
  }

  once(method: HttpMethod, path: string | RegExp, response: HttpResponse | Responder): this {
    this.routes.push({ method, path, respond: toResponder(response), once: true, used: false });
    return this;
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);

    const candidates = this.routes.filter((route) => route.method === request.method && matches(route.path, request.url));
    const route = candidates.find((candidate) => candidate.once && !candidate.used) ?? candidates.find((candidate) => !candidate.once);

    if (route === undefined) {
      throw new Error(`No mock route for ${request.method} ${request.url}`);
    }

    route.used = true;
    return route.respond(request);
  }

  /**
   * Requests recorded for a method, optionally only those whose URL matches `path`.
   */
  calls(method: HttpMethod, path?: string | RegExp): HttpRequest[] {
    return this.requests.filter(
      (request) => request.method === method && (path === undefined || matches(path, request.url))
    );
  }
}

function toResponder(response: HttpResponse | Responder): Responder {
  return typeof response === 'function' ? response : () => response;
}

function matches(path: string | RegExp, url: string): boolean {
  return typeof path === 'string' ? url.endsWith(path) : path.test(url);
}
