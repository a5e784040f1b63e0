import { ResolutionFailure } from '../../../core/errors';
import {
  HttpMethod,
  HttpRequestOptions,
  HttpResponse,
  HttpTransport,
} from '../../../core/interfaces';

/**
 * Canned answer for a mocked URL
 */
export interface MockRoute {
  status?: number;
  headers?: Record<string, string>;
  body?: string;
  /**
   * Final URL, to simulate a redirect
   */
  url?: string;
  /**
   * Fail the request instead of answering
   */
  error?: Error;
}

export interface RecordedRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export type MockRouteHandler =
  | MockRoute
  | ((request: RecordedRequest) => MockRoute);

/**
 * Mock HTTP transport for testing
 * Answers from registered routes and records every request. Unknown URLs
 * answer 404.
 */
export class MockHttpTransport implements HttpTransport {
  private routes: Map<string, MockRouteHandler> = new Map();
  readonly requests: RecordedRequest[] = [];

  /**
   * Register a route for one method, or for every method when omitted
   */
  on(url: string, route: MockRouteHandler, method?: HttpMethod): this {
    this.routes.set(this.routeKey(url, method), route);
    return this;
  }

  /**
   * Serve an HTML document
   */
  onPage(url: string, html: string, headers: Record<string, string> = {}): this {
    return this.on(url, {
      status: 200,
      headers: { 'content-type': 'text/html; charset=utf-8', ...headers },
      body: html,
    });
  }

  /**
   * Accept notifications posted to an endpoint
   */
  onEndpoint(endpoint: string, status = 202): this {
    return this.on(endpoint, { status }, 'POST');
  }

  async fetch(
    url: string,
    options: HttpRequestOptions = {},
  ): Promise<HttpResponse> {
    const request: RecordedRequest = {
      method: options.method ?? 'GET',
      url,
      headers: options.headers ?? {},
      body: options.body,
    };
    this.requests.push(request);

    const handler =
      this.routes.get(this.routeKey(url, request.method)) ??
      this.routes.get(this.routeKey(url));
    const route = typeof handler === 'function' ? handler(request) : handler;
    if (!route) {
      return { status: 404, url, headers: {}, body: '' };
    }

    if (route.error) {
      throw route.error instanceof ResolutionFailure
        ? route.error
        : new ResolutionFailure(
            `${request.method} ${url} failed: ${route.error.message}`,
            url,
            undefined,
            route.error,
          );
    }

    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(route.headers ?? {})) {
      headers[key.toLowerCase()] = value;
    }
    return {
      status: route.status ?? 200,
      url: route.url ?? url,
      headers,
      body: request.method === 'HEAD' ? '' : route.body ?? '',
    };
  }

  submitNotification(
    endpoint: string,
    source: string,
    target: string,
  ): Promise<HttpResponse> {
    return this.fetch(endpoint, {
      method: 'POST',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({ source, target }).toString(),
    });
  }

  // ==================== Testing Utilities ====================

  requestsTo(url: string, method?: HttpMethod): RecordedRequest[] {
    return this.requests.filter(
      (request) => request.url === url && (!method || request.method === method),
    );
  }

  /**
   * Notifications posted so far, decoded
   */
  notifications(): Array<{ endpoint: string; source: string; target: string }> {
    return this.requests
      .filter((request) => request.method === 'POST')
      .map((request) => {
        const params = new URLSearchParams(request.body ?? '');
        return {
          endpoint: request.url,
          source: params.get('source') ?? '',
          target: params.get('target') ?? '',
        };
      });
  }

  reset(): void {
    this.routes.clear();
    this.requests.length = 0;
  }

  private routeKey(url: string, method?: HttpMethod): string {
    return `${method ?? '*'} ${url}`;
  }
}
