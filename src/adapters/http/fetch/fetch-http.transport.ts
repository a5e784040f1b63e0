import { ResolutionFailure, toError } from '../../../core/errors';
import {
  HttpRequestOptions,
  HttpResponse,
  HttpTransport,
  HttpTransportFactory,
} from '../../../core/interfaces';

export interface FetchHttpTransportOptions {
  /**
   * Default timeout for every request (ms)
   */
  timeoutMs?: number;
  userAgent?: string;
}

const ACCEPT_DOCUMENTS =
  'text/html,application/xhtml+xml,text/markdown;q=0.9,text/plain;q=0.8,*/*;q=0.5';

/**
 * HTTP transport on the global fetch API
 *
 * Every request is aborted after its timeout. Redirects are followed and the
 * final URL is reported.
 */
export class FetchHttpTransport implements HttpTransport {
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: FetchHttpTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.userAgent = options.userAgent ?? 'webmention-engine/1.0';
  }

  async fetch(
    url: string,
    options: HttpRequestOptions = {},
  ): Promise<HttpResponse> {
    const method = options.method ?? 'GET';
    const timeout = options.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await fetch(url, {
        method,
        headers: {
          'User-Agent': this.userAgent,
          Accept: ACCEPT_DOCUMENTS,
          ...options.headers,
        },
        body: options.body,
        redirect: 'follow',
        signal: controller.signal,
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        status: response.status,
        url: response.url || url,
        headers,
        body: method === 'HEAD' ? '' : await response.text(),
      };
    } catch (error) {
      const cause = toError(error);
      throw new ResolutionFailure(
        controller.signal.aborted
          ? `${method} ${url} timed out after ${timeout}ms`
          : `${method} ${url} failed: ${cause.message}`,
        url,
        undefined,
        cause,
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  submitNotification(
    endpoint: string,
    source: string,
    target: string,
  ): Promise<HttpResponse> {
    return this.fetch(endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({ source, target }).toString(),
    });
  }
}

export const createFetchTransport: HttpTransportFactory = (timeoutMs, userAgent) =>
  new FetchHttpTransport({ timeoutMs, userAgent });
