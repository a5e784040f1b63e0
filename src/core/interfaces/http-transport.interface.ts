/**
 * HTTP methods the engine issues
 */
export type HttpMethod = 'GET' | 'HEAD' | 'POST';

/**
 * Options for a single HTTP request
 */
export interface HttpRequestOptions {
  method?: HttpMethod;
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
}

/**
 * A fully read HTTP response
 *
 * `url` is the final URL after redirects and `headers` keys are lowercase.
 */
export interface HttpResponse {
  status: number;
  url: string;
  headers: Record<string, string>;
  body: string;
}

/**
 * HTTP transport - everything the engine needs from the network
 *
 * Both operations carry a bounded timeout. Network failures and timeouts
 * raise ResolutionFailure; any HTTP status is returned as a response.
 */
export interface HttpTransport {
  /**
   * Fetch a URL, following redirects
   */
  fetch(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;

  /**
   * POST a form-encoded `source`/`target` notification to an endpoint
   */
  submitNotification(
    endpoint: string,
    source: string,
    target: string,
  ): Promise<HttpResponse>;
}

/**
 * Builds the transport when the configuration supplies none
 */
export type HttpTransportFactory = (
  timeoutMs: number,
  userAgent: string,
) => HttpTransport;

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * 404 and 410 mean the resource is gone
 */
export function isGoneStatus(status: number): boolean {
  return status === 404 || status === 410;
}
