import { ResolutionFailure, toError } from '../errors';
import {
  HttpResponse,
  HttpTransport,
  isGoneStatus,
  isSuccessStatus,
} from '../interfaces';

/**
 * Source document as seen over HTTP
 */
export interface FetchedSource {
  /**
   * Final URL after redirects
   */
  url: string;
  /**
   * The source answered 404 or 410
   */
  gone: boolean;
  text: string;
  contentType: string | null;
}

/**
 * GET a source document.
 * 404/410 mean gone; network failures and other non-2xx answers raise
 * ResolutionFailure.
 */
export async function fetchSource(
  transport: HttpTransport,
  url: string,
  timeoutMs?: number,
): Promise<FetchedSource> {
  let response: HttpResponse;
  try {
    response = await transport.fetch(url, { method: 'GET', timeoutMs });
  } catch (error) {
    if (error instanceof ResolutionFailure) {
      throw error;
    }
    throw new ResolutionFailure(
      `Failed to fetch ${url}`,
      url,
      undefined,
      toError(error),
    );
  }

  if (isGoneStatus(response.status)) {
    return { url: response.url, gone: true, text: '', contentType: null };
  }
  if (!isSuccessStatus(response.status)) {
    throw new ResolutionFailure(
      `Source ${url} answered ${response.status}`,
      url,
      response.status,
    );
  }

  return {
    url: response.url,
    gone: false,
    text: response.body,
    contentType: response.headers['content-type'] ?? null,
  };
}
