import { Logger as NestLogger } from '@nestjs/common';
import { load } from 'cheerio';
import { ResolutionFailure, UnsupportedTarget, toError } from '../errors';
import {
  HttpResponse,
  HttpTransport,
  Logger,
  isSuccessStatus,
} from '../interfaces';
import { normalizeUrl } from '../parser/url.utils';
import { WEBMENTION_REL, parseLinkHeader } from './link-header';

/**
 * Outcome of endpoint discovery
 */
export type EndpointResolution =
  | { kind: 'found'; endpoint: string; via: 'header' | 'html' }
  | { kind: 'unsupported'; error: UnsupportedTarget }
  | { kind: 'failed'; error: ResolutionFailure };

/**
 * Endpoint resolver - discovers the Webmention endpoint a target advertises
 *
 * HEAD first; a 2xx HEAD with a webmention Link header settles it. Otherwise
 * GET, checking the Link header before the body. Relative endpoints resolve
 * against the final URL after redirects.
 */
export class EndpointResolver {
  private readonly logger: Logger;

  constructor(
    private readonly transport: HttpTransport,
    private readonly timeoutMs?: number,
    logger?: Logger,
  ) {
    this.logger = logger ?? new NestLogger(EndpointResolver.name);
  }

  async resolve(target: string): Promise<EndpointResolution> {
    const head = await this.tryHead(target);
    if (head && isSuccessStatus(head.status)) {
      const endpoint = this.fromHeader(head);
      if (endpoint) {
        return { kind: 'found', endpoint, via: 'header' };
      }
    }

    let response: HttpResponse;
    try {
      response = await this.transport.fetch(target, {
        method: 'GET',
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      const failure =
        error instanceof ResolutionFailure
          ? error
          : new ResolutionFailure(
              `Failed to fetch ${target}`,
              target,
              undefined,
              toError(error),
            );
      this.logger.warn(`Endpoint discovery failed for ${target}: ${failure.message}`);
      return { kind: 'failed', error: failure };
    }

    if (response.status === 429 || response.status >= 500) {
      return {
        kind: 'failed',
        error: new ResolutionFailure(
          `Target ${target} answered ${response.status}`,
          target,
          response.status,
        ),
      };
    }
    if (!isSuccessStatus(response.status)) {
      this.logger.debug(`Target ${target} answered ${response.status}, skipping`);
      return { kind: 'unsupported', error: new UnsupportedTarget(target) };
    }

    const headerEndpoint = this.fromHeader(response);
    if (headerEndpoint) {
      return { kind: 'found', endpoint: headerEndpoint, via: 'header' };
    }

    const htmlEndpoint = this.fromBody(response);
    if (htmlEndpoint) {
      return { kind: 'found', endpoint: htmlEndpoint, via: 'html' };
    }
    return { kind: 'unsupported', error: new UnsupportedTarget(target) };
  }

  /**
   * HEAD failures are not fatal: the GET decides
   */
  private async tryHead(target: string): Promise<HttpResponse | null> {
    try {
      return await this.transport.fetch(target, {
        method: 'HEAD',
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      this.logger.debug(`HEAD ${target} failed: ${toError(error).message}`);
      return null;
    }
  }

  private fromHeader(response: HttpResponse): string | null {
    for (const link of parseLinkHeader(response.headers['link'])) {
      if (!link.rel.includes(WEBMENTION_REL)) {
        continue;
      }
      const endpoint = normalizeUrl(link.url, response.url);
      if (endpoint) {
        return endpoint;
      }
    }
    return null;
  }

  /**
   * First <link> or <a> whose rel includes webmention.
   * An empty href is the document itself.
   */
  private fromBody(response: HttpResponse): string | null {
    if (!response.body) {
      return null;
    }
    const $ = load(response.body);
    for (const element of $('link[rel], a[rel]').toArray()) {
      const node = $(element);
      const rel = (node.attr('rel') ?? '').toLowerCase().split(/\s+/);
      const href = node.attr('href');
      if (!rel.includes(WEBMENTION_REL) || href === undefined) {
        continue;
      }
      const endpoint = normalizeUrl(href, response.url);
      if (endpoint) {
        return endpoint;
      }
    }
    return null;
  }
}
