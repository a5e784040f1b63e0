import {
  CallHandler,
  ExecutionContext,
  Inject,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { appendLinkHeader, formatWebmentionLink } from '../../../core';
import { WEBMENTIONS_CONFIG } from '../constants';
import {
  WebmentionsModuleConfig,
  resolveEndpointUrl,
} from '../webmentions.config';

/**
 * The part of a Node or Express response the interceptor writes to
 */
export interface HeaderWritableResponse {
  getHeader(name: string): number | string | string[] | undefined;
  setHeader(name: string, value: string): unknown;
}

/**
 * Webmention Link Interceptor
 *
 * Advertises the receiving endpoint with `Link: <endpoint>; rel="webmention"`
 */
@Injectable()
export class WebmentionLinkInterceptor implements NestInterceptor {
  private readonly endpointUrl: string | null;

  constructor(
    @Inject(WEBMENTIONS_CONFIG)
    config: WebmentionsModuleConfig,
  ) {
    this.endpointUrl =
      config.advertiseEndpoint === false ? null : resolveEndpointUrl(config);
  }

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (this.endpointUrl && context.getType() === 'http') {
      const response = context.switchToHttp().getResponse<HeaderWritableResponse>();
      const existing = response.getHeader('Link');
      const current = Array.isArray(existing)
        ? existing.join(', ')
        : existing === undefined
          ? undefined
          : String(existing);

      response.setHeader(
        'Link',
        appendLinkHeader(current, formatWebmentionLink(this.endpointUrl)),
      );
    }

    return next.handle();
  }
}
