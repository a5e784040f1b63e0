/**
 * Webmentions NestJS Module
 *
 * Exposes the receiving endpoint and the handler to NestJS applications
 */

// Main module
export { WebmentionsModule } from './webmentions.module';

// Configuration
export {
  defaultWebmentionsModuleConfig,
  resolveEndpointUrl,
} from './webmentions.config';
export type {
  WebmentionsModuleConfig,
  WebmentionsModuleAsyncConfig,
} from './webmentions.config';

// Injection tokens
export * from './constants';

// Controllers
export * from './controllers';

// Interceptors
export { WebmentionLinkInterceptor } from './interceptors/webmention-link.interceptor';
export type { HeaderWritableResponse } from './interceptors/webmention-link.interceptor';
