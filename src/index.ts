import 'reflect-metadata';

/**
 * Webmention engine
 *
 * Sends, receives and stores Webmentions: endpoint discovery, outbound
 * diffing of a document's links, inbound verification and a moderated
 * mention lifecycle, behind storage and HTTP adapters.
 */

// Export all core components
export * from './core';

// Export adapters
export * from './adapters/storage/mock';
export * from './adapters/storage/typeorm';
export * from './adapters/http';

// Export NestJS module, controllers and interceptors
export * from './modules';

// Export DTOs, Swagger decorators and testing utilities
export * from './_shared';
