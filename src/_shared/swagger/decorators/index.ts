/**
 * Swagger decorators for the Webmention API
 *
 * These decorators keep API documentation out of the controllers.
 */

export * from './webmention.decorators';
export * from './health.decorators';
