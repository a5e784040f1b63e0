/**
 * DTOs for the Webmention HTTP API
 *
 * These DTOs provide input validation and Swagger documentation
 * for all API endpoints.
 */

export * from './webmention.dto';
