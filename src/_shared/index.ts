/**
 * Shared resources for the Webmention HTTP binding
 */

// DTOs for validation and type safety
export * from './dto';

// Swagger decorators for clean controllers
export * from './swagger';

// Testing utilities
export * from './testing/mock-mention-factory';
