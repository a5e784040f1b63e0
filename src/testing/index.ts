/**
 * Testing utilities
 * In-memory adapters and document builders for tests without a network
 */

// Mock adapters
export * from '../adapters/storage/mock';
export { MockHttpTransport } from '../adapters/http/mock/mock-http.transport';
export type {
  MockRoute,
  MockRouteHandler,
  RecordedRequest,
} from '../adapters/http/mock/mock-http.transport';

// Test factories and helpers
export * from '../_shared/testing/mock-mention-factory';

// Re-export core for convenience in tests
export * from '../core';
