export { FetchHttpTransport, createFetchTransport } from './fetch/fetch-http.transport';
export type { FetchHttpTransportOptions } from './fetch/fetch-http.transport';
export { MockHttpTransport } from './mock/mock-http.transport';
export type {
  MockRoute,
  MockRouteHandler,
  RecordedRequest,
} from './mock/mock-http.transport';
