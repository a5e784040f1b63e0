export * from './types';
export * from './keyed-mutex';
export * from './source-fetcher';
export * from './incoming.processor';
export * from './outgoing.processor';
