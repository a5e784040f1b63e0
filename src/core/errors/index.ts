export * from './webmention.errors';
