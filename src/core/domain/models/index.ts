export * from './webmention.model';
