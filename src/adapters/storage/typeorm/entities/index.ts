export * from './webmention.entity';
