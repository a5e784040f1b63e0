export * from './webmentions.config';
export * from './webmentions.handler';
