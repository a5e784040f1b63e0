export * from './callback-dispatcher';
