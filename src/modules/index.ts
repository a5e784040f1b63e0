/**
 * NestJS bindings
 */

export * from './webmentions';
