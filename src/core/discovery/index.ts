export * from './link-header';
export * from './endpoint-resolver';
