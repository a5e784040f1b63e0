// Interface and type exports
export * from './common.types';
export * from './storage.adapter';
export * from './http-transport.interface';
export * from './configuration.interface';
