export * from './mention-direction.enum';
export * from './mention-status.enum';
export * from './mention-type.enum';
export * from './content-format.enum';
export * from './transition-trigger.enum';
