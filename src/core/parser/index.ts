export * from './types';
export * from './content-parser';
export * from './content-format';
export * from './link-scanner';
export * from './microformats';
export * from './url.utils';
