export const name = '@treescout/shared';

export * from './types/events';
export * from './logger';
export * from './errors';
export * from './size';
export * from './string-utils';
export * from './config/schema';
export * from './config/validation';
export * from './config/presets';
