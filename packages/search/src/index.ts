export const name = '@treescout/search';

export * from './types';
export * from './diagnostics';
export * from './exclusion';
export * from './walker';
export * from './match';
export * from './collector';
export * from './session';
