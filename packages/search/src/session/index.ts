export * from './types';
export { SearchSession, startSearch } from './session';
export { WorkerPool, defaultConcurrency } from './pool';
export type { Task } from './pool';
