export * from './status';
export * from './subtask';
export type * from './types';
