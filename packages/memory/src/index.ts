export const name = '@recall/memory';

export * from './types';
export * from './sqlite';
export * from './snapshot';
export * from './request';
export * from './search';
export * from './indexing';
export * from './tool';
export * from './rag';
