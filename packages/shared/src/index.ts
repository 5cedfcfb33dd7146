export const name = '@recall/shared';

export * from './types/events';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './lru-cache';
export * from './config/schema';
export * from './config/loader';
export * from './config/validation';
