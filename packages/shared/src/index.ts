export const name = '@contentbench/shared';

export * from './types/events';
export * from './types/llm';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './json-utils';
export * from './fs/io';
export * from './config/schema';
export * from './config/validation';
export * from './bench';
