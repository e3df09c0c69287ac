export const name = '@contentbench/adapters';

export * from './types';

export * from './adapter';

export * from './errors';

export * from './base-adapter';

export { executeProviderRequest, isRetriableError } from './common';

export * from './openai';
export * from './anthropic';
export * from './gemini';
export * from './fake';
