export type { Logger, MaybePromise } from './types';
export { JsonlLogger, prefixMessage } from './jsonlLogger';
