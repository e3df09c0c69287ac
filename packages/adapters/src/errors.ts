export { ConfigError, RateLimitError, TimeoutError } from '@contentbench/shared';
