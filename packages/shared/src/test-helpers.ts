import { vi } from 'vitest';
import type { Logger } from './logger';

/**
 * Logger whose every method is a spy; `child` returns the same logger.
 */
export function createMockLogger() {
  const logger = {
    log: vi.fn<Logger['log']>(),
    trace: vi.fn<Logger['trace']>(),
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
    child: vi.fn<Logger['child']>(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}
