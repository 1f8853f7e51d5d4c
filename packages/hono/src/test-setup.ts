/**
 * Global test setup, run before every test file in this package.
 *
 * Provides the most commonly duplicated mock (getLog) so individual
 * test files no longer need to repeat it, and silences the core
 * pipeline's loggers.
 *
 * IMPORTANT: Tests that need to ASSERT on log method calls should declare
 * their own `vi.mock` for the log module; the local mock will
 * override this global one for that file.
 */

import { vi } from 'vitest';
import { setLogService, type ILogService } from '@devbar/core';

vi.mock('./services/log.js', () => ({
  getLog: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(),
  }),
}));

const silent: ILogService = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
  child: () => silent,
};
setLogService(silent);
