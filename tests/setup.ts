// Test setup file
import { afterEach, vi } from 'vitest';

process.env.NODE_ENV = 'test';

// Keep service loggers quiet unless a test asks otherwise
process.env.LOG_LEVEL = 'error';

// Environment fallbacks must come from the tests themselves
delete process.env.CLIDEF_DEBUG;

afterEach(() => {
  vi.unstubAllGlobals();
  vi.unstubAllEnvs();
});
