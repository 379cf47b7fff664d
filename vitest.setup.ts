/**
 * Global Vitest Setup
 *
 * Runs before each test to ensure a clean environment.
 */

import { beforeEach } from 'vitest';

beforeEach(() => {
  // Debug logging is toggled through the environment; tests that need it set it themselves
  delete process.env.KVD_DEBUG;
});
