/**
 * Global Vitest Setup
 *
 * Runs before each test so that logging overrides set by one test do not
 * leak into the next.
 */

import { beforeEach } from 'vitest';

beforeEach(() => {
  delete process.env.SHKIT_DEBUG;
  delete process.env.SHKIT_LOG_LEVEL;
});
