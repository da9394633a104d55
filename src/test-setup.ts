import { afterEach, vi } from 'vitest';

// Sweepers and ephemeral deletions schedule real timers; a failed test must
// not leave fake timers installed for the next one in the worker.
afterEach(() => {
  vi.clearAllMocks();
  vi.unstubAllEnvs();
  vi.useRealTimers();
});
