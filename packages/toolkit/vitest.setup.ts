import { vol } from 'memfs';
import { afterEach, vi } from 'vitest';

afterEach(() => {
  vol.reset();
  vi.clearAllTimers();
  vi.useRealTimers();
  vi.restoreAllMocks();
});
