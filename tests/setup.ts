import { afterEach, vi } from 'vitest';

// Restore all mocks after each test
afterEach(() => {
  vi.restoreAllMocks();
});
