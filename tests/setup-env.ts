import { beforeEach, afterEach, vi } from 'vitest';

// Dev logging must be on regardless of the shell's NODE_ENV (bench commands
// may set it to 'production').
const BASE = 'development';

beforeEach(() => {
  process.env.NODE_ENV = BASE;
  delete process.env.TAGTREE_RENDER_DEBUG;
});

afterEach(() => {
  process.env.NODE_ENV = BASE;
  vi.restoreAllMocks();
});
