export { createMemorySession } from './memory-session.js';
export {
  createMockBackend,
  makeResult,
  type MockBackend,
  TEST_MODEL_INFO,
  TEST_STATUS
} from './mock-backend.js';
export { cleanupAllTempDirs, cleanupTempDir, createTempDir } from './temp-utils.js';
export { delay, waitFor } from './wait-for.js';
export type { MemorySession, WaitForOptions } from './types.js';
