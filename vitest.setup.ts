import { beforeAll, afterAll } from 'vitest';
import { existsSync, rmSync, mkdirSync } from 'fs';
import { join } from 'path';

// Setup test directories
const TEST_DIR = join(process.cwd(), '.test-tmp');
process.env.NODE_ENV = 'test';
// Keep run output quiet unless a test raises the level itself
process.env.LOG_LEVEL ??= 'error';

beforeAll(() => {
  if (!existsSync(TEST_DIR)) {
    mkdirSync(TEST_DIR, { recursive: true });
  }
});

afterAll(() => {
  if (!process.env.VITEST_CLEANUP) {
    return;
  }
  rmSync(TEST_DIR, { recursive: true, force: true });
});

// Global test utilities
globalThis.TEST_DIR = TEST_DIR;

declare global {
  var TEST_DIR: string;
}
