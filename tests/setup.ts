// Keep test output quiet; individual tests reconfigure the logger when they assert on it
import { logger } from '../src/logger';

const originalEnv = { ...process.env };

beforeEach(() => {
  for (const key of ['STAGECRAFT_LOG_LEVEL', 'STAGECRAFT_DEBUG', 'STAGECRAFT_IMAGE', 'STAGECRAFT_S3_ENDPOINT']) {
    delete process.env[key];
  }
  logger.configure({ level: 'silent' });
});

afterAll(() => {
  process.env = originalEnv;
});
