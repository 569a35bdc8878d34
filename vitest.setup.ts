/**
 * Vitest Setup File
 * Global test configuration
 */

// Mock environment variables for tests
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
