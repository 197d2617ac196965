/**
 * Vitest setup file for global test configuration
 * Runs before each test file
 */

// Mock environment variables for testing
Object.assign(process.env, {
  NODE_ENV: 'test',
  OPENAI_API_KEY: 'test-key',
  SUPABASE_URL: 'http://localhost:54321',
  SUPABASE_KEY: 'test-key',
  LOG_LEVEL: 'error' // Reduce log noise in tests
});

beforeEach(() => {
  // Silence console output from the logger
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'info').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
  vi.spyOn(console, 'debug').mockImplementation(() => undefined);
});

afterEach(() => {
  // Clean up after each test
  vi.restoreAllMocks();
  vi.unstubAllGlobals();
});
