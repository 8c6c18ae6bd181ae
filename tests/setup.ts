// Global test setup

// Mock console methods for cleaner test output
const originalConsole = { ...console };

global.beforeEach(() => {
  // Clear all mocks before each test
  jest.clearAllMocks();

  // Mock console methods
  global.console = {
    ...originalConsole,
    log: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn()
  };
});

global.afterEach(() => {
  // Restore original console methods
  global.console = originalConsole;
});
