// tests/jest.setup.ts

// Set up environment variables for testing
process.env.NODE_ENV = "test";
process.env.MAX_BATCH_DOCUMENTS = "3";

// Reset mocks before each test
beforeEach(() => {
  jest.clearAllMocks();
});

// Silence console logs during tests (optional)
global.console = {
  ...console,
  // Uncomment these to disable specific console methods during tests
  // log: jest.fn(),
  // debug: jest.fn(),
  // info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
};
