// Global test setup for Jest

// Extend Jest timeout for property-based tests
jest.setTimeout(30000);

beforeAll(() => {
    // Set up test environment variables
    process.env.STORAGE_DRIVER = 'memory';
    process.env.BOT_TOKEN = '123456789:test-token-placeholder-000000000000';
    process.env.NODE_ENV = 'test';
});

// Mock console methods in tests to reduce noise
global.console = {
    ...console,
    log: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
};
