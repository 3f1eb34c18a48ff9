// Global test setup for Jest

// Extend Jest timeout for property-based tests
jest.setTimeout(30000);

beforeAll(async () => {
    // Set up test environment variables
    process.env.MONGODB_URI = 'mongodb://localhost:27017/facility-bot-test';
    process.env.MONGODB_DB_NAME = 'facility-bot-test';
    process.env.REDIS_URL = 'redis://localhost:6379/15';
    process.env.BOT_TOKEN = '123:test-token';
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
