// Jest setup file for treekit

jest.setTimeout(30000);

// Keep log output off the test console unless a test turns it on
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
process.env.TREEKIT_LOG_LEVEL = 'error';

// Cleanup after each test
afterEach(() => {
  jest.clearAllMocks();
});
