// Set test environment before any module reads its configuration
process.env.NODE_ENV = 'test';
delete process.env.LOG_LEVEL;
