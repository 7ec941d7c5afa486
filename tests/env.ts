// Loaded before any module so config picks these up
process.env.NODE_ENV = 'test';
process.env.LEDGER_STORE = 'memory';
process.env.JWT_SECRET = 'test-secret';
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
