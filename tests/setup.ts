// Keep test output quiet; Jest already sets NODE_ENV=test, which disables file logging
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'error';
