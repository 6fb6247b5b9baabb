// Keep test output readable; extraction logs one JSON line per dropped segment.
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
