process.env.NODE_ENV ??= 'test';
process.env.LOG_LEVEL ??= 'silent';
process.env.TIMEZONE ??= 'UTC';
process.env.TEMPLATES_DIR ??= 'templates';
process.env.USAGE_STATS_BACKEND ??= 'memory';
process.env.REDIS_URL ??= 'redis://localhost:6379';
