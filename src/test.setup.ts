// Keep the CLI from bootstrapping and the logger quiet during Vitest runs.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';
