// Loaded before every suite (vitest setupFiles). The shared logger reads these at import.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
