/**
 * Runs before every test file (vitest setupFiles).
 * The logger reads LOG_LEVEL at import time, so this must load first.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';
