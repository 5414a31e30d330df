// backend/tests/setup.ts
/**
 * Hermetic defaults for tests ONLY (never in service code).
 * Runs before each test file imports anything that reads process.env.
 */

process.env.NODE_ENV ??= "test";
process.env.LOG_LEVEL ??= "silent";
process.env.SIGNUP_PORT ??= "0";
process.env.SIGNUP_MONGO_URI ??= "mongodb://127.0.0.1:27017/signup_test";
