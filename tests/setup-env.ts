/**
 * Jest Environment Setup
 * Runs BEFORE the test framework is installed, and before any module under
 * test reads its configuration.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
