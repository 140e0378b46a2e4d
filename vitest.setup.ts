/**
 * Vitest setup file - runs before all tests
 */

// Keep pino quiet for modules that are not mocked; tests that care set LOG_LEVEL themselves.
process.env.LOG_LEVEL ??= 'silent';

// Engine options are read from the environment; never pick up a developer's real key.
delete process.env.OPENROUTER_API_KEY;
