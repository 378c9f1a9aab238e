/**
 * Vitest Global Setup
 *
 * Runs once per test file before any tests.
 */

// Watchers, child processes and shutdown handlers each add listeners to the
// shared process object.
process.setMaxListeners(0);
