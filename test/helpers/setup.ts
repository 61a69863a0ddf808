/**
 * Vitest setup file - runs before all tests
 *
 * Configures the test environment to suppress noisy output and
 * set appropriate defaults for testing.
 */

// Suppress Pino logger output during tests
// The logger reads LOG_LEVEL at startup, so we set this before any imports
process.env["LOG_LEVEL"] = "silent"

// Disable color output so rendered lines can be compared as plain text
process.env["NO_COLOR"] = "1"
process.env["FORCE_COLOR"] = "0"
