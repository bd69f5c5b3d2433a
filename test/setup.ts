/**
 * Global test setup - runs before all test files.
 * Clears connection settings so every test runs in tool-only mode.
 */

process.env.NODE_ENV = "test";

delete process.env.DATABASE_URL;
delete process.env.FETCHER_COMMAND;
delete process.env.EXTRACTOR_COMMAND;
delete process.env.GAP_REFERENCE_YEAR;
