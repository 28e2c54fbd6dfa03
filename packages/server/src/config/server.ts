/**
 * Server lifecycle configuration.
 */

/** Max time to wait for cleanup on shutdown before forcing exit (ms) */
export const SHUTDOWN_TIMEOUT_MS = 5_000;
