/**
 * Global constants for ftptree
 */

export const VERSION = '1.0.0';

// Timeouts
export const DEFAULT_CONNECT_TIMEOUT_MS = 30000;
