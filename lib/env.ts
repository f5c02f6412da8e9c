/**
 * Environment detection utilities
 */

/**
 * Check if running under Jest (which sets NODE_ENV=test)
 */
export function isTest(): boolean {
  return process.env.NODE_ENV === "test";
}

/**
 * Verbose request logging is opt-in via DEBUG and never on under test
 */
export function isDebug(): boolean {
  return !isTest() && Boolean(process.env.DEBUG);
}
