/**
 * Debug logging utility
 *
 * Centralized debug logging that can be easily enabled/disabled.
 * Enabled by STREAM_MERGE_DEBUG=1 (or "true") in the environment, or at
 * runtime through setDebugEnabled().
 */

let debugEnabled = isTruthy(process.env['STREAM_MERGE_DEBUG']);

function isTruthy(value: string | undefined): boolean {
  return value === '1' || value?.toLowerCase() === 'true';
}

/**
 * Enable or disable debug logging
 */
export function setDebugEnabled(enabled: boolean): void {
  debugEnabled = enabled;
}

/**
 * Log a debug message if debug mode is enabled
 */
export function debugLog(message: string, ...args: unknown[]): void {
  if (debugEnabled) {
    console.log(`[DEBUG] ${message}`, ...args);
  }
}

