/**
 * Controlled debug logging for the correction pipeline.
 * Set DEBUG_CORRECTIONS=true to enable.
 */

export function isDebugEnabled(): boolean {
  return process.env.DEBUG_CORRECTIONS === "true";
}

export function debugLog(...args: unknown[]): void {
  if (isDebugEnabled()) {
    console.log(...args);
  }
}
