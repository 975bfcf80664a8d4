/**
 * Meter debug logging.
 *
 * Debug output is off unless METER_DEBUG=true is set in the environment
 * or `globalThis.METER_DEBUG` is true at call time.
 *
 * @module core/meterDebug
 */

declare global {
  // eslint-disable-next-line no-var
  var METER_DEBUG: boolean | undefined;
}

/** Debug logging flag from the environment, read once at load */
const ENV_DEBUG = typeof process !== 'undefined' && process.env.METER_DEBUG === 'true';

/** Whether debug logging is currently enabled */
export function isMeterDebugEnabled(): boolean {
  return ENV_DEBUG || globalThis.METER_DEBUG === true;
}

/** Conditional debug logger */
export function meterDebug(category: string, ...args: unknown[]): void {
  if (isMeterDebugEnabled()) {
    console.log(`[Meter:${category}]`, ...args);
  }
}
