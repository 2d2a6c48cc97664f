/**
 * Debug output, enabled by the `debug` config flag (or DECIDABLE_DEBUG=1).
 */

import { config } from "./config.js";

/**
 * Write one `[decidable:<scope>] message` line when debug output is on.
 */
export function debugLog(scope: string, message: string): void {
  if (!config.get().debug) return;
  console.debug(`[decidable:${scope}] ${message}`);
}

/**
 * Render a value for a log line or an error message.
 */
export function describeValue(value: unknown): string {
  if (typeof value === "bigint") return `${value}n`;
  if (typeof value === "symbol" || typeof value === "function") return String(value);
  try {
    return JSON.stringify(value) ?? String(value);
  } catch (err) {
    // cyclic structures
    return err instanceof TypeError ? String(value) : "<unprintable>";
  }
}
