import { config } from "./config.js";

/**
 * Write a `[setkit:<scope>]`-prefixed line to the console when `debug` is on.
 */
export function debugLog(scope: string, message: string): void {
  if (!config.get("debug")) return;
  console.log(`[setkit:${scope}] ${message}`);
}
