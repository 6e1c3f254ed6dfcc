/**
 * Core module exports for @setkit/core
 *
 * This package provides:
 * - Configuration (defaults, config files, SETKIT_* environment variables)
 * - Error types shared by every setkit package
 * - Debug logging gated on configuration
 */

// Configuration System
export { config, type SetkitConfig, type SetkitConfigKey } from "./config.js";

// Errors
export { SetkitError, ConfigError, type SetkitErrorReason } from "./errors.js";

// Logging
export { debugLog } from "./debug.js";
