/** Reason codes carried by every setkit error. */
export type SetkitErrorReason = "invalid_config" | "invalid_capacity" | "invalid_char";

/**
 * Base class for errors raised at the edges of setkit (construction,
 * configuration, value wrappers). Set operations themselves never throw.
 */
export class SetkitError extends Error {
  constructor(
    readonly reason: SetkitErrorReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "SetkitError";
  }
}

/** Thrown when a configuration value fails validation or a config file fails to load. */
export class ConfigError extends SetkitError {
  constructor(
    readonly key: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super("invalid_config", message, options);
    this.name = "ConfigError";
  }
}
