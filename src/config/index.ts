/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigError, optionalEnv, optionalEnvInt } from "./env.js";

export { ConfigError, optionalEnv, optionalEnvInt } from "./env.js";

export {
  loadIdentityDefaults,
  getIdentityDefaults,
  parseIdentityFile,
  defaultIdentityFile,
  type IdentityDefaults,
  type IdentitySources,
} from "./identity.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: string;
  /** Timeout for a single remote store request, in milliseconds */
  readonly requestTimeoutMs: number;
}

/**
 * Load configuration from the environment.
 */
function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    requestTimeoutMs: optionalEnvInt("SCIDATA_TIMEOUT_MS", 30_000),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate configuration values.
 * Call this at application startup to fail fast.
 */
export function validateConfig(): void {
  if (!["development", "production", "test"].includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  if (!["debug", "info", "warn", "error"].includes(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`
    );
  }

  if (config.requestTimeoutMs <= 0) {
    throw new ConfigError(
      `Invalid SCIDATA_TIMEOUT_MS: ${config.requestTimeoutMs}. Must be positive.`
    );
  }
}
