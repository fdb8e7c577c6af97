/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigError, maybeEnv, optionalEnv, optionalEnvBool } from "./env.js";

export { ConfigError, maybeEnv, optionalEnv, optionalEnvBool } from "./env.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: string;
  /** Directory for log files */
  readonly logDir: string;
  /** Write log lines to <logDir>/catalog.log as well as the console */
  readonly logToFile: boolean;
  /** Root of the description documents (collections/ and solvers.json) */
  readonly dataDir: string;
  /** Serialized dataset written by the build and read by the registry */
  readonly datasetPath: string;
  /** Base URL that asset paths are appended to; unset means no asset URLs */
  readonly assetBaseUrl: string | undefined;
}

/**
 * Read configuration from the environment.
 */
export function loadConfig(): AppConfig {
  return Object.freeze({
    env: optionalEnv("NODE_ENV", "development"),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
    dataDir: optionalEnv("DATA_DIR", "data"),
    datasetPath: optionalEnv("DATASET_PATH", "dist/dataset.json"),
    assetBaseUrl: maybeEnv("ASSET_BASE_URL"),
  });
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate configuration values.
 * Call this at application startup to fail fast.
 */
export function validateConfig(cfg: AppConfig = config): void {
  if (!["development", "production", "test"].includes(cfg.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${cfg.env}. Must be development, production, or test.`
    );
  }

  if (!["debug", "info", "warn", "error"].includes(cfg.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${cfg.logLevel}. Must be debug, info, warn, or error.`
    );
  }

  if (cfg.assetBaseUrl !== undefined && !/^https?:\/\//.test(cfg.assetBaseUrl)) {
    throw new ConfigError(
      `Invalid ASSET_BASE_URL: ${cfg.assetBaseUrl}. Must start with http:// or https://.`
    );
  }
}
