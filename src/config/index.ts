/**
 * Application configuration.
 * Validates and exposes typed configuration values for the CLI and the
 * PromptGenerator defaults.
 */

import { SamplingMethod } from "../commands/sampling-method.js";
import {
  ConfigError,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
} from "./env.js";

export { ConfigError, optionalEnv, optionalEnvInt, optionalEnvBool } from "./env.js";

// Re-export grammar configuration module
export * from "./grammar/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug logging */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Sampling method used when none is given */
  readonly defaultMethod: string;
  /** Number of prompts generated when none is given */
  readonly defaultCount: number;
  /** Directory of wildcard .txt files */
  readonly wildcardDir: string;
  /** Seed for random sampling; unseeded when undefined */
  readonly seed: number | undefined;
}

/**
 * Read the configuration from the environment.
 * Fails fast on malformed numbers and booleans.
 */
export function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    debug: optionalEnvBool("DEBUG", false),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    defaultMethod: optionalEnv("PROMPTS_DEFAULT_METHOD", "random"),
    defaultCount: optionalEnvInt("PROMPTS_DEFAULT_COUNT", 1),
    wildcardDir: optionalEnv("PROMPTS_WILDCARD_DIR", "wildcards"),
    seed: optionalEnvInt("PROMPTS_SEED"),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate configuration values that have a closed set of choices.
 * Call this at startup to fail fast.
 */
export function validateConfig(appConfig: AppConfig = config): void {
  if (!["development", "production", "test"].includes(appConfig.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${appConfig.env}. Must be development, production, or test.`
    );
  }

  if (!["debug", "info", "warn", "error"].includes(appConfig.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${appConfig.logLevel}. Must be debug, info, warn, or error.`
    );
  }

  if (!SamplingMethod.safeParse(appConfig.defaultMethod).success) {
    throw new ConfigError(
      `Invalid PROMPTS_DEFAULT_METHOD: ${appConfig.defaultMethod}. ` +
        `Must be ${SamplingMethod.options.join(", ")}.`
    );
  }

  if (appConfig.defaultCount < 0) {
    throw new ConfigError(
      `Invalid PROMPTS_DEFAULT_COUNT: ${appConfig.defaultCount}. Must be zero or more.`
    );
  }
}
