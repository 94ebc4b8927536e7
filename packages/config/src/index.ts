/**
 * @tickline/config - Environment-driven client configuration
 */

export { type ClientConfig, ConfigError, envSchema, LogLevelSchema, loadConfig } from "./env.js";
