/**
 * Environment Configuration
 *
 * Credentials and client settings come from environment variables only;
 * there are no config files and nothing is persisted between runs.
 *
 * | Variable              | Required | Default |
 * |-----------------------|----------|---------|
 * | APCA_API_KEY_ID       | yes      |         |
 * | APCA_API_SECRET_KEY   | yes      |         |
 * | APCA_ENVIRONMENT      | no       | PAPER   |
 * | APCA_DATA_FEED        | no       | iex     |
 * | LOG_LEVEL             | no       | info    |
 */

import { DataFeed, TradingEnvironment } from "@tickline/domain";
import { z } from "zod";

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export const envSchema = z.object({
  APCA_API_KEY_ID: z.string().min(1, "API key id is required").describe("Vendor API key id"),
  APCA_API_SECRET_KEY: z
    .string()
    .min(1, "API secret key is required")
    .describe("Vendor API secret key"),
  APCA_ENVIRONMENT: TradingEnvironment.default("PAPER").describe("PAPER or LIVE trading host"),
  APCA_DATA_FEED: DataFeed.default("iex").describe("Market-data feed"),
  LOG_LEVEL: LogLevelSchema.default("info"),
});

export interface ClientConfig {
  keyId: string;
  secretKey: string;
  environment: TradingEnvironment;
  feed: DataFeed;
  logLevel: z.infer<typeof LogLevelSchema>;
}

/**
 * Thrown when the environment does not describe a usable configuration.
 * Lists every failing variable, not only the first.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Read and validate client configuration
 *
 * Empty strings count as unset so that `APCA_ENVIRONMENT=` picks the default.
 *
 * @throws {ConfigError} If any variable is missing or invalid
 *
 * @example
 * ```ts
 * const config = loadConfig();
 * const client = createTradingClient(config);
 * ```
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ClientConfig {
  const raw = Object.fromEntries(
    Object.keys(envSchema.shape).map((key) => {
      const value = env[key];
      return [key, value === "" ? undefined : value];
    })
  );

  const result = envSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(formatIssue));
  }

  return {
    keyId: result.data.APCA_API_KEY_ID,
    secretKey: result.data.APCA_API_SECRET_KEY,
    environment: result.data.APCA_ENVIRONMENT,
    feed: result.data.APCA_DATA_FEED,
    logLevel: result.data.LOG_LEVEL,
  };
}
