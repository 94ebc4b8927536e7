import type { DestinationStream } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface NodeLoggerOptions {
  /** Service name stamped on every line */
  service: string;
  /** Minimum level (default: info) */
  level?: LogLevel;
  /** Trading environment (PAPER/LIVE) */
  environment?: string;
  /** Human-readable output through pino-pretty (default: NODE_ENV === "development") */
  pretty?: boolean;
  /** Extra paths to redact, merged with the credential defaults */
  redactPaths?: string[];
  /** Write to this stream instead of stdout. Ignored when pretty is on. */
  destination?: DestinationStream;
}

export interface ConnectionContext {
  /** Socket endpoint */
  url: string;
  /** Per-connection id, for correlating send and receive logs */
  connectionId: string;
}
