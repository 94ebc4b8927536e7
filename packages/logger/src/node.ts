import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";
import { mergeRedactPaths } from "./redaction.js";
import type { ConnectionContext, NodeLoggerOptions } from "./types.js";

/** pino-pretty settings for a terminal: one coloured line per entry */
function prettyTransport(): DestinationStream {
  return pino.transport({
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:HH:MM:ss",
      ignore: "pid,hostname,service,environment",
      messageFormat: "[{service}] {msg}",
      singleLine: true,
    },
  });
}

/**
 * Structured JSON logger for one package of the client. Lines carry
 * `severity`, an ISO `timestamp`, `service` and `environment`; credential
 * fields are replaced with `[REDACTED]`.
 */
export function createNodeLogger(options: NodeLoggerOptions): Logger {
  const { service, level = "info", environment, redactPaths, destination } = options;

  const loggerOptions: LoggerOptions = {
    level,
    base: { service, environment },
    formatters: {
      level: (label) => ({ severity: label.toUpperCase() }),
    },
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    redact: {
      paths: mergeRedactPaths(redactPaths),
      censor: "[REDACTED]",
    },
  };

  if (options.pretty ?? process.env.NODE_ENV === "development") {
    return pino(loggerOptions, prettyTransport());
  }
  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}

export function withConnectionContext(logger: Logger, context: ConnectionContext): Logger {
  return logger.child({
    url: context.url,
    connectionId: context.connectionId,
  });
}
