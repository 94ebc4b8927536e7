import { createNodeLogger, type Logger } from "@tickline/logger";

export const log: Logger = createNodeLogger({
  service: "broker",
  level: process.env.LOG_LEVEL === "debug" ? "debug" : "info",
  environment: process.env.APCA_ENVIRONMENT ?? "PAPER",
  pretty: process.env.NODE_ENV === "development",
});
