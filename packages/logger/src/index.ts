import pino from "pino";

export type { Logger } from "pino";
export { createNodeLogger, withConnectionContext } from "./node.js";
export * from "./redaction.js";
export * from "./types.js";

export { pino };
