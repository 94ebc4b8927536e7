/**
 * @tickline/transport - Pagination, REST and WebSocket plumbing shared by
 * the trading and market-data clients
 */

export { createJsonCodec, decodeMessages, type JsonCodecOptions } from "./codec.js";
export { FrameQueue } from "./frame-queue.js";
export {
  buildQuery,
  createRequestFn,
  type HttpClientConfig,
  type HttpMethod,
  IgnoredBody,
  type QueryValue,
  type RequestFn,
  type RequestOptions,
} from "./http.js";
export { type PageFetcher, type Paged, type PageSplit, PagedStream } from "./paged-stream.js";
export {
  type FrameCodec,
  type FrameResult,
  type MalformedFramePolicy,
  type SessionState,
  SocketReceiver,
  SocketSender,
  SocketSession,
  type SocketSessionOptions,
} from "./socket-session.js";
export { decodeTagged, parseJsonFrame } from "./tagged.js";
