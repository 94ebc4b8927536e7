export { CODEC_HEADERS, jsonCodec, msgpackCodec, type TradeUpdatesCodecName } from "./codec.js";
export {
  TRADE_UPDATES_URLS,
  TradeUpdatesClient,
  type TradeUpdatesClientConfig,
  TradeUpdatesSender,
} from "./client.js";
export {
  type AuthorizationStatus,
  type FillEvent,
  type MessageStream,
  type OrderEvent,
  type OrderOnlyEvent,
  type OrderUpdate,
  OrderUpdateSchema,
  type TimestampedEvent,
  type TradeUpdatesAction,
  type TradeUpdatesResponse,
  TradeUpdatesResponseSchema,
} from "./messages.js";
