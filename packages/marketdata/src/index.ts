/**
 * Market Data Package
 *
 * Historical stock data over REST and real-time stock data over WebSocket.
 *
 * @example
 * ```ts
 * import { createHistoricalClient, RealtimeClient } from "@tickline/marketdata";
 *
 * // Historical bars, fetched page by page as the loop advances
 * const history = createHistoricalClient({ keyId, secretKey });
 * for await (const bar of history.bars("AAPL", { start: "2024-03-01", timeframe: "1Hour" })) {
 *   console.log(bar.timestamp, bar.close);
 * }
 *
 * // Real-time trades and quotes
 * const realtime = await RealtimeClient.connect({ source: "iex" });
 * await realtime.authenticate({ key: keyId, secret: secretKey });
 * await realtime.subscribe({ trades: ["AAPL"], quotes: ["AAPL"] });
 * for await (const message of realtime.stream()) {
 *   if (message.T === "q") {
 *     console.log(`${message.symbol}: $${message.bidPrice}/$${message.askPrice}`);
 *   }
 * }
 * ```
 */

// Exchanges
export { decodeExchange, EXCHANGE_NAMES, type Exchange } from "./exchanges.js";
// Historical
export {
  createHistoricalClient,
  type HistoricalClient,
  type HistoricalClientConfig,
} from "./historical/client.js";
export {
  BarsPage,
  BarsPageSchema,
  QuotesPage,
  QuotesPageSchema,
  TradesPage,
  TradesPageSchema,
} from "./historical/pages.js";
// Real-time
export {
  normalizeSubscription,
  REALTIME_URLS,
  RealtimeClient,
  type RealtimeClientConfig,
  type RealtimeCredentials,
  RealtimeSender,
} from "./realtime/client.js";
export {
  type BarKind,
  type RealtimeAction,
  type RealtimeMessage,
  RealtimeMessageSchema,
  type Subscription,
} from "./realtime/messages.js";
// Types
export type {
  Bar,
  BarRange,
  DataFeed,
  HistoricalRange,
  Quote,
  Snapshot,
  TimeFrame,
  Trade,
} from "./types.js";
