/**
 * Broker Package
 *
 * Trading API client: assets, orders, positions, watchlists, account and
 * market clock over REST, plus the order-update WebSocket stream.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createTradingClient } from "@tickline/broker";
 * import { loadConfig } from "@tickline/config";
 *
 * const config = loadConfig();
 * const client = createTradingClient({
 *   keyId: config.keyId,
 *   secretKey: config.secretKey,
 *   environment: config.environment,
 * });
 *
 * // Submit a limit order
 * const order = await client.placeOrder({
 *   symbol: "AAPL",
 *   qty: 10,
 *   side: "buy",
 *   type: "limit",
 *   timeInForce: "day",
 *   limitPrice: 150.0,
 * });
 *
 * // Check positions
 * const positions = await client.listOpenPositions();
 * ```
 *
 * Orders are checked locally before they are sent; an inconsistent request
 * throws `ValidationError` without touching the network.
 */

// Client
export {
	type CloseAllPositionsOptions,
	createTradingClient,
	type ListAssetsOptions,
	type TradingClient,
	type TradingClientConfig,
} from "./client/index.js";
// Streaming
export {
	type AuthorizationStatus,
	type FillEvent,
	type MessageStream,
	type OrderEvent,
	type OrderOnlyEvent,
	type OrderUpdate,
	OrderUpdateSchema,
	type TimestampedEvent,
	TRADE_UPDATES_URLS,
	type TradeUpdatesAction,
	TradeUpdatesClient,
	type TradeUpdatesClientConfig,
	type TradeUpdatesCodecName,
	type TradeUpdatesResponse,
	TradeUpdatesResponseSchema,
	TradeUpdatesSender,
} from "./streaming/index.js";
// Types
export type {
	Account,
	Asset,
	AssetStatus,
	BulkResult,
	ClosePositionOptions,
	Clock,
	ListOrdersOptions,
	Order,
	OrderClass,
	OrderRequest,
	OrderSide,
	OrderStatus,
	OrderType,
	Position,
	PositionSide,
	ReplaceOrderRequest,
	SortDirection,
	StopLoss,
	TakeProfit,
	TimeInForce,
	TradingEnvironment,
	UpdateWatchlistRequest,
	Watchlist,
} from "./types.js";
// Utilities
export { validateClosePosition, validateOrderRequest, validateReplaceOrder } from "./utils.js";
