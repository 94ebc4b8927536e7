/**
 * Trading Client Factory
 *
 * Creates configured trading client instances.
 */

import { TRADING_BASE_URLS, ValidationError } from "@tickline/domain";
import { createRequestFn, IgnoredBody } from "@tickline/transport";
import { z } from "zod";
import { log as defaultLog } from "../logger.js";
import type {
	Account,
	Asset,
	BulkResult,
	ClosePositionOptions,
	Clock,
	ListOrdersOptions,
	Order,
	OrderRequest,
	Position,
	ReplaceOrderRequest,
	UpdateWatchlistRequest,
	Watchlist,
} from "../types.js";
import {
	pathSegment,
	validateClosePosition,
	validateOrderRequest,
	validateReplaceOrder,
} from "../utils.js";
import {
	AlpacaAccountSchema,
	AlpacaAssetSchema,
	AlpacaBulkResultSchema,
	AlpacaClockSchema,
	AlpacaOrderSchema,
	AlpacaPositionSchema,
	type AlpacaWatchlistRequest,
	AlpacaWatchlistSchema,
} from "./alpaca-types.js";
import {
	buildOrderPayload,
	buildReplacePayload,
	mapAccount,
	mapAsset,
	mapBulkResult,
	mapClock,
	mapOrder,
	mapPosition,
	mapWatchlist,
} from "./mappers.js";
import type {
	CloseAllPositionsOptions,
	ListAssetsOptions,
	TradingClient,
	TradingClientConfig,
} from "./types.js";

const AssetListSchema = z.array(AlpacaAssetSchema);
const OrderListSchema = z.array(AlpacaOrderSchema);
const PositionListSchema = z.array(AlpacaPositionSchema);
const WatchlistListSchema = z.array(AlpacaWatchlistSchema);
const BulkResultListSchema = z.array(AlpacaBulkResultSchema);

/**
 * Create a trading client.
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const client = createTradingClient({
 *   keyId: config.keyId,
 *   secretKey: config.secretKey,
 *   environment: config.environment,
 * });
 *
 * const order = await client.placeOrder({
 *   symbol: "AAPL",
 *   qty: 10,
 *   side: "buy",
 *   type: "limit",
 *   timeInForce: "day",
 *   limitPrice: 150.0,
 * });
 * ```
 */
export function createTradingClient(config: TradingClientConfig): TradingClient {
	const { keyId, secretKey, environment } = config;
	const log = config.logger ?? defaultLog;

	if (!keyId || !secretKey) {
		throw new ValidationError("API key ID and secret key are required", {
			field: keyId ? "secretKey" : "keyId",
		});
	}

	const request = createRequestFn({
		keyId,
		secretKey,
		baseUrl: config.baseUrl ?? TRADING_BASE_URLS[environment],
		logger: log,
	});

	return {
		// ============================================
		// Assets
		// ============================================

		async listAssets(options: ListAssetsOptions = {}): Promise<Asset[]> {
			const data = await request(
				"GET",
				"/v2/assets",
				{ family: "assets", query: { status: options.status, asset_class: options.assetClass } },
				AssetListSchema,
			);
			return data.map(mapAsset);
		},

		async getAsset(symbol: string): Promise<Asset> {
			const data = await request(
				"GET",
				`/v2/assets/${pathSegment(symbol)}`,
				{ family: "assets" },
				AlpacaAssetSchema,
			);
			return mapAsset(data);
		},

		// ============================================
		// Orders
		// ============================================

		async listOrders(options: ListOrdersOptions = {}): Promise<Order[]> {
			const data = await request(
				"GET",
				"/v2/orders",
				{
					family: "orders",
					query: {
						status: options.status,
						limit: options.limit,
						after: options.after,
						until: options.until,
						direction: options.direction,
						nested: options.nested,
						symbols: options.symbols,
						side: options.side,
					},
				},
				OrderListSchema,
			);
			return data.map(mapOrder);
		},

		async getOrder(orderId: string): Promise<Order> {
			const data = await request(
				"GET",
				`/v2/orders/${pathSegment(orderId)}`,
				{ family: "orders" },
				AlpacaOrderSchema,
			);
			return mapOrder(data);
		},

		async getOrderByClientId(clientOrderId: string): Promise<Order> {
			const data = await request(
				"GET",
				"/v2/orders:by_client_order_id",
				{ family: "orders", query: { client_order_id: clientOrderId } },
				AlpacaOrderSchema,
			);
			return mapOrder(data);
		},

		async placeOrder(orderRequest: OrderRequest): Promise<Order> {
			validateOrderRequest(orderRequest);

			log.info(
				{
					clientOrderId: orderRequest.clientOrderId,
					symbol: orderRequest.symbol,
					side: orderRequest.side,
					qty: orderRequest.qty,
					notional: orderRequest.notional,
					type: orderRequest.type,
					environment,
				},
				"Submitting order",
			);

			const data = await request(
				"POST",
				"/v2/orders",
				{ family: "orders", body: buildOrderPayload(orderRequest) },
				AlpacaOrderSchema,
			);
			const order = mapOrder(data);

			log.info(
				{
					orderId: order.id,
					clientOrderId: order.clientOrderId,
					symbol: order.symbol,
					status: order.status,
				},
				"Order submitted",
			);

			return order;
		},

		async replaceOrder(orderId: string, changes: ReplaceOrderRequest): Promise<Order> {
			validateReplaceOrder(changes);
			log.info({ orderId, environment }, "Replacing order");
			const data = await request(
				"PATCH",
				`/v2/orders/${pathSegment(orderId)}`,
				{ family: "orders", body: buildReplacePayload(changes) },
				AlpacaOrderSchema,
			);
			const order = mapOrder(data);
			log.info({ orderId, replacementId: order.id, status: order.status }, "Order replaced");
			return order;
		},

		async cancelOrder(orderId: string): Promise<void> {
			log.info({ orderId, environment }, "Cancelling order");
			await request("DELETE", `/v2/orders/${pathSegment(orderId)}`, { family: "orders" }, IgnoredBody);
			log.info({ orderId }, "Order cancelled");
		},

		async cancelAllOrders(): Promise<BulkResult[]> {
			log.info({ environment }, "Cancelling all orders");
			const data = await request("DELETE", "/v2/orders", { family: "orders" }, BulkResultListSchema);
			return data.map(mapBulkResult);
		},

		// ============================================
		// Positions
		// ============================================

		async listOpenPositions(): Promise<Position[]> {
			const data = await request("GET", "/v2/positions", { family: "positions" }, PositionListSchema);
			return data.map(mapPosition);
		},

		async getOpenPosition(symbol: string): Promise<Position> {
			const data = await request(
				"GET",
				`/v2/positions/${pathSegment(symbol)}`,
				{ family: "positions" },
				AlpacaPositionSchema,
			);
			return mapPosition(data);
		},

		async closeAllPositions(options: CloseAllPositionsOptions = {}): Promise<BulkResult[]> {
			log.info({ environment, cancelOrders: options.cancelOrders }, "Closing all positions");
			const data = await request(
				"DELETE",
				"/v2/positions",
				{ family: "positions", query: { cancel_orders: options.cancelOrders } },
				BulkResultListSchema,
			);
			const results = data.map(mapBulkResult);
			log.info({ count: results.length }, "All positions close orders submitted");
			return results;
		},

		async closePosition(symbol: string, options: ClosePositionOptions = {}): Promise<Order> {
			validateClosePosition(options);
			log.info({ symbol, ...options, environment }, "Closing position");
			const data = await request(
				"DELETE",
				`/v2/positions/${pathSegment(symbol)}`,
				{ family: "positions", query: { qty: options.qty, percentage: options.percentage } },
				AlpacaOrderSchema,
			);
			const order = mapOrder(data);
			log.info({ symbol, orderId: order.id, status: order.status }, "Position close order submitted");
			return order;
		},

		// ============================================
		// Watchlists
		// ============================================

		async listWatchlists(): Promise<Watchlist[]> {
			const data = await request("GET", "/v2/watchlists", { family: "watchlists" }, WatchlistListSchema);
			return data.map(mapWatchlist);
		},

		async createWatchlist(name: string, symbols: string[] = []): Promise<Watchlist> {
			if (!name) {
				throw new ValidationError("Watchlist name is required", { field: "name" });
			}
			const body: AlpacaWatchlistRequest = { name, symbols };
			const data = await request(
				"POST",
				"/v2/watchlists",
				{ family: "watchlists", body },
				AlpacaWatchlistSchema,
			);
			return mapWatchlist(data);
		},

		async getWatchlist(watchlistId: string): Promise<Watchlist> {
			const data = await request(
				"GET",
				`/v2/watchlists/${pathSegment(watchlistId)}`,
				{ family: "watchlists" },
				AlpacaWatchlistSchema,
			);
			return mapWatchlist(data);
		},

		async updateWatchlist(watchlistId: string, changes: UpdateWatchlistRequest): Promise<Watchlist> {
			if (changes.name === undefined && changes.symbols === undefined) {
				throw new ValidationError("Watchlist update changes nothing");
			}
			const body: AlpacaWatchlistRequest = { name: changes.name, symbols: changes.symbols };
			const data = await request(
				"PUT",
				`/v2/watchlists/${pathSegment(watchlistId)}`,
				{ family: "watchlists", body },
				AlpacaWatchlistSchema,
			);
			return mapWatchlist(data);
		},

		async addAssetToWatchlist(watchlistId: string, symbol: string): Promise<Watchlist> {
			const data = await request(
				"POST",
				`/v2/watchlists/${pathSegment(watchlistId)}`,
				{ family: "watchlists", body: { symbol } },
				AlpacaWatchlistSchema,
			);
			return mapWatchlist(data);
		},

		async deleteWatchlist(watchlistId: string): Promise<void> {
			await request(
				"DELETE",
				`/v2/watchlists/${pathSegment(watchlistId)}`,
				{ family: "watchlists" },
				IgnoredBody,
			);
		},

		async removeAssetFromWatchlist(watchlistId: string, symbol: string): Promise<Watchlist> {
			const data = await request(
				"DELETE",
				`/v2/watchlists/${pathSegment(watchlistId)}/${pathSegment(symbol)}`,
				{ family: "watchlists" },
				AlpacaWatchlistSchema,
			);
			return mapWatchlist(data);
		},

		// ============================================
		// Account
		// ============================================

		async getAccount(): Promise<Account> {
			const data = await request("GET", "/v2/account", { family: "account" }, AlpacaAccountSchema);
			return mapAccount(data);
		},

		async getClock(): Promise<Clock> {
			const data = await request("GET", "/v2/clock", { family: "clock" }, AlpacaClockSchema);
			return mapClock(data);
		},
	};
}
