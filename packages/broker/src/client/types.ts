/**
 * Trading Client Types
 *
 * Public interface types for the trading REST client.
 */

import type { Logger } from "@tickline/logger";
import type {
	Account,
	Asset,
	AssetStatus,
	BulkResult,
	ClosePositionOptions,
	Clock,
	ListOrdersOptions,
	Order,
	OrderRequest,
	Position,
	ReplaceOrderRequest,
	TradingEnvironment,
	UpdateWatchlistRequest,
	Watchlist,
} from "../types.js";

/**
 * Trading client configuration.
 */
export interface TradingClientConfig {
	/** API key ID (APCA_API_KEY_ID env var) */
	keyId: string;
	/** API secret key (APCA_API_SECRET_KEY env var) */
	secretKey: string;
	/** Trading environment; selects the paper or live host */
	environment: TradingEnvironment;
	/** Override the host chosen by `environment` */
	baseUrl?: string;
	logger?: Logger;
}

export interface ListAssetsOptions {
	status?: AssetStatus;
	/** e.g. us_equity or crypto */
	assetClass?: string;
}

export interface CloseAllPositionsOptions {
	/** Cancel open orders before liquidating */
	cancelOrders?: boolean;
}

/**
 * Trading client interface.
 *
 * Every method makes exactly one request. Non-success statuses reject with
 * a `VendorError` whose `code` comes from the endpoint's resource family.
 */
export interface TradingClient {
	// Assets

	listAssets(options?: ListAssetsOptions): Promise<Asset[]>;

	/**
	 * @param symbol - Symbol or asset ID
	 */
	getAsset(symbol: string): Promise<Asset>;

	// Orders

	listOrders(options?: ListOrdersOptions): Promise<Order[]>;

	getOrder(orderId: string): Promise<Order>;

	getOrderByClientId(clientOrderId: string): Promise<Order>;

	/**
	 * Submit an order.
	 *
	 * @throws ValidationError if the request is inconsistent (checked before sending)
	 */
	placeOrder(request: OrderRequest): Promise<Order>;

	/**
	 * Replace an open order. Returns the new order; the old one moves to `replaced`.
	 */
	replaceOrder(orderId: string, changes: ReplaceOrderRequest): Promise<Order>;

	cancelOrder(orderId: string): Promise<void>;

	/**
	 * Cancel every open order. One result per order, with its HTTP status.
	 */
	cancelAllOrders(): Promise<BulkResult[]>;

	// Positions

	listOpenPositions(): Promise<Position[]>;

	getOpenPosition(symbol: string): Promise<Position>;

	closeAllPositions(options?: CloseAllPositionsOptions): Promise<BulkResult[]>;

	/**
	 * Liquidate all or part of a position. Returns the closing order.
	 *
	 * @throws ValidationError if both qty and percentage are given
	 */
	closePosition(symbol: string, options?: ClosePositionOptions): Promise<Order>;

	// Watchlists

	listWatchlists(): Promise<Watchlist[]>;

	createWatchlist(name: string, symbols?: string[]): Promise<Watchlist>;

	getWatchlist(watchlistId: string): Promise<Watchlist>;

	/**
	 * Rename a watchlist and/or replace its symbols.
	 */
	updateWatchlist(watchlistId: string, changes: UpdateWatchlistRequest): Promise<Watchlist>;

	addAssetToWatchlist(watchlistId: string, symbol: string): Promise<Watchlist>;

	deleteWatchlist(watchlistId: string): Promise<void>;

	removeAssetFromWatchlist(watchlistId: string, symbol: string): Promise<Watchlist>;

	// Account

	getAccount(): Promise<Account>;

	getClock(): Promise<Clock>;
}
