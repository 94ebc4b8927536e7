/**
 * Trading Client Module
 */

export { createTradingClient } from "./factory.js";
export type {
	CloseAllPositionsOptions,
	ListAssetsOptions,
	TradingClient,
	TradingClientConfig,
} from "./types.js";
