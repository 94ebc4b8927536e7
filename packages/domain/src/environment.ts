import { z } from "zod";

/**
 * Which trading endpoint a client talks to. Paper trading and live trading
 * share every route and differ only in host.
 */
export const TradingEnvironment = z.enum(["PAPER", "LIVE"]);
export type TradingEnvironment = z.infer<typeof TradingEnvironment>;

/**
 * Market-data feed: `iex` is free, `sip` needs a paid subscription
 */
export const DataFeed = z.enum(["iex", "sip"]);
export type DataFeed = z.infer<typeof DataFeed>;

export const TRADING_BASE_URLS: Record<TradingEnvironment, string> = {
	PAPER: "https://paper-api.alpaca.markets",
	LIVE: "https://api.alpaca.markets",
};

export const DATA_BASE_URL = "https://data.alpaca.markets";

export function isLive(environment: TradingEnvironment): boolean {
	return environment === "LIVE";
}
