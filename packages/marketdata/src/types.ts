/**
 * Market Data Types
 */

import type { Exchange } from "./exchanges.js";

export type { DataFeed } from "@tickline/domain";

export type TimeFrame = "1Min" | "1Hour" | "1Day";

export interface Trade {
  id?: number;
  exchange: Exchange;
  price: number;
  size: number;
  /** RFC-3339 with nanosecond precision */
  timestamp: string;
  conditions: string[];
  tape?: string;
}

export interface Quote {
  askExchange: Exchange;
  askPrice: number;
  askSize: number;
  bidExchange: Exchange;
  bidPrice: number;
  bidSize: number;
  timestamp: string;
  conditions: string[];
  tape?: string;
}

export interface Bar {
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  timestamp: string;
  tradeCount?: number;
  vwap?: number;
}

export interface Snapshot {
  symbol: string;
  latestTrade?: Trade;
  latestQuote?: Quote;
  minuteBar?: Bar;
  dailyBar?: Bar;
  prevDailyBar?: Bar;
}

/**
 * Time window for a historical query. Timestamps are RFC-3339 or dates
 * (YYYY-MM-DD).
 */
export interface HistoricalRange {
  start: string;
  end?: string;
  /** Items per page, 1 to 10000 */
  limit?: number;
}

export interface BarRange extends HistoricalRange {
  timeframe: TimeFrame;
}
