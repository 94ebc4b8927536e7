/**
 * Historical Stock Data Client
 *
 * Trades, quotes and bars for one symbol over a time window, delivered as
 * paged streams, plus the latest trade, latest quote and snapshot.
 *
 * @see https://docs.alpaca.markets/docs/historical-stock-data-1
 */

import { DATA_BASE_URL, type DataFeed, ValidationError } from "@tickline/domain";
import type { Logger } from "@tickline/logger";
import { createRequestFn, type Paged, PagedStream, type QueryValue } from "@tickline/transport";
import { z } from "zod";
import { log as defaultLog } from "../logger.js";
import { BarSchema, QuoteSchema, TradeSchema } from "../schemas.js";
import type { Bar, BarRange, HistoricalRange, Quote, Snapshot, Trade } from "../types.js";
import { BarsPageSchema, QuotesPageSchema, TradesPageSchema } from "./pages.js";

const MAX_PAGE_LIMIT = 10000;

export interface HistoricalClientConfig {
  keyId: string;
  secretKey: string;
  /** Data feed (default: iex) */
  feed?: DataFeed;
  /** Override https://data.alpaca.markets */
  baseUrl?: string;
  logger?: Logger;
}

export interface HistoricalClient {
  trades(symbol: string, range: HistoricalRange): PagedStream<Trade>;
  quotes(symbol: string, range: HistoricalRange): PagedStream<Quote>;
  bars(symbol: string, range: BarRange): PagedStream<Bar>;
  latestTrade(symbol: string): Promise<Trade>;
  latestQuote(symbol: string): Promise<Quote>;
  snapshot(symbol: string): Promise<Snapshot>;
}

const LatestTradeSchema = z.object({ symbol: z.string(), trade: TradeSchema });
const LatestQuoteSchema = z.object({ symbol: z.string(), quote: QuoteSchema });
const SnapshotSchema = z.object({
  symbol: z.string().optional(),
  latestTrade: TradeSchema.nullish(),
  latestQuote: QuoteSchema.nullish(),
  minuteBar: BarSchema.nullish(),
  dailyBar: BarSchema.nullish(),
  prevDailyBar: BarSchema.nullish(),
});

function validateRange(range: HistoricalRange): void {
  if (!range.start) {
    throw new ValidationError("start is required", { field: "start" });
  }
  if (
    range.limit !== undefined &&
    !(Number.isInteger(range.limit) && range.limit >= 1 && range.limit <= MAX_PAGE_LIMIT)
  ) {
    throw new ValidationError(`limit must be an integer from 1 to ${MAX_PAGE_LIMIT}`, {
      field: "limit",
    });
  }
}

function stockPath(symbol: string, resource: string): string {
  if (!symbol) {
    throw new ValidationError("symbol is required", { field: "symbol" });
  }
  return `/v2/stocks/${encodeURIComponent(symbol)}/${resource}`;
}

/**
 * Create a historical data client.
 *
 * @example
 * ```typescript
 * const history = createHistoricalClient({ keyId, secretKey, feed: "iex" });
 *
 * for await (const bar of history.bars("AAPL", { start: "2024-03-01", timeframe: "1Day" })) {
 *   console.log(bar.timestamp, bar.close);
 * }
 * ```
 */
export function createHistoricalClient(config: HistoricalClientConfig): HistoricalClient {
  const { keyId, secretKey } = config;
  const feed = config.feed ?? "iex";
  const logger = config.logger ?? defaultLog;

  if (!keyId || !secretKey) {
    throw new ValidationError("API key ID and secret key are required", {
      field: keyId ? "secretKey" : "keyId",
    });
  }

  const request = createRequestFn({
    keyId,
    secretKey,
    baseUrl: config.baseUrl ?? DATA_BASE_URL,
    logger,
  });

  function paged<T>(
    path: string,
    query: Record<string, QueryValue>,
    schema: z.ZodType<Paged<T>, z.ZodTypeDef, unknown>
  ): PagedStream<T> {
    return new PagedStream<T>((token, signal) =>
      request("GET", path, { family: "history", query: { ...query, page_token: token }, signal }, schema)
    );
  }

  function rangeQuery(range: HistoricalRange): Record<string, QueryValue> {
    validateRange(range);
    return { start: range.start, end: range.end, limit: range.limit, feed };
  }

  return {
    trades(symbol, range) {
      return paged(stockPath(symbol, "trades"), rangeQuery(range), TradesPageSchema);
    },

    quotes(symbol, range) {
      return paged(stockPath(symbol, "quotes"), rangeQuery(range), QuotesPageSchema);
    },

    bars(symbol, range) {
      return paged(
        stockPath(symbol, "bars"),
        { timeframe: range.timeframe, ...rangeQuery(range) },
        BarsPageSchema
      );
    },

    async latestTrade(symbol) {
      const body = await request(
        "GET",
        stockPath(symbol, "trades/latest"),
        { family: "history", query: { feed } },
        LatestTradeSchema
      );
      return body.trade;
    },

    async latestQuote(symbol) {
      const body = await request(
        "GET",
        stockPath(symbol, "quotes/latest"),
        { family: "history", query: { feed } },
        LatestQuoteSchema
      );
      return body.quote;
    },

    async snapshot(symbol) {
      const body = await request(
        "GET",
        stockPath(symbol, "snapshot"),
        { family: "history", query: { feed } },
        SnapshotSchema
      );
      return {
        symbol: body.symbol ?? symbol,
        latestTrade: body.latestTrade ?? undefined,
        latestQuote: body.latestQuote ?? undefined,
        minuteBar: body.minuteBar ?? undefined,
        dailyBar: body.dailyBar ?? undefined,
        prevDailyBar: body.prevDailyBar ?? undefined,
      };
    },
  };
}
