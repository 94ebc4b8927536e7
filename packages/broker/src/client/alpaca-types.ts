/**
 * Alpaca API Types
 *
 * Wire format schemas for trading API responses and requests. Numeric
 * fields arrive as decimal strings on most endpoints, so every one of them
 * goes through the shared flexible-number schemas.
 */

import { FlexibleNumberSchema, nullableList, OptionalFlexibleNumberSchema } from "@tickline/domain";
import { z } from "zod";

// MessagePack frames may carry timestamps as the timestamp extension type
export const TimestampSchema = z.union([z.string(), z.date().transform((date) => date.toISOString())]);

const OptionalTimestamp = TimestampSchema.nullish().transform((value) => value ?? undefined);

const OptionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

export const AlpacaAssetSchema = z.object({
  id: z.string(),
  class: z.string(),
  exchange: z.string(),
  symbol: z.string(),
  name: z.string().default(""),
  status: z.enum(["active", "inactive"]),
  tradable: z.boolean(),
  marginable: z.boolean(),
  shortable: z.boolean(),
  easy_to_borrow: z.boolean(),
  fractionable: z.boolean().default(false),
});
export type AlpacaAsset = z.infer<typeof AlpacaAssetSchema>;

export const OrderStatusSchema = z.enum([
  "new",
  "partially_filled",
  "filled",
  "done_for_day",
  "canceled",
  "expired",
  "replaced",
  "pending_cancel",
  "pending_replace",
  "accepted",
  "pending_new",
  "accepted_for_bidding",
  "stopped",
  "rejected",
  "suspended",
  "calculated",
]);

export const OrderTypeSchema = z.enum(["market", "limit", "stop", "stop_limit", "trailing_stop"]);
export const OrderSideSchema = z.enum(["buy", "sell"]);
export const TimeInForceSchema = z.enum(["day", "gtc", "opg", "cls", "ioc", "fok"]);

// Simple orders sometimes report an empty order class.
export const OrderClassSchema = z
  .enum(["simple", "bracket", "oco", "oto", ""])
  .transform((value) => (value === "" ? "simple" : value));

const AlpacaOrderBaseSchema = z.object({
  id: z.string(),
  client_order_id: z.string(),
  created_at: TimestampSchema,
  updated_at: OptionalTimestamp,
  submitted_at: OptionalTimestamp,
  filled_at: OptionalTimestamp,
  expired_at: OptionalTimestamp,
  canceled_at: OptionalTimestamp,
  failed_at: OptionalTimestamp,
  replaced_at: OptionalTimestamp,
  replaced_by: OptionalString,
  replaces: OptionalString,
  asset_id: z.string(),
  symbol: z.string(),
  asset_class: z.string(),
  notional: OptionalFlexibleNumberSchema,
  qty: OptionalFlexibleNumberSchema,
  filled_qty: FlexibleNumberSchema,
  filled_avg_price: OptionalFlexibleNumberSchema,
  order_class: OrderClassSchema.default("simple"),
  type: OrderTypeSchema,
  side: OrderSideSchema,
  time_in_force: TimeInForceSchema,
  limit_price: OptionalFlexibleNumberSchema,
  stop_price: OptionalFlexibleNumberSchema,
  status: OrderStatusSchema,
  extended_hours: z.boolean().default(false),
  trail_percent: OptionalFlexibleNumberSchema,
  trail_price: OptionalFlexibleNumberSchema,
  hwm: OptionalFlexibleNumberSchema,
});

export type AlpacaOrder = z.output<typeof AlpacaOrderBaseSchema> & { legs: AlpacaOrder[] };

// Legs are orders themselves.
export const AlpacaOrderSchema: z.ZodType<AlpacaOrder, z.ZodTypeDef, unknown> = AlpacaOrderBaseSchema.extend({
  legs: z.lazy(() => nullableList(AlpacaOrderSchema)),
});

export const AlpacaPositionSchema = z.object({
  asset_id: z.string(),
  symbol: z.string(),
  exchange: z.string(),
  asset_class: z.string(),
  avg_entry_price: FlexibleNumberSchema,
  qty: FlexibleNumberSchema,
  qty_available: OptionalFlexibleNumberSchema,
  side: z.enum(["long", "short"]),
  market_value: OptionalFlexibleNumberSchema,
  cost_basis: FlexibleNumberSchema,
  unrealized_pl: OptionalFlexibleNumberSchema,
  unrealized_plpc: OptionalFlexibleNumberSchema,
  unrealized_intraday_pl: OptionalFlexibleNumberSchema,
  unrealized_intraday_plpc: OptionalFlexibleNumberSchema,
  current_price: OptionalFlexibleNumberSchema,
  lastday_price: OptionalFlexibleNumberSchema,
  change_today: OptionalFlexibleNumberSchema,
});
export type AlpacaPosition = z.infer<typeof AlpacaPositionSchema>;

/** One entry of a DELETE /v2/orders or DELETE /v2/positions response */
export const AlpacaBulkResultSchema = z.object({
  id: z.string().optional(),
  symbol: z.string().optional(),
  status: z.number(),
  body: z.unknown().optional(),
});
export type AlpacaBulkResult = z.infer<typeof AlpacaBulkResultSchema>;

export const AlpacaWatchlistSchema = z.object({
  id: z.string(),
  account_id: z.string(),
  name: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
  assets: nullableList(AlpacaAssetSchema),
});
export type AlpacaWatchlist = z.infer<typeof AlpacaWatchlistSchema>;

export const AlpacaAccountSchema = z.object({
  id: z.string(),
  account_number: z.string().default(""),
  status: z.string(),
  currency: z.string(),
  cash: FlexibleNumberSchema,
  portfolio_value: FlexibleNumberSchema,
  buying_power: FlexibleNumberSchema,
  regt_buying_power: FlexibleNumberSchema,
  daytrading_buying_power: FlexibleNumberSchema,
  daytrade_count: z.number(),
  pattern_day_trader: z.boolean(),
  trading_blocked: z.boolean(),
  transfers_blocked: z.boolean(),
  account_blocked: z.boolean(),
  trade_suspended_by_user: z.boolean().default(false),
  shorting_enabled: z.boolean(),
  long_market_value: FlexibleNumberSchema,
  short_market_value: FlexibleNumberSchema,
  equity: FlexibleNumberSchema,
  last_equity: FlexibleNumberSchema,
  multiplier: FlexibleNumberSchema,
  initial_margin: FlexibleNumberSchema,
  maintenance_margin: FlexibleNumberSchema,
  sma: FlexibleNumberSchema,
  created_at: z.string(),
});
export type AlpacaAccount = z.infer<typeof AlpacaAccountSchema>;

export const AlpacaClockSchema = z.object({
  /** Current timestamp (ISO 8601) */
  timestamp: z.string(),
  /** Whether the market is currently open */
  is_open: z.boolean(),
  next_open: z.string(),
  next_close: z.string(),
});
export type AlpacaClock = z.infer<typeof AlpacaClockSchema>;

// ============================================
// Requests
// ============================================

export interface AlpacaOrderRequest {
  symbol: string;
  qty?: string;
  notional?: string;
  side: string;
  type: string;
  time_in_force: string;
  limit_price?: string;
  stop_price?: string;
  trail_price?: string;
  trail_percent?: string;
  extended_hours?: boolean;
  client_order_id?: string;
  order_class?: string;
  take_profit?: { limit_price: string };
  stop_loss?: { stop_price: string; limit_price?: string };
}

export interface AlpacaReplaceOrderRequest {
  qty?: string;
  time_in_force?: string;
  limit_price?: string;
  stop_price?: string;
  trail?: string;
  client_order_id?: string;
}

export interface AlpacaWatchlistRequest {
  name?: string;
  symbols?: string[];
}
