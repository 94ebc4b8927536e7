/**
 * Order-update stream messages
 *
 * Actions are tagged by `action` with their payload under `data`. Responses
 * are tagged by `stream`; `trade_updates` responses carry an order update
 * tagged by `event`, each with a full snapshot of the affected order.
 */

import { FlexibleNumberSchema } from "@tickline/domain";
import { z } from "zod";
import { AlpacaOrderSchema, TimestampSchema } from "../client/alpaca-types.js";
import { mapOrder } from "../client/mappers.js";
import type { Order } from "../types.js";

// ============================================
// Actions
// ============================================

export type MessageStream = "trade_updates";

export type TradeUpdatesAction =
  | { action: "authenticate"; data: { key_id: string; secret_key: string } }
  | { action: "listen"; data: { streams: MessageStream[] } };

// ============================================
// Order updates
// ============================================

/** Events that carry only the order */
export type OrderOnlyEvent =
  | "new"
  | "done_for_day"
  | "pending_new"
  | "stopped"
  | "pending_cancel"
  | "pending_replace"
  | "calculated"
  | "suspended"
  | "order_replace_rejected"
  | "order_cancel_rejected";

/** Events that also carry the time they took effect */
export type TimestampedEvent = "canceled" | "expired" | "replaced" | "rejected";

export type FillEvent = "fill" | "partial_fill";

export type OrderEvent = OrderOnlyEvent | TimestampedEvent | FillEvent;

export type OrderUpdate =
  | { event: OrderOnlyEvent; order: Order }
  | { event: TimestampedEvent; order: Order; timestamp: string }
  | {
      event: FillEvent;
      order: Order;
      timestamp: string;
      /** Average price per share of this fill */
      price: number;
      /** Position size after the fill; negative when short */
      positionQty: number;
    };

const OrderField = AlpacaOrderSchema.transform(mapOrder);

function orderOnly<E extends OrderOnlyEvent>(event: E) {
  return z.object({ event: z.literal(event), order: OrderField });
}

function timestamped<E extends TimestampedEvent>(event: E) {
  return z.object({ event: z.literal(event), order: OrderField, timestamp: TimestampSchema });
}

function fill<E extends FillEvent>(event: E) {
  return z.object({
    event: z.literal(event),
    order: OrderField,
    timestamp: TimestampSchema,
    price: FlexibleNumberSchema,
    position_qty: FlexibleNumberSchema,
  });
}

export const OrderUpdateSchema = z
  .discriminatedUnion("event", [
    orderOnly("new"),
    fill("fill"),
    fill("partial_fill"),
    timestamped("canceled"),
    timestamped("expired"),
    orderOnly("done_for_day"),
    timestamped("replaced"),
    timestamped("rejected"),
    orderOnly("pending_new"),
    orderOnly("stopped"),
    orderOnly("pending_cancel"),
    orderOnly("pending_replace"),
    orderOnly("calculated"),
    orderOnly("suspended"),
    orderOnly("order_replace_rejected"),
    orderOnly("order_cancel_rejected"),
  ])
  .transform((update): OrderUpdate => {
    if (update.event === "fill" || update.event === "partial_fill") {
      const { position_qty, ...rest } = update;
      return { ...rest, positionQty: position_qty };
    }
    return update;
  });

// ============================================
// Responses
// ============================================

export const AuthorizationStatusSchema = z.enum(["authorized", "unauthorized"]);
export type AuthorizationStatus = z.infer<typeof AuthorizationStatusSchema>;

const StreamListSchema = z.object({ streams: z.array(z.literal("trade_updates")) });

export const TradeUpdatesResponseSchema = z.discriminatedUnion("stream", [
  z.object({
    stream: z.literal("authorization"),
    data: z.object({
      status: AuthorizationStatusSchema,
      action: z.enum(["authenticate", "listen"]),
    }),
  }),
  z.object({
    stream: z.literal("listening"),
    data: StreamListSchema,
  }),
  z.object({
    stream: z.literal("trade_updates"),
    data: OrderUpdateSchema,
  }),
]);
export type TradeUpdatesResponse = z.output<typeof TradeUpdatesResponseSchema>;
