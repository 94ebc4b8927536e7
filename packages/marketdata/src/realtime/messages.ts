/**
 * Real-time market data messages
 *
 * Every frame is a JSON array of messages tagged by `T`. Control messages
 * (error, success, subscription) arrive alone; data points may be batched.
 */

import { nullableList, type RealtimeErrorName, realtimeErrorName } from "@tickline/domain";
import { z } from "zod";
import { BarFields, QuoteFields, toBar, toQuote, toTrade, TradeFields } from "../schemas.js";
import type { Bar, Quote, Trade } from "../types.js";

// ============================================
// Actions
// ============================================

/**
 * Symbols to add to or remove from the session. `"*"` means every symbol.
 */
export interface Subscription {
  trades?: string[];
  quotes?: string[];
  bars?: string[];
  dailyBars?: string[];
  updatedBars?: string[];
}

export type RealtimeAction =
  | { action: "auth"; key: string; secret: string }
  | ({ action: "subscribe" } & Subscription)
  | ({ action: "unsubscribe" } & Subscription);

// ============================================
// Responses
// ============================================

export type BarKind = "b" | "d" | "u";

export type RealtimeMessage =
  | { T: "error"; code: number; message: string; name: RealtimeErrorName }
  | { T: "success"; message: string }
  | ({ T: "subscription" } & Required<Subscription>)
  | ({ T: "t"; symbol: string } & Trade)
  | ({ T: "q"; symbol: string } & Quote)
  | ({ T: BarKind; symbol: string } & Bar);

const SymbolList = nullableList(z.string());

function barMessage<K extends BarKind>(kind: K) {
  return z.object({ T: z.literal(kind), S: z.string(), ...BarFields });
}

export const RealtimeMessageSchema = z
  .discriminatedUnion("T", [
    z.object({ T: z.literal("error"), code: z.number(), msg: z.string() }),
    z.object({ T: z.literal("success"), msg: z.string() }),
    z.object({
      T: z.literal("subscription"),
      trades: SymbolList,
      quotes: SymbolList,
      bars: SymbolList,
      dailyBars: SymbolList,
      updatedBars: SymbolList,
    }),
    z.object({ T: z.literal("t"), S: z.string(), ...TradeFields }),
    z.object({ T: z.literal("q"), S: z.string(), ...QuoteFields }),
    barMessage("b"),
    barMessage("d"),
    barMessage("u"),
  ])
  .transform((message): RealtimeMessage => {
    switch (message.T) {
      case "error":
        return { T: "error", code: message.code, message: message.msg, name: realtimeErrorName(message.code) };
      case "success":
        return { T: "success", message: message.msg };
      case "subscription":
        return message;
      case "t":
        return { T: "t", symbol: message.S, ...toTrade(message) };
      case "q":
        return { T: "q", symbol: message.S, ...toQuote(message) };
      default:
        return { T: message.T, symbol: message.S, ...toBar(message) };
    }
  });
