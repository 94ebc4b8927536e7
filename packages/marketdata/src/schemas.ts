/**
 * Wire schemas shared by the historical and real-time clients
 *
 * Both APIs use the same single-letter keys for trades, quotes and bars.
 */

import { FlexibleNumberSchema, nullableList, OptionalFlexibleNumberSchema } from "@tickline/domain";
import { z } from "zod";
import { decodeExchange } from "./exchanges.js";
import type { Bar, Quote, Trade } from "./types.js";

export const TradeFields = {
  i: z.number().optional(), // Trade ID
  x: z.string(), // Exchange
  p: FlexibleNumberSchema, // Price
  s: FlexibleNumberSchema, // Size
  t: z.string(), // Timestamp (RFC-3339)
  c: nullableList(z.string()), // Conditions
  z: z.string().optional(), // Tape
};

export const QuoteFields = {
  ax: z.string(), // Ask exchange
  ap: FlexibleNumberSchema, // Ask price
  as: FlexibleNumberSchema, // Ask size
  bx: z.string(), // Bid exchange
  bp: FlexibleNumberSchema, // Bid price
  bs: FlexibleNumberSchema, // Bid size
  t: z.string(), // Timestamp (RFC-3339)
  c: nullableList(z.string()), // Conditions
  z: z.string().optional(), // Tape
};

export const BarFields = {
  o: FlexibleNumberSchema, // Open
  h: FlexibleNumberSchema, // High
  l: FlexibleNumberSchema, // Low
  c: FlexibleNumberSchema, // Close
  v: FlexibleNumberSchema, // Volume
  t: z.string(), // Timestamp (RFC-3339)
  n: OptionalFlexibleNumberSchema, // Trade count
  vw: OptionalFlexibleNumberSchema, // VWAP
};

const TradeWireSchema = z.object(TradeFields);
const QuoteWireSchema = z.object(QuoteFields);
const BarWireSchema = z.object(BarFields);

export function toTrade(wire: z.output<typeof TradeWireSchema>): Trade {
  return {
    id: wire.i,
    exchange: decodeExchange(wire.x),
    price: wire.p,
    size: wire.s,
    timestamp: wire.t,
    conditions: wire.c,
    tape: wire.z,
  };
}

export function toQuote(wire: z.output<typeof QuoteWireSchema>): Quote {
  return {
    askExchange: decodeExchange(wire.ax),
    askPrice: wire.ap,
    askSize: wire.as,
    bidExchange: decodeExchange(wire.bx),
    bidPrice: wire.bp,
    bidSize: wire.bs,
    timestamp: wire.t,
    conditions: wire.c,
    tape: wire.z,
  };
}

export function toBar(wire: z.output<typeof BarWireSchema>): Bar {
  return {
    open: wire.o,
    high: wire.h,
    low: wire.l,
    close: wire.c,
    volume: wire.v,
    timestamp: wire.t,
    tradeCount: wire.n,
    vwap: wire.vw,
  };
}

export const TradeSchema = TradeWireSchema.transform(toTrade);
export const QuoteSchema = QuoteWireSchema.transform(toQuote);
export const BarSchema = BarWireSchema.transform(toBar);
