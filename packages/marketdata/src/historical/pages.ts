/**
 * Historical response pages
 *
 * Each multi-item endpoint answers with
 * `{ symbol, <items>: [...] | null, next_page_token: string | null }`.
 */

import { nullableList } from "@tickline/domain";
import type { Paged, PageSplit } from "@tickline/transport";
import { z } from "zod";
import { BarSchema, QuoteSchema, TradeSchema } from "../schemas.js";
import type { Bar, Quote, Trade } from "../types.js";

const NextPageToken = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

abstract class Page<T> implements Paged<T> {
  constructor(
    readonly symbol: string,
    readonly items: T[],
    readonly nextPageToken: string | undefined
  ) {}

  split(): PageSplit<T> {
    return { items: this.items, nextToken: this.nextPageToken };
  }
}

export class TradesPage extends Page<Trade> {}
export class QuotesPage extends Page<Quote> {}
export class BarsPage extends Page<Bar> {}

export const TradesPageSchema = z
  .object({ symbol: z.string(), trades: nullableList(TradeSchema), next_page_token: NextPageToken })
  .transform((body) => new TradesPage(body.symbol, body.trades, body.next_page_token));

export const QuotesPageSchema = z
  .object({ symbol: z.string(), quotes: nullableList(QuoteSchema), next_page_token: NextPageToken })
  .transform((body) => new QuotesPage(body.symbol, body.quotes, body.next_page_token));

export const BarsPageSchema = z
  .object({ symbol: z.string(), bars: nullableList(BarSchema), next_page_token: NextPageToken })
  .transform((body) => new BarsPage(body.symbol, body.bars, body.next_page_token));
