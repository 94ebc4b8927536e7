/**
 * Exchange codes used in trade (`x`) and quote (`ax`, `bx`) fields
 *
 * @see https://docs.alpaca.markets/docs/real-time-stock-pricing-data#exchanges
 */

export const EXCHANGE_NAMES: Readonly<Record<string, string>> = {
  A: "NYSE American (AMEX)",
  B: "NASDAQ OMX BX",
  C: "National Stock Exchange",
  D: "FINRA ADF",
  E: "Market Independent",
  H: "MIAX",
  I: "International Securities Exchange",
  J: "Cboe EDGA",
  K: "Cboe EDGX",
  L: "Long Term Stock Exchange",
  M: "Chicago Stock Exchange",
  N: "New York Stock Exchange",
  P: "NYSE Arca",
  Q: "NASDAQ OMX",
  S: "NASDAQ Small Cap",
  T: "NASDAQ Int",
  U: "Members Exchange",
  V: "IEX",
  W: "CBOE",
  X: "NASDAQ OMX PSX",
  Y: "Cboe BYX",
  Z: "Cboe BZX",
};

export interface Exchange {
  code: string;
  /** Absent for codes outside the table */
  name?: string;
}

export function decodeExchange(code: string): Exchange {
  return { code, name: Object.hasOwn(EXCHANGE_NAMES, code) ? EXCHANGE_NAMES[code] : undefined };
}
