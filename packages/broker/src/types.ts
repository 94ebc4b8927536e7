import type { TradingEnvironment } from "@tickline/domain";

export type { TradingEnvironment };

export type OrderSide = "buy" | "sell";

export type OrderType = "market" | "limit" | "stop" | "stop_limit" | "trailing_stop";

export type OrderClass = "simple" | "bracket" | "oco" | "oto";

export type TimeInForce = "day" | "gtc" | "opg" | "cls" | "ioc" | "fok";

export type OrderStatus =
  | "new"
  | "partially_filled"
  | "filled"
  | "done_for_day"
  | "canceled"
  | "expired"
  | "replaced"
  | "pending_cancel"
  | "pending_replace"
  | "accepted"
  | "pending_new"
  | "accepted_for_bidding"
  | "stopped"
  | "rejected"
  | "suspended"
  | "calculated";

export type PositionSide = "long" | "short";

export type AssetStatus = "active" | "inactive";

export type SortDirection = "asc" | "desc";

export interface Asset {
  id: string;
  assetClass: string;
  exchange: string;
  symbol: string;
  name: string;
  status: AssetStatus;
  tradable: boolean;
  marginable: boolean;
  shortable: boolean;
  easyToBorrow: boolean;
  fractionable: boolean;
}

export interface TakeProfit {
  limitPrice: number;
}

export interface StopLoss {
  stopPrice: number;
  limitPrice?: number;
}

/**
 * New order. Exactly one of `qty` and `notional` must be set.
 */
export interface OrderRequest {
  symbol: string;
  qty?: number;
  /** Dollar amount, for fractional market orders */
  notional?: number;
  side: OrderSide;
  type: OrderType;
  timeInForce: TimeInForce;
  limitPrice?: number;
  stopPrice?: number;
  trailPrice?: number;
  trailPercent?: number;
  extendedHours?: boolean;
  /** Must be unique per order when set */
  clientOrderId?: string;
  orderClass?: OrderClass;
  takeProfit?: TakeProfit;
  stopLoss?: StopLoss;
}

export interface ReplaceOrderRequest {
  qty?: number;
  timeInForce?: TimeInForce;
  limitPrice?: number;
  stopPrice?: number;
  /** New trail price or percent, for trailing stops */
  trail?: number;
  clientOrderId?: string;
}

export interface Order {
  id: string;
  clientOrderId: string;
  createdAt: string;
  updatedAt?: string;
  submittedAt?: string;
  filledAt?: string;
  expiredAt?: string;
  canceledAt?: string;
  failedAt?: string;
  replacedAt?: string;
  replacedBy?: string;
  replaces?: string;
  assetId: string;
  symbol: string;
  assetClass: string;
  notional?: number;
  qty?: number;
  filledQty: number;
  filledAvgPrice?: number;
  orderClass: OrderClass;
  type: OrderType;
  side: OrderSide;
  timeInForce: TimeInForce;
  limitPrice?: number;
  stopPrice?: number;
  status: OrderStatus;
  extendedHours: boolean;
  legs: Order[];
  trailPercent?: number;
  trailPrice?: number;
  /** High-water mark, for trailing stops */
  hwm?: number;
}

export interface ListOrdersOptions {
  /** Default: open */
  status?: "open" | "closed" | "all";
  /** Default: 50, max: 500 */
  limit?: number;
  /** Only orders submitted after this RFC-3339 timestamp */
  after?: string;
  /** Only orders submitted until this RFC-3339 timestamp */
  until?: string;
  direction?: SortDirection;
  /** Roll multi-leg orders up under their parent */
  nested?: boolean;
  symbols?: string[];
  side?: OrderSide;
}

/** Outcome of one order in a cancel-all or close-all request */
export interface BulkResult {
  id: string;
  /** HTTP status the vendor reported for this item */
  status: number;
  order?: Order;
}

export interface Position {
  assetId: string;
  symbol: string;
  exchange: string;
  assetClass: string;
  avgEntryPrice: number;
  qty: number;
  qtyAvailable?: number;
  side: PositionSide;
  marketValue?: number;
  costBasis: number;
  unrealizedPl?: number;
  unrealizedPlpc?: number;
  unrealizedIntradayPl?: number;
  unrealizedIntradayPlpc?: number;
  currentPrice?: number;
  lastdayPrice?: number;
  changeToday?: number;
}

/** Close a number of shares or a percentage of the position, never both */
export interface ClosePositionOptions {
  qty?: number;
  /** 0-100 */
  percentage?: number;
}

export interface Watchlist {
  id: string;
  accountId: string;
  name: string;
  createdAt: string;
  updatedAt: string;
  assets: Asset[];
}

export interface UpdateWatchlistRequest {
  name?: string;
  symbols?: string[];
}

export interface Account {
  id: string;
  accountNumber: string;
  status: string;
  currency: string;
  cash: number;
  portfolioValue: number;
  buyingPower: number;
  regtBuyingPower: number;
  daytradingBuyingPower: number;
  daytradeCount: number;
  patternDayTrader: boolean;
  tradingBlocked: boolean;
  transfersBlocked: boolean;
  accountBlocked: boolean;
  tradeSuspendedByUser: boolean;
  shortingEnabled: boolean;
  longMarketValue: number;
  shortMarketValue: number;
  equity: number;
  lastEquity: number;
  multiplier: number;
  initialMargin: number;
  maintenanceMargin: number;
  /** Special Memorandum Account */
  sma: number;
  createdAt: string;
}

export interface Clock {
  timestamp: string;
  isOpen: boolean;
  nextOpen: string;
  nextClose: string;
}
