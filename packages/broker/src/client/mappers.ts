/**
 * Alpaca API Mappers
 *
 * Functions to convert between Alpaca wire format and domain types.
 */

import type {
  Account,
  Asset,
  BulkResult,
  Clock,
  Order,
  OrderRequest,
  Position,
  ReplaceOrderRequest,
  Watchlist,
} from "../types.js";
import {
  type AlpacaAccount,
  type AlpacaAsset,
  type AlpacaBulkResult,
  type AlpacaClock,
  type AlpacaOrder,
  AlpacaOrderSchema,
  type AlpacaOrderRequest,
  type AlpacaPosition,
  type AlpacaReplaceOrderRequest,
  type AlpacaWatchlist,
} from "./alpaca-types.js";

export function mapAsset(data: AlpacaAsset): Asset {
  return {
    id: data.id,
    assetClass: data.class,
    exchange: data.exchange,
    symbol: data.symbol,
    name: data.name,
    status: data.status,
    tradable: data.tradable,
    marginable: data.marginable,
    shortable: data.shortable,
    easyToBorrow: data.easy_to_borrow,
    fractionable: data.fractionable,
  };
}

export function mapOrder(data: AlpacaOrder): Order {
  return {
    id: data.id,
    clientOrderId: data.client_order_id,
    createdAt: data.created_at,
    updatedAt: data.updated_at,
    submittedAt: data.submitted_at,
    filledAt: data.filled_at,
    expiredAt: data.expired_at,
    canceledAt: data.canceled_at,
    failedAt: data.failed_at,
    replacedAt: data.replaced_at,
    replacedBy: data.replaced_by,
    replaces: data.replaces,
    assetId: data.asset_id,
    symbol: data.symbol,
    assetClass: data.asset_class,
    notional: data.notional,
    qty: data.qty,
    filledQty: data.filled_qty,
    filledAvgPrice: data.filled_avg_price,
    orderClass: data.order_class,
    type: data.type,
    side: data.side,
    timeInForce: data.time_in_force,
    limitPrice: data.limit_price,
    stopPrice: data.stop_price,
    status: data.status,
    extendedHours: data.extended_hours,
    legs: data.legs.map(mapOrder),
    trailPercent: data.trail_percent,
    trailPrice: data.trail_price,
    hwm: data.hwm,
  };
}

export function mapPosition(data: AlpacaPosition): Position {
  return {
    assetId: data.asset_id,
    symbol: data.symbol,
    exchange: data.exchange,
    assetClass: data.asset_class,
    avgEntryPrice: data.avg_entry_price,
    qty: data.qty,
    qtyAvailable: data.qty_available,
    side: data.side,
    marketValue: data.market_value,
    costBasis: data.cost_basis,
    unrealizedPl: data.unrealized_pl,
    unrealizedPlpc: data.unrealized_plpc,
    unrealizedIntradayPl: data.unrealized_intraday_pl,
    unrealizedIntradayPlpc: data.unrealized_intraday_plpc,
    currentPrice: data.current_price,
    lastdayPrice: data.lastday_price,
    changeToday: data.change_today,
  };
}

/**
 * Bulk responses nest a full order under `body` when the item succeeded.
 * A body that is not an order (an error message) is left out.
 */
export function mapBulkResult(data: AlpacaBulkResult): BulkResult {
  const parsed = AlpacaOrderSchema.safeParse(data.body);
  return {
    id: data.id ?? data.symbol ?? "",
    status: data.status,
    order: parsed.success ? mapOrder(parsed.data) : undefined,
  };
}

export function mapWatchlist(data: AlpacaWatchlist): Watchlist {
  return {
    id: data.id,
    accountId: data.account_id,
    name: data.name,
    createdAt: data.created_at,
    updatedAt: data.updated_at,
    assets: data.assets.map(mapAsset),
  };
}

export function mapAccount(data: AlpacaAccount): Account {
  return {
    id: data.id,
    accountNumber: data.account_number,
    status: data.status,
    currency: data.currency,
    cash: data.cash,
    portfolioValue: data.portfolio_value,
    buyingPower: data.buying_power,
    regtBuyingPower: data.regt_buying_power,
    daytradingBuyingPower: data.daytrading_buying_power,
    daytradeCount: data.daytrade_count,
    patternDayTrader: data.pattern_day_trader,
    tradingBlocked: data.trading_blocked,
    transfersBlocked: data.transfers_blocked,
    accountBlocked: data.account_blocked,
    tradeSuspendedByUser: data.trade_suspended_by_user,
    shortingEnabled: data.shorting_enabled,
    longMarketValue: data.long_market_value,
    shortMarketValue: data.short_market_value,
    equity: data.equity,
    lastEquity: data.last_equity,
    multiplier: data.multiplier,
    initialMargin: data.initial_margin,
    maintenanceMargin: data.maintenance_margin,
    sma: data.sma,
    createdAt: data.created_at,
  };
}

export function mapClock(data: AlpacaClock): Clock {
  return {
    timestamp: data.timestamp,
    isOpen: data.is_open,
    nextOpen: data.next_open,
    nextClose: data.next_close,
  };
}

// ============================================
// Requests
// ============================================

function decimal(value: number | undefined): string | undefined {
  return value === undefined ? undefined : String(value);
}

export function buildOrderPayload(request: OrderRequest): AlpacaOrderRequest {
  const payload: AlpacaOrderRequest = {
    symbol: request.symbol,
    qty: decimal(request.qty),
    notional: decimal(request.notional),
    side: request.side,
    type: request.type,
    time_in_force: request.timeInForce,
    limit_price: decimal(request.limitPrice),
    stop_price: decimal(request.stopPrice),
    trail_price: decimal(request.trailPrice),
    trail_percent: decimal(request.trailPercent),
    extended_hours: request.extendedHours,
    client_order_id: request.clientOrderId,
    order_class: request.orderClass,
  };

  if (request.takeProfit) {
    payload.take_profit = { limit_price: String(request.takeProfit.limitPrice) };
  }
  if (request.stopLoss) {
    payload.stop_loss = {
      stop_price: String(request.stopLoss.stopPrice),
      limit_price: decimal(request.stopLoss.limitPrice),
    };
  }

  return payload;
}

export function buildReplacePayload(request: ReplaceOrderRequest): AlpacaReplaceOrderRequest {
  return {
    qty: decimal(request.qty),
    time_in_force: request.timeInForce,
    limit_price: decimal(request.limitPrice),
    stop_price: decimal(request.stopPrice),
    trail: decimal(request.trail),
    client_order_id: request.clientOrderId,
  };
}
