/**
 * Broker Utilities
 *
 * Local argument checks that run before any request is sent. The vendor
 * would reject the same requests with a 422; checking here saves the round
 * trip and names the offending field.
 */

import { ValidationError } from "@tickline/domain";
import type { ClosePositionOptions, OrderRequest, ReplaceOrderRequest } from "./types.js";

function requirePositive(value: number | undefined, field: string): void {
	if (value !== undefined && !(Number.isFinite(value) && value > 0)) {
		throw new ValidationError(`${field} must be a positive number`, { field });
	}
}

/**
 * Validate a new order.
 *
 * - exactly one of qty and notional
 * - limitPrice for limit and stop_limit orders
 * - stopPrice for stop and stop_limit orders
 * - exactly one of trailPrice and trailPercent for trailing_stop orders
 *
 * @throws {ValidationError} Naming the first offending field
 */
export function validateOrderRequest(request: OrderRequest): void {
	if (!request.symbol) {
		throw new ValidationError("symbol is required", { field: "symbol" });
	}

	const hasQty = request.qty !== undefined;
	const hasNotional = request.notional !== undefined;
	if (hasQty === hasNotional) {
		throw new ValidationError("Exactly one of qty and notional must be set", {
			field: hasQty ? "notional" : "qty",
		});
	}
	requirePositive(request.qty, "qty");
	requirePositive(request.notional, "notional");

	const needsLimit = request.type === "limit" || request.type === "stop_limit";
	if (needsLimit && request.limitPrice === undefined) {
		throw new ValidationError(`${request.type} orders require limitPrice`, { field: "limitPrice" });
	}
	requirePositive(request.limitPrice, "limitPrice");

	const needsStop = request.type === "stop" || request.type === "stop_limit";
	if (needsStop && request.stopPrice === undefined) {
		throw new ValidationError(`${request.type} orders require stopPrice`, { field: "stopPrice" });
	}
	requirePositive(request.stopPrice, "stopPrice");

	if (request.type === "trailing_stop") {
		const hasPrice = request.trailPrice !== undefined;
		const hasPercent = request.trailPercent !== undefined;
		if (hasPrice === hasPercent) {
			throw new ValidationError("trailing_stop orders require exactly one of trailPrice and trailPercent", {
				field: "trailPrice",
			});
		}
	}
	requirePositive(request.trailPrice, "trailPrice");
	requirePositive(request.trailPercent, "trailPercent");
}

/**
 * @throws {ValidationError} If no field would change
 */
export function validateReplaceOrder(request: ReplaceOrderRequest): void {
	const changes = Object.values(request).filter((value) => value !== undefined);
	if (changes.length === 0) {
		throw new ValidationError("Replace request changes nothing");
	}
	requirePositive(request.qty, "qty");
	requirePositive(request.limitPrice, "limitPrice");
	requirePositive(request.stopPrice, "stopPrice");
	requirePositive(request.trail, "trail");
}

/**
 * @throws {ValidationError} If both qty and percentage are set, or either is out of range
 */
export function validateClosePosition(options: ClosePositionOptions): void {
	if (options.qty !== undefined && options.percentage !== undefined) {
		throw new ValidationError("qty and percentage are mutually exclusive", { field: "percentage" });
	}
	requirePositive(options.qty, "qty");
	if (
		options.percentage !== undefined &&
		!(Number.isFinite(options.percentage) && options.percentage > 0 && options.percentage <= 100)
	) {
		throw new ValidationError("percentage must be in (0, 100]", { field: "percentage" });
	}
}

/**
 * Encode one path segment (symbols such as "BRK.B" or crypto pairs with "/")
 */
export function pathSegment(value: string): string {
	if (!value) {
		throw new ValidationError("Path parameter must not be empty");
	}
	return encodeURIComponent(value);
}
