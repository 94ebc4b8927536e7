/**
 * Vendor status tables
 *
 * The same HTTP status means different things depending on the resource
 * family that answered it (a 404 from /v2/orders is a missing order, from
 * /v2/assets a missing asset), so each family carries its own table.
 */

export type ResourceFamily =
	| "assets"
	| "orders"
	| "positions"
	| "watchlists"
	| "history"
	| "account"
	| "clock";

export type VendorErrorCode =
	| "UNAUTHORIZED"
	| "RATE_LIMITED"
	| "UNEXPECTED_STATUS"
	| "ASSET_NOT_FOUND"
	| "FORBIDDEN"
	| "ORDER_NOT_FOUND"
	| "UNPROCESSABLE"
	| "ORDER_NOT_CANCELABLE"
	| "POSITION_NOT_FOUND"
	| "LIQUIDATION_FAILED"
	| "WATCHLIST_NOT_FOUND"
	| "INVALID_REQUEST"
	| "NOT_FOUND"
	| "ACCOUNT_NOT_FOUND";

type StatusTable = Readonly<Partial<Record<number, VendorErrorCode>>>;

const COMMON_STATUS_CODES: StatusTable = {
	401: "UNAUTHORIZED",
	429: "RATE_LIMITED",
};

const FAMILY_STATUS_CODES: Record<ResourceFamily, StatusTable> = {
	assets: { 404: "ASSET_NOT_FOUND" },
	orders: {
		403: "FORBIDDEN",
		404: "ORDER_NOT_FOUND",
		422: "UNPROCESSABLE",
		500: "ORDER_NOT_CANCELABLE",
	},
	positions: { 404: "POSITION_NOT_FOUND", 500: "LIQUIDATION_FAILED" },
	watchlists: { 404: "WATCHLIST_NOT_FOUND", 422: "UNPROCESSABLE" },
	history: {
		400: "INVALID_REQUEST",
		403: "FORBIDDEN",
		404: "NOT_FOUND",
		422: "UNPROCESSABLE",
		429: "RATE_LIMITED",
	},
	account: { 404: "ACCOUNT_NOT_FOUND" },
	clock: {},
};

/**
 * Name of a non-success status for the given resource family
 */
export function vendorErrorCode(family: ResourceFamily, status: number): VendorErrorCode {
	return FAMILY_STATUS_CODES[family][status] ?? COMMON_STATUS_CODES[status] ?? "UNEXPECTED_STATUS";
}

// ============================================
// Real-time stream error codes
// ============================================

export type RealtimeErrorName =
	| "INVALID_SYNTAX"
	| "NOT_AUTHENTICATED"
	| "AUTH_FAILED"
	| "ALREADY_AUTHENTICATED"
	| "AUTH_TIMEOUT"
	| "SYMBOL_LIMIT_EXCEEDED"
	| "CONNECTION_LIMIT_EXCEEDED"
	| "SLOW_CLIENT"
	| "V2_NOT_ENABLED"
	| "INSUFFICIENT_SUBSCRIPTION"
	| "INTERNAL_ERROR"
	| "UNKNOWN";

// Keyed by the number the server sends, which wins over its message text.
const REALTIME_ERROR_NAMES: Readonly<Partial<Record<number, RealtimeErrorName>>> = {
	400: "INVALID_SYNTAX",
	401: "NOT_AUTHENTICATED",
	402: "AUTH_FAILED",
	403: "ALREADY_AUTHENTICATED",
	404: "AUTH_TIMEOUT",
	405: "SYMBOL_LIMIT_EXCEEDED",
	406: "CONNECTION_LIMIT_EXCEEDED",
	407: "SLOW_CLIENT",
	408: "V2_NOT_ENABLED",
	409: "INSUFFICIENT_SUBSCRIPTION",
	500: "INTERNAL_ERROR",
};

export function realtimeErrorName(code: number): RealtimeErrorName {
	return REALTIME_ERROR_NAMES[code] ?? "UNKNOWN";
}
