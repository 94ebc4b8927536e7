import { describe, expect, it } from "vitest";
import { realtimeErrorName, vendorErrorCode } from "./status-codes.js";

describe("vendorErrorCode", () => {
	it("names the same status differently per family", () => {
		expect(vendorErrorCode("orders", 404)).toBe("ORDER_NOT_FOUND");
		expect(vendorErrorCode("assets", 404)).toBe("ASSET_NOT_FOUND");
		expect(vendorErrorCode("positions", 404)).toBe("POSITION_NOT_FOUND");
		expect(vendorErrorCode("watchlists", 404)).toBe("WATCHLIST_NOT_FOUND");
		expect(vendorErrorCode("account", 404)).toBe("ACCOUNT_NOT_FOUND");
		expect(vendorErrorCode("history", 404)).toBe("NOT_FOUND");
	});

	it("maps order-specific statuses", () => {
		expect(vendorErrorCode("orders", 403)).toBe("FORBIDDEN");
		expect(vendorErrorCode("orders", 422)).toBe("UNPROCESSABLE");
		expect(vendorErrorCode("orders", 500)).toBe("ORDER_NOT_CANCELABLE");
		expect(vendorErrorCode("positions", 500)).toBe("LIQUIDATION_FAILED");
	});

	it("falls back to the common table", () => {
		expect(vendorErrorCode("clock", 401)).toBe("UNAUTHORIZED");
		expect(vendorErrorCode("assets", 429)).toBe("RATE_LIMITED");
		expect(vendorErrorCode("history", 429)).toBe("RATE_LIMITED");
	});

	it("reports anything else as unexpected", () => {
		expect(vendorErrorCode("clock", 404)).toBe("UNEXPECTED_STATUS");
		expect(vendorErrorCode("assets", 500)).toBe("UNEXPECTED_STATUS");
		expect(vendorErrorCode("history", 418)).toBe("UNEXPECTED_STATUS");
	});
});

describe("realtimeErrorName", () => {
	it("maps wire numbers", () => {
		expect(realtimeErrorName(402)).toBe("AUTH_FAILED");
		expect(realtimeErrorName(403)).toBe("ALREADY_AUTHENTICATED");
		expect(realtimeErrorName(406)).toBe("CONNECTION_LIMIT_EXCEEDED");
		expect(realtimeErrorName(409)).toBe("INSUFFICIENT_SUBSCRIPTION");
		expect(realtimeErrorName(500)).toBe("INTERNAL_ERROR");
	});

	it("returns UNKNOWN for unlisted numbers", () => {
		expect(realtimeErrorName(410)).toBe("UNKNOWN");
	});
});
