/**
 * Trading Client Unit Tests
 *
 * `fetch` is stubbed; each test checks the request the client assembled
 * and the domain object it decoded.
 */

import { SerializationError, ValidationError, VendorError } from "@tickline/domain";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createTradingClient } from "../src/client/index.js";
import { assetWire, orderWire, positionWire, watchlistWire } from "./fixtures.js";

const BASE = "https://paper-api.alpaca.markets";

interface Reply {
	status?: number;
	body?: unknown;
}

function stubFetch(...replies: Reply[]) {
	let index = 0;
	const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => {
		const reply = replies[Math.min(index, replies.length - 1)] ?? {};
		index += 1;
		const text = reply.body === undefined ? null : JSON.stringify(reply.body);
		return new Response(text, { status: reply.status ?? 200 });
	});
	vi.stubGlobal("fetch", fetchMock);
	return fetchMock;
}

function requestAt(fetchMock: ReturnType<typeof stubFetch>, index = 0) {
	const call = fetchMock.mock.calls[index];
	const init = call?.[1];
	const body = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
	return { url: call?.[0], method: init?.method, body };
}

function client() {
	return createTradingClient({
		keyId: "test-key",
		secretKey: "test-secret",
		environment: "PAPER",
	});
}

afterEach(() => {
	vi.unstubAllGlobals();
});

describe("createTradingClient", () => {
	it("throws on missing credentials", () => {
		expect(() => createTradingClient({ keyId: "", secretKey: "test-secret", environment: "PAPER" })).toThrow(
			ValidationError,
		);
	});

	it("uses the live host for LIVE", async () => {
		const fetchMock = stubFetch({
			body: { timestamp: "2024-03-04T10:00:00-05:00", is_open: true, next_open: "a", next_close: "b" },
		});
		const live = createTradingClient({ keyId: "test-key", secretKey: "test-secret", environment: "LIVE" });

		await live.getClock();

		expect(requestAt(fetchMock).url).toBe("https://api.alpaca.markets/v2/clock");
	});

	it("honors a base URL override", async () => {
		const fetchMock = stubFetch({ body: [] });
		const custom = createTradingClient({
			keyId: "test-key",
			secretKey: "test-secret",
			environment: "PAPER",
			baseUrl: "http://localhost:8080",
		});

		await custom.listOpenPositions();

		expect(requestAt(fetchMock).url).toBe("http://localhost:8080/v2/positions");
	});
});

describe("assets", () => {
	it("lists assets with filters", async () => {
		const fetchMock = stubFetch({ body: [assetWire()] });

		const assets = await client().listAssets({ status: "active", assetClass: "us_equity" });

		expect(requestAt(fetchMock).url).toBe(`${BASE}/v2/assets?status=active&asset_class=us_equity`);
		expect(assets).toHaveLength(1);
		expect(assets[0]?.assetClass).toBe("us_equity");
		expect(assets[0]?.easyToBorrow).toBe(true);
	});

	it("maps 404 to ASSET_NOT_FOUND", async () => {
		stubFetch({ status: 404, body: { code: 40410000, message: "asset not found" } });

		const error = await client()
			.getAsset("ZZZZ")
			.catch((caught: unknown) => caught);

		expect(error).toBeInstanceOf(VendorError);
		expect(error).toMatchObject({ family: "assets", status: 404, code: "ASSET_NOT_FOUND" });
	});
});

describe("orders", () => {
	it("places an order with decimal strings on the wire", async () => {
		const fetchMock = stubFetch({ body: orderWire() });

		const order = await client().placeOrder({
			symbol: "AAPL",
			qty: 10,
			side: "buy",
			type: "limit",
			timeInForce: "day",
			limitPrice: 150.25,
		});

		const sent = requestAt(fetchMock);
		expect(sent.url).toBe(`${BASE}/v2/orders`);
		expect(sent.method).toBe("POST");
		expect(sent.body).toEqual({
			symbol: "AAPL",
			qty: "10",
			side: "buy",
			type: "limit",
			time_in_force: "day",
			limit_price: "150.25",
		});
		expect(order.qty).toBe(10);
		expect(order.limitPrice).toBe(150.25);
		expect(order.filledQty).toBe(0);
		expect(order.orderClass).toBe("simple");
		expect(order.legs).toEqual([]);
		expect(order.filledAt).toBeUndefined();
	});

	it("sends bracket legs", async () => {
		const fetchMock = stubFetch({ body: orderWire({ order_class: "bracket" }) });

		await client().placeOrder({
			symbol: "AAPL",
			qty: 10,
			side: "buy",
			type: "market",
			timeInForce: "gtc",
			orderClass: "bracket",
			takeProfit: { limitPrice: 160 },
			stopLoss: { stopPrice: 140, limitPrice: 139.5 },
		});

		expect(requestAt(fetchMock).body).toMatchObject({
			order_class: "bracket",
			take_profit: { limit_price: "160" },
			stop_loss: { stop_price: "140", limit_price: "139.5" },
		});
	});

	it("rejects an inconsistent order before any request", async () => {
		const fetchMock = stubFetch({ body: orderWire() });

		await expect(
			client().placeOrder({ symbol: "AAPL", qty: 1, side: "buy", type: "limit", timeInForce: "day" }),
		).rejects.toBeInstanceOf(ValidationError);
		expect(fetchMock).not.toHaveBeenCalled();
	});

	it("lists orders with query parameters", async () => {
		const fetchMock = stubFetch({ body: [orderWire(), orderWire({ id: "second", qty: 5 })] });

		const orders = await client().listOrders({ status: "all", limit: 50, symbols: ["AAPL", "MSFT"], nested: true });

		expect(requestAt(fetchMock).url).toBe(
			`${BASE}/v2/orders?status=all&limit=50&nested=true&symbols=AAPL%2CMSFT`,
		);
		expect(orders.map((order) => order.qty)).toEqual([10, 5]);
	});

	it("decodes nested legs", async () => {
		stubFetch({
			body: orderWire({ order_class: "bracket", legs: [orderWire({ id: "leg-1", type: "stop", stop_price: 140 })] }),
		});

		const order = await client().getOrder("61e69015");

		expect(order.legs).toHaveLength(1);
		expect(order.legs[0]?.id).toBe("leg-1");
		expect(order.legs[0]?.stopPrice).toBe(140);
	});

	it("looks orders up by client order ID", async () => {
		const fetchMock = stubFetch({ body: orderWire() });

		await client().getOrderByClientId("my-order-1");

		expect(requestAt(fetchMock).url).toBe(`${BASE}/v2/orders:by_client_order_id?client_order_id=my-order-1`);
	});

	it("replaces an order with PATCH", async () => {
		const fetchMock = stubFetch({ body: orderWire({ id: "replacement", replaces: "original" }) });

		const order = await client().replaceOrder("original", { limitPrice: 151, qty: 12 });

		const sent = requestAt(fetchMock);
		expect(sent.url).toBe(`${BASE}/v2/orders/original`);
		expect(sent.method).toBe("PATCH");
		expect(sent.body).toEqual({ qty: "12", limit_price: "151" });
		expect(order.replaces).toBe("original");
	});

	it("cancels an order and ignores the empty body", async () => {
		const fetchMock = stubFetch({ status: 204 });

		await expect(client().cancelOrder("61e69015")).resolves.toBeUndefined();

		expect(requestAt(fetchMock)).toMatchObject({ url: `${BASE}/v2/orders/61e69015`, method: "DELETE" });
	});

	it("maps 422 on cancel to UNPROCESSABLE", async () => {
		stubFetch({ status: 422, body: { message: "order is not cancelable" } });

		await expect(client().cancelOrder("61e69015")).rejects.toMatchObject({
			code: "UNPROCESSABLE",
			body: '{"message":"order is not cancelable"}',
		});
	});

	it("reports each cancellation of a bulk cancel", async () => {
		stubFetch({
			status: 207,
			body: [
				{ id: "a", status: 200, body: orderWire({ id: "a", status: "pending_cancel" }) },
				{ id: "b", status: 500, body: { message: "failed" } },
			],
		});

		const results = await client().cancelAllOrders();

		expect(results).toHaveLength(2);
		expect(results[0]?.order?.status).toBe("pending_cancel");
		expect(results[1]).toEqual({ id: "b", status: 500, order: undefined });
	});

	it("raises SerializationError for a body that does not match", async () => {
		stubFetch({ body: { id: "no-other-fields" } });

		await expect(client().getOrder("no-other-fields")).rejects.toBeInstanceOf(SerializationError);
	});
});

describe("positions", () => {
	it("normalizes string-encoded numbers", async () => {
		stubFetch({ body: [positionWire(), positionWire({ symbol: "MSFT", qty: -3, side: "short" })] });

		const positions = await client().listOpenPositions();

		expect(positions.map((position) => position.qty)).toEqual([10, -3]);
		expect(positions[0]?.avgEntryPrice).toBe(148.5);
		expect(positions[1]?.side).toBe("short");
	});

	it("maps 404 to POSITION_NOT_FOUND", async () => {
		stubFetch({ status: 404, body: { message: "position does not exist" } });

		await expect(client().getOpenPosition("TSLA")).rejects.toMatchObject({ code: "POSITION_NOT_FOUND" });
	});

	it("closes part of a position by percentage", async () => {
		const fetchMock = stubFetch({ body: orderWire({ side: "sell", type: "market", limit_price: null }) });

		const order = await client().closePosition("AAPL", { percentage: 50 });

		expect(requestAt(fetchMock)).toMatchObject({
			url: `${BASE}/v2/positions/AAPL?percentage=50`,
			method: "DELETE",
		});
		expect(order.side).toBe("sell");
	});

	it("rejects qty with percentage before any request", async () => {
		const fetchMock = stubFetch({ body: orderWire() });

		await expect(client().closePosition("AAPL", { qty: 1, percentage: 50 })).rejects.toBeInstanceOf(
			ValidationError,
		);
		expect(fetchMock).not.toHaveBeenCalled();
	});

	it("closes all positions and cancels orders", async () => {
		const fetchMock = stubFetch({ body: [{ symbol: "AAPL", status: 200, body: orderWire({ side: "sell" }) }] });

		const results = await client().closeAllPositions({ cancelOrders: true });

		expect(requestAt(fetchMock).url).toBe(`${BASE}/v2/positions?cancel_orders=true`);
		expect(results[0]?.id).toBe("AAPL");
		expect(results[0]?.order?.side).toBe("sell");
	});
});

describe("watchlists", () => {
	it("creates a watchlist", async () => {
		const fetchMock = stubFetch({ body: watchlistWire() });

		const watchlist = await client().createWatchlist("tech", ["AAPL"]);

		expect(requestAt(fetchMock)).toMatchObject({
			url: `${BASE}/v2/watchlists`,
			method: "POST",
			body: { name: "tech", symbols: ["AAPL"] },
		});
		expect(watchlist.assets[0]?.symbol).toBe("AAPL");
	});

	it("treats null assets as an empty list", async () => {
		stubFetch({ body: [watchlistWire({ assets: null })] });

		const [watchlist] = await client().listWatchlists();

		expect(watchlist?.assets).toEqual([]);
	});

	it("updates with PUT and only the given fields", async () => {
		const fetchMock = stubFetch({ body: watchlistWire({ name: "renamed" }) });

		await client().updateWatchlist("3174d6df", { name: "renamed" });

		expect(requestAt(fetchMock)).toMatchObject({
			url: `${BASE}/v2/watchlists/3174d6df`,
			method: "PUT",
			body: { name: "renamed" },
		});
	});

	it("adds and removes symbols", async () => {
		const fetchMock = stubFetch({ body: watchlistWire() }, { body: watchlistWire({ assets: [] }) });
		const trading = client();

		await trading.addAssetToWatchlist("3174d6df", "AAPL");
		const after = await trading.removeAssetFromWatchlist("3174d6df", "AAPL");

		expect(requestAt(fetchMock, 0)).toMatchObject({
			url: `${BASE}/v2/watchlists/3174d6df`,
			method: "POST",
			body: { symbol: "AAPL" },
		});
		expect(requestAt(fetchMock, 1)).toMatchObject({
			url: `${BASE}/v2/watchlists/3174d6df/AAPL`,
			method: "DELETE",
		});
		expect(after.assets).toEqual([]);
	});

	it("deletes a watchlist", async () => {
		const fetchMock = stubFetch({ status: 204 });

		await client().deleteWatchlist("3174d6df");

		expect(requestAt(fetchMock).method).toBe("DELETE");
	});

	it("maps 404 to WATCHLIST_NOT_FOUND", async () => {
		stubFetch({ status: 404, body: { message: "not found" } });

		await expect(client().getWatchlist("missing")).rejects.toMatchObject({ code: "WATCHLIST_NOT_FOUND" });
	});
});

describe("account", () => {
	it("decodes the account", async () => {
		stubFetch({
			body: {
				id: "abe25343",
				account_number: "PA3ABCDEF",
				status: "ACTIVE",
				currency: "USD",
				cash: "10000.5",
				portfolio_value: "25000",
				buying_power: "40000",
				regt_buying_power: "40000",
				daytrading_buying_power: "0",
				daytrade_count: 0,
				pattern_day_trader: false,
				trading_blocked: false,
				transfers_blocked: false,
				account_blocked: false,
				trade_suspended_by_user: false,
				shorting_enabled: true,
				long_market_value: "15000",
				short_market_value: "0",
				equity: "25000",
				last_equity: "24800",
				multiplier: "2",
				initial_margin: "7500",
				maintenance_margin: "4500",
				sma: "0",
				created_at: "2024-01-01T00:00:00Z",
			},
		});

		const account = await client().getAccount();

		expect(account.cash).toBe(10000.5);
		expect(account.multiplier).toBe(2);
		expect(account.accountNumber).toBe("PA3ABCDEF");
	});

	it("maps 401 to UNAUTHORIZED", async () => {
		stubFetch({ status: 401, body: { message: "unauthorized." } });

		await expect(client().getAccount()).rejects.toMatchObject({ code: "UNAUTHORIZED", family: "account" });
	});

	it("decodes the clock", async () => {
		stubFetch({
			body: {
				timestamp: "2024-03-04T10:00:00-05:00",
				is_open: true,
				next_open: "2024-03-05T09:30:00-05:00",
				next_close: "2024-03-04T16:00:00-05:00",
			},
		});

		const clock = await client().getClock();

		expect(clock).toEqual({
			timestamp: "2024-03-04T10:00:00-05:00",
			isOpen: true,
			nextOpen: "2024-03-05T09:30:00-05:00",
			nextClose: "2024-03-04T16:00:00-05:00",
		});
	});
});
