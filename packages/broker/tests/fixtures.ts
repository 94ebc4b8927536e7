/**
 * Wire-format fixtures shared by the broker tests
 */

export function orderWire(overrides: Record<string, unknown> = {}): Record<string, unknown> {
	return {
		id: "61e69015-8549-4bfd-b9c3-01e75843f47d",
		client_order_id: "eb9e2aaa-f71a-4f51-b5b4-52a6c565dad4",
		created_at: "2024-03-04T14:30:00.000Z",
		updated_at: "2024-03-04T14:30:00.100Z",
		submitted_at: "2024-03-04T14:30:00.050Z",
		filled_at: null,
		expired_at: null,
		canceled_at: null,
		failed_at: null,
		replaced_at: null,
		replaced_by: null,
		replaces: null,
		asset_id: "b0b6dd9d-8b9b-48a9-ba46-b9d54906e415",
		symbol: "AAPL",
		asset_class: "us_equity",
		notional: null,
		qty: "10",
		filled_qty: "0",
		filled_avg_price: null,
		order_class: "",
		type: "limit",
		side: "buy",
		time_in_force: "day",
		limit_price: "150.25",
		stop_price: null,
		status: "new",
		extended_hours: false,
		legs: null,
		trail_percent: null,
		trail_price: null,
		hwm: null,
		...overrides,
	};
}

export function assetWire(overrides: Record<string, unknown> = {}): Record<string, unknown> {
	return {
		id: "b0b6dd9d-8b9b-48a9-ba46-b9d54906e415",
		class: "us_equity",
		exchange: "NASDAQ",
		symbol: "AAPL",
		name: "Apple Inc. Common Stock",
		status: "active",
		tradable: true,
		marginable: true,
		shortable: true,
		easy_to_borrow: true,
		fractionable: true,
		...overrides,
	};
}

export function positionWire(overrides: Record<string, unknown> = {}): Record<string, unknown> {
	return {
		asset_id: "b0b6dd9d-8b9b-48a9-ba46-b9d54906e415",
		symbol: "AAPL",
		exchange: "NASDAQ",
		asset_class: "us_equity",
		avg_entry_price: "148.5",
		qty: "10",
		qty_available: "10",
		side: "long",
		market_value: "1502.5",
		cost_basis: "1485",
		unrealized_pl: "17.5",
		unrealized_plpc: "0.0117845",
		unrealized_intraday_pl: "2.5",
		unrealized_intraday_plpc: "0.0016667",
		current_price: "150.25",
		lastday_price: "150",
		change_today: "0.0016667",
		...overrides,
	};
}

export function watchlistWire(overrides: Record<string, unknown> = {}): Record<string, unknown> {
	return {
		id: "3174d6df-7726-44b4-a5bd-7fda5ae6e009",
		account_id: "abe25343-a7ba-4255-bdeb-f7e013e9ee5d",
		name: "tech",
		created_at: "2024-03-01T10:00:00Z",
		updated_at: "2024-03-02T10:00:00Z",
		assets: [assetWire()],
		...overrides,
	};
}
