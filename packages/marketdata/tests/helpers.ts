/**
 * Test Helpers for Marketdata Package
 */

import { vi } from "vitest";

export type FetchHandler = (url: URL, init: RequestInit | undefined) => Response | Promise<Response>;

/**
 * Replace global fetch with a mock that hands each request's URL to
 * `handler`. Undo with `vi.unstubAllGlobals()`.
 */
export function stubFetch(handler: FetchHandler) {
  const fetchMock = vi.fn(async (url: string, init?: RequestInit) => handler(new URL(url), init));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

/**
 * Create a mock JSON response.
 */
export function createJsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function tradeWire(price: number | string, overrides: Record<string, unknown> = {}) {
  return {
    t: "2024-03-04T14:30:00.123456789Z",
    x: "V",
    p: price,
    s: 100,
    c: ["@"],
    i: 52983525029461,
    z: "C",
    ...overrides,
  };
}

export function quoteWire(overrides: Record<string, unknown> = {}) {
  return {
    t: "2024-03-04T14:30:00.5Z",
    ax: "Q",
    ap: 150.3,
    as: 2,
    bx: "U",
    bp: "150.2",
    bs: 3,
    c: ["R"],
    z: "C",
    ...overrides,
  };
}

export function barWire(close: number, overrides: Record<string, unknown> = {}) {
  return {
    t: "2024-03-04T05:00:00Z",
    o: 149,
    h: 151,
    l: 148.5,
    c: close,
    v: 1200345,
    n: 1024,
    vw: 150.02,
    ...overrides,
  };
}
