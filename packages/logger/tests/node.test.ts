/**
 * Node Logger Tests
 */

import { describe, expect, it } from "vitest";
import { createNodeLogger, mergeRedactPaths, withConnectionContext } from "../src/index.js";

function captureStream(): { lines: Record<string, unknown>[]; write(msg: string): void } {
  const lines: Record<string, unknown>[] = [];
  return {
    lines,
    write(msg: string) {
      const line: Record<string, unknown> = JSON.parse(msg);
      lines.push(line);
    },
  };
}

describe("createNodeLogger", () => {
  it("stamps service, environment and severity", () => {
    const stream = captureStream();
    const log = createNodeLogger({
      service: "broker",
      environment: "PAPER",
      pretty: false,
      destination: stream,
    });

    log.info({ path: "/v2/orders" }, "Order submitted");

    expect(stream.lines).toHaveLength(1);
    const line = stream.lines[0];
    expect(line?.service).toBe("broker");
    expect(line?.environment).toBe("PAPER");
    expect(line?.severity).toBe("INFO");
    expect(line?.msg).toBe("Order submitted");
    expect(line?.path).toBe("/v2/orders");
    expect(typeof line?.timestamp).toBe("string");
  });

  it("redacts credentials at the top level and one level down", () => {
    const stream = captureStream();
    const log = createNodeLogger({ service: "test", pretty: false, destination: stream });

    log.info({ keyId: "test-key", auth: { secret: "test-secret" } }, "Authenticating");

    expect(stream.lines[0]?.keyId).toBe("[REDACTED]");
    expect(stream.lines[0]?.auth).toEqual({ secret: "[REDACTED]" });
  });

  it("redacts extra paths alongside the defaults", () => {
    const stream = captureStream();
    const log = createNodeLogger({
      service: "test",
      pretty: false,
      destination: stream,
      redactPaths: ["token"],
    });

    log.info({ token: "test-token", secretKey: "test-secret", symbol: "AAPL" }, "Request");

    expect(stream.lines[0]?.token).toBe("[REDACTED]");
    expect(stream.lines[0]?.secretKey).toBe("[REDACTED]");
    expect(stream.lines[0]?.symbol).toBe("AAPL");
  });

  it("leaves pid and hostname off each line", () => {
    const stream = captureStream();
    const log = createNodeLogger({ service: "test", pretty: false, destination: stream });

    log.info("ready");

    expect(stream.lines[0]).not.toHaveProperty("pid");
    expect(stream.lines[0]).not.toHaveProperty("hostname");
  });

  it("respects the configured level", () => {
    const stream = captureStream();
    const log = createNodeLogger({ service: "test", level: "warn", pretty: false, destination: stream });

    log.info("dropped");
    log.warn("kept");

    expect(stream.lines.map((line) => line.msg)).toEqual(["kept"]);
  });

  it("binds connection context on child loggers", () => {
    const stream = captureStream();
    const log = createNodeLogger({ service: "test", pretty: false, destination: stream });
    const child = withConnectionContext(log, { url: "ws://localhost:1234", connectionId: "c-1" });

    child.info("Socket opened");

    expect(stream.lines[0]?.url).toBe("ws://localhost:1234");
    expect(stream.lines[0]?.connectionId).toBe("c-1");
  });
});

describe("mergeRedactPaths", () => {
  it("deduplicates extra paths against the defaults", () => {
    const paths = mergeRedactPaths(["keyId", "password"]);

    expect(paths.filter((path) => path === "keyId")).toHaveLength(1);
    expect(paths).toContain("password");
  });
});
