import { ProtocolError } from "@tickline/domain";
import { describe, expect, it } from "vitest";
import { z } from "zod";
import { decodeMessages } from "../src/codec.js";
import { decodeTagged, parseJsonFrame } from "../src/tagged.js";

const InnerSchema = z.discriminatedUnion("event", [
  z.object({ event: z.literal("new") }),
  z.object({ event: z.literal("fill"), price: z.number() }),
]);

const OuterSchema = z.discriminatedUnion("stream", [
  z.object({ stream: z.literal("listening"), data: z.object({ streams: z.array(z.string()) }) }),
  z.object({ stream: z.literal("trade_updates"), data: InnerSchema }),
]);

function protocolErrorOf(fn: () => unknown): ProtocolError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ProtocolError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a ProtocolError");
}

describe("decodeTagged", () => {
  it("selects the variant by its tag", () => {
    expect(decodeTagged(OuterSchema, { stream: "listening", data: { streams: ["trade_updates"] } })).toEqual({
      stream: "listening",
      data: { streams: ["trade_updates"] },
    });
  });

  it("reports an unknown outer tag", () => {
    const error = protocolErrorOf(() => decodeTagged(OuterSchema, { stream: "account_updates", data: {} }));
    expect(error.kind).toBe("UNKNOWN_VARIANT");
    expect(error.tag).toBe("account_updates");
  });

  it("reports an unknown nested tag", () => {
    const error = protocolErrorOf(() =>
      decodeTagged(OuterSchema, { stream: "trade_updates", data: { event: "teleported" } })
    );
    expect(error.kind).toBe("UNKNOWN_VARIANT");
    expect(error.tag).toBe("teleported");
    expect(error.message).toBe('Unknown data.event "teleported"');
  });

  it("reports a missing tag as an invalid payload", () => {
    const error = protocolErrorOf(() => decodeTagged(OuterSchema, { data: {} }));
    expect(error.kind).toBe("INVALID_PAYLOAD");
  });

  it("reports wrong fields under a known tag as an invalid payload", () => {
    const error = protocolErrorOf(() =>
      decodeTagged(OuterSchema, { stream: "trade_updates", data: { event: "fill", price: "x" } })
    );
    expect(error.kind).toBe("INVALID_PAYLOAD");
    expect(error.message).toContain("data.price");
  });
});

describe("parseJsonFrame", () => {
  it("reports bad JSON as a malformed frame", () => {
    const error = protocolErrorOf(() => parseJsonFrame("{"));
    expect(error.kind).toBe("MALFORMED_FRAME");
  });
});

describe("decodeMessages", () => {
  it("decodes arrays message by message", () => {
    const results = decodeMessages(InnerSchema, [{ event: "new" }, { event: "bogus" }, { event: "fill", price: 2 }]);
    expect(results.map((result) => result.ok)).toEqual([true, false, true]);
  });

  it("treats a single object as a one-message frame", () => {
    expect(decodeMessages(InnerSchema, { event: "new" })).toEqual([{ ok: true, value: { event: "new" } }]);
  });
});
