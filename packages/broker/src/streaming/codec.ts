import { decode, encode } from "@msgpack/msgpack";
import { ProtocolError } from "@tickline/domain";
import { createJsonCodec, decodeMessages, type FrameCodec } from "@tickline/transport";
import {
  type TradeUpdatesAction,
  type TradeUpdatesResponse,
  TradeUpdatesResponseSchema,
} from "./messages.js";

export type TradeUpdatesCodecName = "json" | "msgpack";

export type TradeUpdatesCodec = FrameCodec<TradeUpdatesAction, TradeUpdatesResponse>;

/**
 * JSON codec. The trade stream expects actions in binary frames.
 */
export const jsonCodec: TradeUpdatesCodec = createJsonCodec<TradeUpdatesAction, TradeUpdatesResponse>(
  TradeUpdatesResponseSchema,
  { binary: true }
);

export const msgpackCodec: TradeUpdatesCodec = {
  encode(action) {
    return Buffer.from(encode(action));
  },
  decode(data) {
    let payload: unknown;
    try {
      payload = decode(data);
    } catch (error) {
      throw new ProtocolError("Frame is not valid MessagePack", "MALFORMED_FRAME", { cause: error });
    }
    return decodeMessages(TradeUpdatesResponseSchema, payload);
  },
};

export const CODECS: Record<TradeUpdatesCodecName, TradeUpdatesCodec> = {
  json: jsonCodec,
  msgpack: msgpackCodec,
};

/** Upgrade headers each codec needs the server to see */
export const CODEC_HEADERS: Record<TradeUpdatesCodecName, Record<string, string>> = {
  json: {},
  msgpack: { "Content-Type": "application/msgpack" },
};
