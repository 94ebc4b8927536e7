import { ProtocolError } from "@tickline/domain";
import type { z } from "zod";
import type { FrameCodec, FrameResult } from "./socket-session.js";
import { decodeTagged, parseJsonFrame } from "./tagged.js";

/**
 * Decode a payload holding one message or an array of messages. Each
 * message succeeds or fails on its own.
 */
export function decodeMessages<R>(
  schema: z.ZodType<R, z.ZodTypeDef, unknown>,
  payload: unknown
): FrameResult<R>[] {
  const messages: unknown[] = Array.isArray(payload) ? payload : [payload];
  return messages.map((message): FrameResult<R> => {
    try {
      return { ok: true, value: decodeTagged(schema, message) };
    } catch (error) {
      if (error instanceof ProtocolError) {
        return { ok: false, error };
      }
      throw error;
    }
  });
}

export interface JsonCodecOptions {
  /** Send actions as binary frames holding UTF-8 JSON */
  binary?: boolean;
}

/**
 * JSON wire format: actions serialized with JSON.stringify, responses
 * decoded against a discriminated-union schema
 */
export function createJsonCodec<A, R>(
  schema: z.ZodType<R, z.ZodTypeDef, unknown>,
  options: JsonCodecOptions = {}
): FrameCodec<A, R> {
  return {
    encode(action) {
      const text = JSON.stringify(action);
      return options.binary ? Buffer.from(text, "utf-8") : text;
    },
    decode(data) {
      return decodeMessages(schema, parseJsonFrame(data.toString("utf-8")));
    },
  };
}
