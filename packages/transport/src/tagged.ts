/**
 * Tagged-union decoding
 *
 * Vendor frames are JSON objects whose variant is named by one field
 * ("T" for market data, "stream" and then "event" for order updates).
 * Schemas are built with `z.discriminatedUnion` so an unrecognized tag is
 * reported as such instead of as a generic shape mismatch.
 */

import { ProtocolError } from "@tickline/domain";
import { z } from "zod";

function valueAt(value: unknown, path: (string | number)[]): unknown {
  let current = value;
  for (const key of path) {
    if (typeof current !== "object" || current === null) {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Decode one message against a discriminated-union schema
 *
 * @throws {ProtocolError} UNKNOWN_VARIANT when a discriminant names no
 *   known variant, INVALID_PAYLOAD for any other mismatch
 */
export function decodeTagged<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  for (const issue of result.error.issues) {
    if (issue.code !== z.ZodIssueCode.invalid_union_discriminator) {
      continue;
    }
    const tag = valueAt(value, issue.path);
    if (typeof tag === "string") {
      throw new ProtocolError(
        `Unknown ${issue.path.join(".")} "${tag}"`,
        "UNKNOWN_VARIANT",
        { tag, cause: result.error }
      );
    }
  }

  throw new ProtocolError(`Invalid payload: ${describeIssues(result.error)}`, "INVALID_PAYLOAD", {
    cause: result.error,
  });
}

/**
 * Parse a JSON text frame, reporting bad JSON as a malformed frame
 */
export function parseJsonFrame(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ProtocolError("Frame is not valid JSON", "MALFORMED_FRAME", { cause: error });
  }
}
