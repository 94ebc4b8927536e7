/**
 * REST request function
 *
 * Low-level HTTP access with authentication headers, status mapping and
 * response validation. Every endpoint module builds on the `RequestFn`
 * returned here; none of them talk to `fetch` directly.
 */

import {
  type ResourceFamily,
  SerializationError,
  TransportError,
  VendorError,
  vendorErrorCode,
} from "@tickline/domain";
import type { Logger } from "@tickline/logger";
import { z } from "zod";
import { log as defaultLog } from "./logger.js";

export interface HttpClientConfig {
  keyId: string;
  secretKey: string;
  /** e.g. https://paper-api.alpaca.markets */
  baseUrl: string;
  logger?: Logger;
}

export type QueryValue = string | number | boolean | undefined | null | readonly string[];

export interface RequestOptions {
  /** Resource family whose status table applies to an error response */
  family: ResourceFamily;
  query?: Record<string, QueryValue>;
  body?: unknown;
  signal?: AbortSignal;
}

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

/**
 * Issue a request and decode the body with `schema`. Endpoints whose body
 * is irrelevant pass `IgnoredBody`.
 */
export type RequestFn = <T>(
  method: HttpMethod,
  path: string,
  options: RequestOptions,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
) => Promise<T>;

export const IgnoredBody = z.unknown();

/**
 * Serialize query parameters, dropping absent values and joining lists
 * with commas
 */
export function buildQuery(query: Record<string, QueryValue> | undefined): string {
  if (!query) {
    return "";
  }
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined || value === null) {
      continue;
    }
    if (Array.isArray(value)) {
      if (value.length > 0) {
        params.set(key, value.join(","));
      }
      continue;
    }
    params.set(key, String(value));
  }
  const encoded = params.toString();
  return encoded ? `?${encoded}` : "";
}

function parseBody<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, path: string): T {
  let json: unknown;
  try {
    json = text ? JSON.parse(text) : undefined;
  } catch (error) {
    throw new SerializationError(`Response from ${path} is not valid JSON`, { cause: error });
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    const detail = result.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new SerializationError(`Unexpected response from ${path}: ${detail}`, {
      cause: result.error,
    });
  }
  return result.data;
}

export function createRequestFn(config: HttpClientConfig): RequestFn {
  const { keyId, secretKey, baseUrl } = config;
  const logger = config.logger ?? defaultLog;

  return async function request<T>(
    method: HttpMethod,
    path: string,
    options: RequestOptions,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const { family, query, body, signal } = options;
    const url = `${baseUrl}${path}${buildQuery(query)}`;
    const headers: Record<string, string> = {
      "APCA-API-KEY-ID": keyId,
      "APCA-API-SECRET-KEY": secretKey,
    };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    const startTime = Date.now();
    logger.debug({ method, path, family }, "API request");

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal,
      });
      text = await response.text();
    } catch (error) {
      const latencyMs = Date.now() - startTime;
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ method, path, error: message, latencyMs }, "API network error");
      throw new TransportError(`Network error on ${method} ${path}: ${message}`, { cause: error });
    }

    const latencyMs = Date.now() - startTime;

    if (!response.ok) {
      const code = vendorErrorCode(family, response.status);
      logger.error({ method, path, status: response.status, code, latencyMs }, "API error");
      throw new VendorError(family, response.status, code, { body: text || undefined });
    }

    logger.debug({ method, path, status: response.status, latencyMs }, "API response");

    return parseBody(text, schema, path);
  };
}
