/**
 * Client Error Classes
 *
 * Every failure the client reports is a `ClientError`. Subclasses separate
 * where the failure happened so callers can branch on `instanceof`:
 *
 * | Class                | Raised when                                          |
 * |----------------------|------------------------------------------------------|
 * | TransportError       | connect, read or write on the network failed         |
 * | ProtocolError        | a socket frame could not be decoded                  |
 * | VendorError          | the vendor answered with a non-success status         |
 * | SerializationError   | a REST body was not JSON or did not match its schema |
 * | ValidationError      | arguments were rejected before anything was sent     |
 *
 * Nothing is retried internally; errors always reach the immediate caller.
 */

import type { ResourceFamily, VendorErrorCode } from "./status-codes.js";

// ============================================
// Base Error Class
// ============================================

export interface ClientErrorOptions {
	cause?: unknown;
}

/**
 * Base class for all client errors
 */
export class ClientError extends Error {
	/** Machine-readable code, refined by each subclass */
	readonly code: string;

	constructor(message: string, code: string, options: ClientErrorOptions = {}) {
		super(message, { cause: options.cause });
		this.name = this.constructor.name;
		this.code = code;

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Convert to JSON for logging
	 */
	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			cause: this.cause instanceof Error ? this.cause.message : this.cause,
		};
	}
}

// ============================================
// Specific Error Classes
// ============================================

/**
 * Network-level failure (connect refused, socket closed, write failed)
 */
export class TransportError extends ClientError {
	constructor(message: string, options: ClientErrorOptions = {}) {
		super(message, "TRANSPORT_ERROR", options);
	}
}

export type ProtocolErrorKind = "UNKNOWN_VARIANT" | "MALFORMED_FRAME" | "INVALID_PAYLOAD";

/**
 * A socket frame that could not be decoded into a known message
 *
 * - UNKNOWN_VARIANT: the discriminant names no known message
 * - MALFORMED_FRAME: the frame is not valid JSON or MessagePack
 * - INVALID_PAYLOAD: the discriminant is known but the fields are wrong
 */
export class ProtocolError extends ClientError {
	readonly kind: ProtocolErrorKind;

	/** Offending discriminant value, when one was present */
	readonly tag?: string;

	constructor(
		message: string,
		kind: ProtocolErrorKind,
		options: ClientErrorOptions & { tag?: string } = {},
	) {
		super(message, kind, options);
		this.kind = kind;
		this.tag = options.tag;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), kind: this.kind, tag: this.tag };
	}
}

/**
 * The vendor rejected the request
 *
 * `code` is the name the resource family's status table gives `status`.
 */
export class VendorError extends ClientError {
	readonly family: ResourceFamily;
	readonly status: number;

	/** Response body text, when the vendor sent one */
	readonly body?: string;

	constructor(
		family: ResourceFamily,
		status: number,
		code: VendorErrorCode,
		options: ClientErrorOptions & { body?: string } = {},
	) {
		super(`${family} request failed with ${status} ${code}`, code, options);
		this.family = family;
		this.status = status;
		this.body = options.body;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), family: this.family, status: this.status, body: this.body };
	}
}

/**
 * A REST response body that is not JSON or does not match its schema
 */
export class SerializationError extends ClientError {
	constructor(message: string, options: ClientErrorOptions = {}) {
		super(message, "SERIALIZATION_ERROR", options);
	}
}

/**
 * Arguments rejected locally, before any network call
 */
export class ValidationError extends ClientError {
	/** Argument that was invalid */
	readonly field?: string;

	constructor(message: string, options: ClientErrorOptions & { field?: string } = {}) {
		super(message, "VALIDATION_ERROR", options);
		this.field = options.field;
	}
}

// ============================================
// Type Guards
// ============================================

export function isClientError(error: unknown): error is ClientError {
	return error instanceof ClientError;
}

export function isVendorError(error: unknown, code?: VendorErrorCode): error is VendorError {
	return error instanceof VendorError && (code === undefined || error.code === code);
}
