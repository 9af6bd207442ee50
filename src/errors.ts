/**
 * Typed error classes for the networking core.
 */

/** Base class for all networking-core errors. */
export class NetcodeError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "NetcodeError";
	}
}

/** Local misconfiguration, raised synchronously before any socket is opened. */
export class ConfigError extends NetcodeError {
	constructor(
		public readonly field: string,
		reason: string
	) {
		super(`Invalid config "${field}": ${reason}`);
		this.name = "ConfigError";
	}
}

export type DecodeErrorReason =
	| "malformed"
	| "missing-field"
	| "invalid-field"
	| "unknown-type"
	| "decrypt-failed"
	| "oversized";

/** A single inbound frame could not be turned into a typed message. Never fatal. */
export class DecodeError extends NetcodeError {
	constructor(
		public readonly reason: DecodeErrorReason,
		message: string,
		public readonly tag?: string
	) {
		super(message);
		this.name = "DecodeError";
	}
}

/** Transport-level failure (connect refused, reset, timeout, handshake rejected). */
export class ConnectionError extends NetcodeError {
	constructor(
		message: string,
		public readonly cause?: Error
	) {
		super(cause ? `${message}: ${cause.message}` : message);
		this.name = "ConnectionError";
	}
}

/** Every reconnect attempt failed; the session stays Failed until the caller acts. */
export class ReconnectExhaustedError extends NetcodeError {
	constructor(
		public readonly attempts: number,
		public readonly lastError?: Error
	) {
		super(
			`Reconnect gave up after ${attempts} attempt${attempts === 1 ? "" : "s"}` +
				(lastError ? `: ${lastError.message}` : "")
		);
		this.name = "ReconnectExhaustedError";
	}
}

/** Operation called in a connection state that does not allow it. */
export class InvalidStateError extends NetcodeError {
	constructor(operation: string, state: string) {
		super(`Cannot ${operation} while ${state}`);
		this.name = "InvalidStateError";
	}
}

/**
 * Normalizes anything thrown into an Error.
 */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}
