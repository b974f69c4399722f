/**
 * ClientError hierarchy — structured classification for everything the
 * client layer can fail with.
 *
 * Each error carries a category (retryable, non-retryable, fatal). The client
 * itself never retries; callers read the category to decide.
 */

/** Severity categories consulted by caller-side retry policies. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

type ErrorContext = Record<string, unknown> & { readonly cause?: unknown };

function splitCause(context: ErrorContext): {
	cause: unknown;
	rest: Record<string, unknown>;
} {
	const { cause, ...rest } = context;
	return { cause, rest };
}

/** Base class for every error the client hands back. */
export class ClientError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;

	constructor(message: string, code: string, category: ErrorCategory, context: ErrorContext = {}) {
		super(message);
		const { cause, rest } = splitCause(context);
		this.name = "ClientError";
		this.code = code;
		this.category = category;
		this.context = rest;
		if (cause !== undefined) this.cause = cause;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Construction-time errors ─────────────────────────────────────────

/** Malformed or already-claimed secret material. Raised once, when an Authenticator is built. */
export class CredentialError extends ClientError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CREDENTIAL_ERROR", ErrorCategory.Fatal, context);
		this.name = "CredentialError";
	}
}

/** Invalid or missing configuration. */
export class ConfigError extends ClientError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, context);
		this.name = "ConfigError";
	}
}

// ── Transport errors ─────────────────────────────────────────────────

/** The call could not be made at all. Never produced from an HTTP status alone. */
export abstract class TransportError extends ClientError {
	abstract readonly kind: "network" | "encoding";
}

/** Connection refused, reset, DNS failure, or any other failure to exchange bytes. */
export class NetworkError extends TransportError {
	override readonly kind = "network" as const;

	constructor(message: string, context: ErrorContext = {}, code = "NETWORK_ERROR") {
		super(message, code, ErrorCategory.Retryable, context);
		this.name = "NetworkError";
	}
}

/** The bounded wait for a response or a handshake elapsed. */
export class TimeoutError extends NetworkError {
	readonly timeoutMs: number;

	constructor(message: string, timeoutMs: number, context: ErrorContext = {}) {
		super(message, context, "TIMEOUT_ERROR");
		this.name = "TimeoutError";
		this.timeoutMs = timeoutMs;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), timeoutMs: this.timeoutMs };
	}
}

/** The outgoing request could not be serialized. Not retried. */
export class EncodingError extends TransportError {
	override readonly kind = "encoding" as const;

	constructor(message: string, context: ErrorContext = {}) {
		super(message, "ENCODING_ERROR", ErrorCategory.NonRetryable, context);
		this.name = "EncodingError";
	}
}

// ── Response errors ──────────────────────────────────────────────────

/** The response body did not match the expected structure. Carries the raw payload. */
export class DecodeError extends ClientError {
	readonly raw: string;
	readonly status: number;

	constructor(message: string, raw: string, status: number, context: ErrorContext = {}) {
		super(message, "DECODE_ERROR", ErrorCategory.NonRetryable, context);
		this.name = "DecodeError";
		this.raw = raw;
		this.status = status;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), status: this.status, raw: this.raw };
	}
}

/** The exchange answered with a structured business error (non-2xx). */
export class ApiError extends ClientError {
	readonly status: number;
	readonly exchangeCode: string | number | undefined;
	readonly raw: string;

	constructor(
		message: string,
		status: number,
		exchangeCode: string | number | undefined,
		raw: string,
		context: ErrorContext = {},
	) {
		super(
			message,
			"API_ERROR",
			status >= 500 ? ErrorCategory.Retryable : ErrorCategory.NonRetryable,
			context,
		);
		this.name = "ApiError";
		this.status = status;
		this.exchangeCode = exchangeCode;
		this.raw = raw;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			status: this.status,
			...(this.exchangeCode !== undefined && { exchangeCode: this.exchangeCode }),
		};
	}
}

/** HTTP 429 or 418 from the exchange; `retryAfterMs` is taken from `Retry-After` when present. */
export class RateLimitError extends ClientError {
	readonly status: number;
	readonly retryAfterMs: number | undefined;

	constructor(
		message: string,
		status: number,
		retryAfterMs: number | undefined,
		context: ErrorContext = {},
	) {
		super(message, "RATE_LIMIT_ERROR", ErrorCategory.Retryable, context);
		this.name = "RateLimitError";
		this.status = status;
		this.retryAfterMs = retryAfterMs;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			status: this.status,
			...(this.retryAfterMs !== undefined && { retryAfterMs: this.retryAfterMs }),
		};
	}
}

// ── Connection-internal errors ───────────────────────────────────────

/** Read, write or heartbeat failure on a managed socket. Recovered by reconnecting. */
export class ConnectionError extends ClientError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CONNECTION_ERROR", ErrorCategory.Retryable, context);
		this.name = "ConnectionError";
	}
}

// ── Classification helper ────────────────────────────────────────────

const NETWORK_CODES = new Set([
	"ECONNREFUSED",
	"ECONNRESET",
	"ENOTFOUND",
	"EAI_AGAIN",
	"EPIPE",
	"EHOSTUNREACH",
	"UND_ERR_SOCKET",
	"UND_ERR_CONNECT_TIMEOUT",
]);

function codeOf(value: unknown): string | undefined {
	if (typeof value === "object" && value !== null && "code" in value) {
		return typeof value.code === "string" ? value.code : undefined;
	}
	return undefined;
}

function errnoCode(error: Error): string | undefined {
	return codeOf(error) ?? codeOf(error.cause);
}

/**
 * Map anything thrown by `fetch`, `ws` or user code into a ClientError.
 * ClientErrors pass through untouched.
 */
export function classifyError(error: unknown, timeoutMs?: number): ClientError {
	if (error instanceof ClientError) return error;
	if (error instanceof Error) {
		if (error.name === "TimeoutError" || error.name === "AbortError") {
			return new TimeoutError(error.message, timeoutMs ?? 0, { cause: error });
		}
		const code = errnoCode(error);
		if (code === "ETIMEDOUT") {
			return new TimeoutError(error.message, timeoutMs ?? 0, { cause: error, errno: code });
		}
		if (code !== undefined && NETWORK_CODES.has(code)) {
			return new NetworkError(error.message, { cause: error, errno: code });
		}
		const msg = error.message.toLowerCase();
		if (msg.includes("timed out") || msg.includes("timeout")) {
			return new TimeoutError(error.message, timeoutMs ?? 0, { cause: error });
		}
		return new NetworkError(error.message, { cause: error });
	}
	return new NetworkError(String(error), { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

export function isTransportError(e: unknown): e is TransportError {
	return e instanceof TransportError;
}

export function isNetworkError(e: unknown): e is NetworkError {
	return e instanceof NetworkError;
}

export function isDecodeError(e: unknown): e is DecodeError {
	return e instanceof DecodeError;
}

export function isApiError(e: unknown): e is ApiError {
	return e instanceof ApiError;
}

export function isRateLimitError(e: unknown): e is RateLimitError {
	return e instanceof RateLimitError;
}

export function isCredentialError(e: unknown): e is CredentialError {
	return e instanceof CredentialError;
}
