/**
 * HTTP request and response types.
 */

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE" | "PATCH";

/** How much of the authenticator a request needs. */
export const AuthRequirement = {
	None: "none",
	/** API-key header only. */
	Key: "key",
	/** Full signature. */
	Sign: "sign",
} as const;

export type AuthRequirement = (typeof AuthRequirement)[keyof typeof AuthRequirement];

export type QueryValue = string | number | boolean;

export type QueryPair = readonly [key: string, value: string];

/** One logical call. Query order is preserved on the wire and in the signature. */
export interface RequestSpec {
	readonly method: HttpMethod;
	readonly path: string;
	readonly query: readonly QueryPair[];
	readonly body?: unknown;
	readonly auth: AuthRequirement;
}

export const BodyEncoding = {
	Json: "json",
	/** application/x-www-form-urlencoded */
	Form: "form",
} as const;

export type BodyEncoding = (typeof BodyEncoding)[keyof typeof BodyEncoding];

export interface ResponseEnvelope {
	readonly status: number;
	/** Lower-cased header names. */
	readonly headers: Readonly<Record<string, string>>;
	readonly body: Uint8Array;
	/** Body decoded as UTF-8. */
	text(): string;
}

/** What the pipeline hands to the transport. */
export interface TransportRequest {
	readonly method: HttpMethod;
	readonly url: string;
	readonly headers: Readonly<Record<string, string>>;
	readonly body: string | undefined;
	readonly timeoutMs: number;
}

export interface TransportResponse {
	readonly status: number;
	readonly headers: Readonly<Record<string, string>>;
	readonly body: Uint8Array;
}

/**
 * The wire. Throws on connection failure or timeout; the pipeline
 * classifies whatever it throws.
 */
export interface HttpTransport {
	send(request: TransportRequest): Promise<TransportResponse>;
}
