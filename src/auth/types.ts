/**
 * Auth bounded context — type definitions.
 */

import type { ConfigError, CredentialError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import type { QueryPair, RequestSpec } from "../http/types.js";

/** Raw key material before it is sealed into Credentials. */
export interface ApiKeySet {
	readonly apiKey: string;
	readonly secret: string;
	/** Required by KuCoin only. */
	readonly passphrase?: string;
}

/** Signing schemes, one per supported exchange family. */
export const AuthScheme = {
	Binance: "binance",
	Mexc: "mexc",
	Bybit: "bybit",
	Kucoin: "kucoin",
} as const;

export type AuthScheme = (typeof AuthScheme)[keyof typeof AuthScheme];

export interface SignedRequest {
	readonly spec: RequestSpec;
	readonly headers: Readonly<Record<string, string>>;
	/** Final query, including any timestamp and signature parameters. */
	readonly query: readonly QueryPair[];
	/** Final body text; some schemes substitute an empty JSON object. */
	readonly body: string | undefined;
	/** The exact string that was signed; undefined for key-only requests. */
	readonly canonical: string | undefined;
}

export interface AuthenticatorOptions {
	/** Sent as the scheme's recv-window parameter when set. */
	readonly recvWindowMs?: number;
}

/**
 * Applies one exchange's signing scheme. Owns its Credentials exclusively;
 * output depends only on the RequestSpec, the body text and the timestamp.
 */
export interface Authenticator {
	readonly scheme: AuthScheme;
	/** Header carrying the API key. */
	readonly apiKeyHeader: string;
	sign(
		spec: RequestSpec,
		timestampMs: number,
		body?: string,
	): Result<SignedRequest, CredentialError>;
	/** Login frame for private WebSocket streams, where the scheme has one. */
	buildWsAuthMessage(expiresMs: number): Result<string, ConfigError | CredentialError>;
	/** Zero-fills the secret. Later signing attempts fail. */
	dispose(): void;
}
