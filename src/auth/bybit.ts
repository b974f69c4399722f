/**
 * Bybit v5 header signing.
 *
 * Signed string: timestamp + apiKey + recvWindow + (query for GET/DELETE,
 * JSON body otherwise). A body-less POST is sent and signed as `{}`.
 */

import type { ConfigError, CredentialError } from "../shared/errors.js";
import { type Result, ok } from "../shared/result.js";
import { encodeQuery } from "../http/request-spec.js";
import type { RequestSpec } from "../http/types.js";
import { BaseAuthenticator } from "./authenticator.js";
import { hmacSha256Hex } from "./hmac.js";
import type { SignedRequest } from "./types.js";

export const BYBIT_DEFAULT_RECV_WINDOW_MS = 5_000;

export class BybitAuthenticator extends BaseAuthenticator {
	override readonly scheme = "bybit" as const;
	override readonly apiKeyHeader = "X-BAPI-API-KEY";

	protected override signFull(
		spec: RequestSpec,
		timestampMs: number,
		body: string | undefined,
	): SignedRequest {
		const recvWindow = String(this.recvWindowMs ?? BYBIT_DEFAULT_RECV_WINDOW_MS);
		const readOnly = spec.method === "GET" || spec.method === "DELETE";
		const finalBody = readOnly ? body : (body ?? "{}");
		const payload = readOnly ? encodeQuery(spec.query) : (finalBody ?? "");
		const canonical = `${timestampMs}${this.material.apiKey}${recvWindow}${payload}`;
		return {
			spec,
			headers: {
				"X-BAPI-API-KEY": this.material.apiKey,
				"X-BAPI-SIGN": hmacSha256Hex(this.material.secret, canonical),
				"X-BAPI-TIMESTAMP": String(timestampMs),
				"X-BAPI-RECV-WINDOW": recvWindow,
			},
			query: spec.query,
			body: finalBody,
			canonical,
		};
	}

	/** `{"op":"auth","args":[apiKey, expires, signature]}` for private streams. */
	override buildWsAuthMessage(expiresMs: number): Result<string, ConfigError | CredentialError> {
		const usable = this.checkUsable();
		if (!usable.ok) return usable;
		const expires = Math.trunc(expiresMs);
		const signature = hmacSha256Hex(this.material.secret, `GET/realtime${expires}`);
		return ok(JSON.stringify({ op: "auth", args: [this.material.apiKey, expires, signature] }));
	}
}
