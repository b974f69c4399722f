/**
 * KuCoin key-version 2 signing: base64 HMAC-SHA256 over
 * timestamp + METHOD + path[?query] + body, with the passphrase itself
 * HMAC-signed under the same secret.
 */

import { encodeQuery } from "../http/request-spec.js";
import type { RequestSpec } from "../http/types.js";
import { BaseAuthenticator } from "./authenticator.js";
import { hmacSha256Base64 } from "./hmac.js";
import type { SignedRequest } from "./types.js";

export class KucoinAuthenticator extends BaseAuthenticator {
	override readonly scheme = "kucoin" as const;
	override readonly apiKeyHeader = "KC-API-KEY";

	protected override signFull(
		spec: RequestSpec,
		timestampMs: number,
		body: string | undefined,
	): SignedRequest {
		const query = encodeQuery(spec.query);
		const endpoint = query.length > 0 ? `${spec.path}?${query}` : spec.path;
		const canonical = `${timestampMs}${spec.method}${endpoint}${body ?? ""}`;
		const passphrase = this.material.passphrase ?? Buffer.alloc(0);
		return {
			spec,
			headers: {
				"KC-API-KEY": this.material.apiKey,
				"KC-API-SIGN": hmacSha256Base64(this.material.secret, canonical),
				"KC-API-TIMESTAMP": String(timestampMs),
				"KC-API-PASSPHRASE": hmacSha256Base64(this.material.secret, passphrase),
				"KC-API-KEY-VERSION": "2",
			},
			query: spec.query,
			body,
			canonical,
		};
	}
}
