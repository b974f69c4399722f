/**
 * Query-string signing used by Binance and MEXC: the timestamp (and
 * recvWindow) join the query, the HMAC-SHA256 hex of `query + body` is
 * appended as `signature`, and the key travels in a header.
 */

import { encodeQuery } from "../http/request-spec.js";
import type { QueryPair, RequestSpec } from "../http/types.js";
import { BaseAuthenticator } from "./authenticator.js";
import { hmacSha256Hex } from "./hmac.js";
import type { SignedRequest } from "./types.js";

abstract class QuerySignatureAuthenticator extends BaseAuthenticator {
	protected override signFull(
		spec: RequestSpec,
		timestampMs: number,
		body: string | undefined,
	): SignedRequest {
		const query: QueryPair[] = [...spec.query, ["timestamp", String(timestampMs)]];
		if (this.recvWindowMs !== undefined) {
			query.push(["recvWindow", String(this.recvWindowMs)]);
		}
		const canonical = encodeQuery(query) + (body ?? "");
		const signature = hmacSha256Hex(this.material.secret, canonical);
		return {
			spec,
			headers: { [this.apiKeyHeader]: this.material.apiKey },
			query: [...query, ["signature", signature]],
			body,
			canonical,
		};
	}
}

export class BinanceAuthenticator extends QuerySignatureAuthenticator {
	override readonly scheme = "binance" as const;
	override readonly apiKeyHeader = "X-MBX-APIKEY";
}

export class MexcAuthenticator extends QuerySignatureAuthenticator {
	override readonly scheme = "mexc" as const;
	override readonly apiKeyHeader = "X-MEXC-APIKEY";
}
