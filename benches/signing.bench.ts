import { bench, describe } from "vitest";
import { createAuthenticator, createCredentials } from "../src/auth/index.js";
import type { Authenticator } from "../src/auth/types.js";
import { requestSpec } from "../src/http/request-spec.js";

function authenticator(scheme: "binance" | "bybit" | "kucoin"): Authenticator {
	const credentials = createCredentials({
		apiKey: "test-key",
		secret: "test-secret",
		passphrase: "test-passphrase",
	});
	const created = createAuthenticator(scheme, credentials);
	if (!created.ok) throw created.error;
	return created.value;
}

describe("request signing", () => {
	const query = requestSpec({
		path: "/api/v3/order",
		auth: "sign",
		query: { symbol: "BTCUSDT", side: "BUY", quantity: "0.01" },
	});
	const post = requestSpec({ method: "POST", path: "/v5/order/create", auth: "sign" });
	const body = '{"category":"spot","symbol":"BTCUSDT","side":"Buy","qty":"0.01"}';

	const binance = authenticator("binance");
	const bybit = authenticator("bybit");
	const kucoin = authenticator("kucoin");

	bench("query-signature sign 1000x", () => {
		for (let i = 0; i < 1000; i++) binance.sign(query, 1_700_000_000_000 + i);
	});

	bench("bybit header sign 1000x", () => {
		for (let i = 0; i < 1000; i++) bybit.sign(post, 1_700_000_000_000 + i, body);
	});

	bench("kucoin header sign 1000x", () => {
		for (let i = 0; i < 1000; i++) kucoin.sign(post, 1_700_000_000_000 + i, body);
	});
});
