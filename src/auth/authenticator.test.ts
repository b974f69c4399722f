import { createHmac } from "node:crypto";
import { describe, expect, it } from "vitest";
import { requestSpec } from "../http/request-spec.js";
import { ConfigError, CredentialError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { createCredentials } from "./credentials.js";
import { createAuthenticator } from "./factory.js";
import type { ApiKeySet, AuthScheme, Authenticator, AuthenticatorOptions } from "./types.js";

const TS = 1_700_000_000_000;

function hex(secret: string, message: string): string {
	return createHmac("sha256", secret).update(message).digest("hex");
}

function b64(secret: string, message: string): string {
	return createHmac("sha256", secret).update(message).digest("base64");
}

function build(
	scheme: AuthScheme,
	keys: ApiKeySet = { apiKey: "k1", secret: "s1", passphrase: "p1" },
	options: AuthenticatorOptions = {},
): Authenticator {
	const result = createAuthenticator(scheme, createCredentials(keys), options);
	if (!result.ok) throw result.error;
	return result.value;
}

function unwrap<T, E>(result: Result<T, E>): T {
	if (!result.ok) throw new Error("expected ok");
	return result.value;
}

describe("createAuthenticator", () => {
	it("refuses to build a second authenticator over the same credentials", () => {
		const creds = createCredentials({ apiKey: "k1", secret: "s1" });
		expect(createAuthenticator("binance", creds).ok).toBe(true);

		const second = createAuthenticator("bybit", creds);
		expect(second.ok).toBe(false);
		if (!second.ok) expect(second.error).toBeInstanceOf(CredentialError);
	});

	it("requires a passphrase for kucoin only", () => {
		const keys = { apiKey: "k1", secret: "s1" };
		expect(createAuthenticator("kucoin", createCredentials(keys)).ok).toBe(false);
		expect(createAuthenticator("mexc", createCredentials(keys)).ok).toBe(true);
	});

	it("exposes the scheme and key header", () => {
		expect(build("binance").apiKeyHeader).toBe("X-MBX-APIKEY");
		expect(build("mexc").apiKeyHeader).toBe("X-MEXC-APIKEY");
		expect(build("bybit").apiKeyHeader).toBe("X-BAPI-API-KEY");
		expect(build("kucoin").scheme).toBe("kucoin");
	});
});

describe("query-signature schemes (binance, mexc)", () => {
	const account = requestSpec({ path: "/account", query: { symbol: "BTCUSD" }, auth: "sign" });

	it("signs query plus timestamp and appends the signature", () => {
		const signed = unwrap(build("binance").sign(account, TS));

		const canonical = `symbol=BTCUSD&timestamp=${TS}`;
		expect(signed.canonical).toBe(canonical);
		expect(signed.headers).toEqual({ "X-MBX-APIKEY": "k1" });
		expect(signed.query).toEqual([
			["symbol", "BTCUSD"],
			["timestamp", String(TS)],
			["signature", hex("s1", canonical)],
		]);
	});

	it("produces the known digest for k1/s1 at 1700000000000", () => {
		const signed = unwrap(build("binance").sign(account, TS));
		expect(signed.query.at(-1)).toEqual([
			"signature",
			"53dad2d19a149f54767d511fd49aa1afe55245c6e87458f6e4f0b8f9ddfceafe",
		]);
	});

	it("is deterministic for the same spec and timestamp", () => {
		const auth = build("binance");
		expect(unwrap(auth.sign(account, TS))).toEqual(unwrap(auth.sign(account, TS)));
	});

	it("changes the signature when the query changes", () => {
		const auth = build("binance");
		const eth = requestSpec({ path: "/account", query: { symbol: "ETHUSD" }, auth: "sign" });
		const btcSig = unwrap(auth.sign(account, TS)).query.at(-1);
		const ethSig = unwrap(auth.sign(eth, TS)).query.at(-1);
		expect(btcSig).not.toEqual(ethSig);
	});

	it("adds recvWindow before signing and covers the body", () => {
		const auth = build("mexc", { apiKey: "k1", secret: "s1" }, { recvWindowMs: 5_000 });
		const order = requestSpec({ method: "POST", path: "/api/v3/order", auth: "sign" });
		const body = "symbol=BTCUSDT&side=BUY";

		const signed = unwrap(auth.sign(order, TS, body));

		const canonical = `timestamp=${TS}&recvWindow=5000${body}`;
		expect(signed.canonical).toBe(canonical);
		expect(signed.body).toBe(body);
		expect(signed.headers).toEqual({ "X-MEXC-APIKEY": "k1" });
		expect(signed.query.at(-1)).toEqual(["signature", hex("s1", canonical)]);
	});

	it("truncates fractional timestamps", () => {
		const signed = unwrap(build("binance").sign(account, TS + 0.7));
		expect(signed.query[1]).toEqual(["timestamp", String(TS)]);
	});
});

describe("auth requirement", () => {
	it("key-only requests carry just the key header", () => {
		const spec = requestSpec({ path: "/api/v3/userDataStream", method: "POST", auth: "key" });
		const signed = unwrap(build("binance").sign(spec, TS));

		expect(signed.headers).toEqual({ "X-MBX-APIKEY": "k1" });
		expect(signed.query).toEqual([]);
		expect(signed.canonical).toBeUndefined();
	});

	it("no-auth requests pass through untouched", () => {
		const spec = requestSpec({ path: "/api/v3/time" });
		const signed = unwrap(build("kucoin").sign(spec, TS));

		expect(signed.headers).toEqual({});
		expect(signed.query).toBe(spec.query);
	});
});

describe("bybit", () => {
	it("signs timestamp, key, window and query for GET", () => {
		const spec = requestSpec({
			path: "/v5/account/wallet-balance",
			query: { accountType: "UNIFIED" },
			auth: "sign",
		});
		const signed = unwrap(build("bybit").sign(spec, TS));

		const canonical = `${TS}k15000accountType=UNIFIED`;
		expect(signed.canonical).toBe(canonical);
		expect(signed.headers).toEqual({
			"X-BAPI-API-KEY": "k1",
			"X-BAPI-SIGN": hex("s1", canonical),
			"X-BAPI-TIMESTAMP": String(TS),
			"X-BAPI-RECV-WINDOW": "5000",
		});
		expect(signed.query).toEqual([["accountType", "UNIFIED"]]);
	});

	it("signs the JSON body for POST and sends {} when there is none", () => {
		const auth = build("bybit", { apiKey: "k1", secret: "s1" }, { recvWindowMs: 10_000 });
		const spec = requestSpec({ method: "POST", path: "/v5/order/cancel-all", auth: "sign" });

		const signed = unwrap(auth.sign(spec, TS));

		expect(signed.body).toBe("{}");
		expect(signed.canonical).toBe(`${TS}k110000{}`);
	});

	it("builds the private-stream login frame", () => {
		const frame = unwrap(build("bybit").buildWsAuthMessage(TS + 1_000));
		expect(JSON.parse(frame)).toEqual({
			op: "auth",
			args: ["k1", TS + 1_000, hex("s1", `GET/realtime${TS + 1_000}`)],
		});
	});

	it("other schemes have no login frame", () => {
		const result = build("binance").buildWsAuthMessage(TS);
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error).toBeInstanceOf(ConfigError);
	});
});

describe("kucoin", () => {
	it("signs method, path, query and body in base64 and signs the passphrase", () => {
		const spec = requestSpec({
			method: "POST",
			path: "/api/v1/orders",
			query: { tradeType: "TRADE" },
			auth: "sign",
		});
		const body = '{"symbol":"BTC-USDT"}';
		const signed = unwrap(build("kucoin").sign(spec, TS, body));

		const canonical = `${TS}POST/api/v1/orders?tradeType=TRADE${body}`;
		expect(signed.canonical).toBe(canonical);
		expect(signed.headers).toEqual({
			"KC-API-KEY": "k1",
			"KC-API-SIGN": b64("s1", canonical),
			"KC-API-TIMESTAMP": String(TS),
			"KC-API-PASSPHRASE": b64("s1", "p1"),
			"KC-API-KEY-VERSION": "2",
		});
	});

	it("omits the question mark without a query", () => {
		const spec = requestSpec({ path: "/api/v1/accounts", auth: "sign" });
		expect(unwrap(build("kucoin").sign(spec, TS)).canonical).toBe(`${TS}GET/api/v1/accounts`);
	});
});

describe("dispose", () => {
	it("makes later signing fail", () => {
		const auth = build("binance");
		auth.dispose();

		const spec = requestSpec({ path: "/account", auth: "sign" });
		const result = auth.sign(spec, TS);
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.message).toBe("Credentials have been disposed");
	});

	it("makes the login frame fail", () => {
		const auth = build("bybit");
		auth.dispose();
		const result = auth.buildWsAuthMessage(TS);
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error).toBeInstanceOf(CredentialError);
	});
});
