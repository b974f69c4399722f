import { describe, expect, it } from "vitest";
import { EncodingError } from "../shared/errors.js";
import { buildUrl, encodeBody, encodeQuery, requestSpec, requiresAuth } from "./request-spec.js";

describe("requestSpec", () => {
	it("defaults to an unauthenticated GET", () => {
		const spec = requestSpec({ path: "/api/v3/time" });
		expect(spec).toEqual({ method: "GET", path: "/api/v3/time", query: [], auth: "none" });
		expect(requiresAuth(spec)).toBe(false);
	});

	it("keeps object key order and stringifies values", () => {
		const spec = requestSpec({
			path: "/api/v3/klines",
			query: { symbol: "BTCUSDT", interval: "1m", limit: 500, skip: undefined, closed: true },
		});
		expect(spec.query).toEqual([
			["symbol", "BTCUSDT"],
			["interval", "1m"],
			["limit", "500"],
			["closed", "true"],
		]);
	});

	it("accepts ordered pairs, duplicates included", () => {
		const spec = requestSpec({
			path: "/x",
			query: [
				["b", 1],
				["a", 2],
				["b", 3],
			],
		});
		expect(spec.query).toEqual([
			["b", "1"],
			["a", "2"],
			["b", "3"],
		]);
	});

	it("is frozen", () => {
		const spec = requestSpec({ path: "/x", query: { a: 1 }, auth: "sign" });
		expect(Object.isFrozen(spec)).toBe(true);
		expect(Object.isFrozen(spec.query)).toBe(true);
		expect(requiresAuth(spec)).toBe(true);
		expect(requiresAuth(requestSpec({ path: "/x", auth: "key" }))).toBe(true);
	});
});

describe("encodeQuery", () => {
	it("form-encodes reserved characters", () => {
		expect(
			encodeQuery([
				["symbols", '["BTCUSDT","ETHUSDT"]'],
				["note", "a b&c"],
			]),
		).toBe("symbols=%5B%22BTCUSDT%22%2C%22ETHUSDT%22%5D&note=a+b%26c");
	});

	it("is empty for no pairs", () => {
		expect(encodeQuery([])).toBe("");
	});
});

describe("encodeBody", () => {
	it("returns undefined without a body", () => {
		expect(encodeBody(requestSpec({ path: "/x" }), "json")).toEqual({ ok: true, value: undefined });
	});

	it("serializes JSON", () => {
		const spec = requestSpec({ method: "POST", path: "/x", body: { symbol: "BTC-USDT", size: 1 } });
		expect(encodeBody(spec, "json")).toEqual({
			ok: true,
			value: '{"symbol":"BTC-USDT","size":1}',
		});
	});

	it("serializes flat objects as a form", () => {
		const spec = requestSpec({
			method: "POST",
			path: "/x",
			body: { symbol: "BTCUSDT", quantity: 0.5, reduceOnly: false, skipped: undefined },
		});
		expect(encodeBody(spec, "form")).toEqual({
			ok: true,
			value: "symbol=BTCUSDT&quantity=0.5&reduceOnly=false",
		});
	});

	it("rejects nested form fields", () => {
		const spec = requestSpec({ method: "POST", path: "/x", body: { filters: { a: 1 } } });
		const result = encodeBody(spec, "form");
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.message).toBe('Form field "filters" is not a scalar');
	});

	it("rejects circular structures", () => {
		const body: Record<string, unknown> = {};
		body["self"] = body;
		const result = encodeBody(requestSpec({ method: "POST", path: "/x", body }), "json");
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error).toBeInstanceOf(EncodingError);
	});

	it("rejects BigInt values", () => {
		const spec = requestSpec({ method: "POST", path: "/x", body: { n: 10n } });
		const result = encodeBody(spec, "json");
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.kind).toBe("encoding");
	});
});

describe("buildUrl", () => {
	it("joins base, path and query", () => {
		expect(
			buildUrl("https://api.example.test", "/api/v3/depth", [["symbol", "BTCUSDT"]]),
		).toEqual({ ok: true, value: "https://api.example.test/api/v3/depth?symbol=BTCUSDT" });
	});

	it("omits the question mark without a query", () => {
		expect(buildUrl("https://api.example.test/", "/ping", [])).toEqual({
			ok: true,
			value: "https://api.example.test/ping",
		});
	});

	it("fails on a base that does not parse", () => {
		const result = buildUrl("not a url", "/ping", []);
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error).toBeInstanceOf(EncodingError);
	});
});
