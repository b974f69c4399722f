import { describe, expect, it } from "vitest";
import { andThen, err, isErr, isOk, map, mapErr, ok, tryCatch, unwrap, unwrapOr } from "./result.js";

describe("Result", () => {
	it("ok wraps a value", () => {
		const r = ok(42);
		expect(r.ok).toBe(true);
		if (r.ok) expect(r.value).toBe(42);
	});

	it("err wraps an error", () => {
		const r = err("boom");
		expect(r.ok).toBe(false);
		if (!r.ok) expect(r.error).toBe("boom");
	});

	it("isOk and isErr narrow", () => {
		expect(isOk(ok(1))).toBe(true);
		expect(isErr(ok(1))).toBe(false);
		expect(isErr(err("x"))).toBe(true);
	});

	it("map transforms only successes", () => {
		expect(map(ok(2), (n) => n * 3)).toEqual({ ok: true, value: 6 });
		expect(map(err("e"), (n: number) => n * 3)).toEqual({
			ok: false,
			error: "e",
		});
	});

	it("mapErr transforms only failures", () => {
		expect(mapErr(err("e"), (e) => `${e}!`)).toEqual({ ok: false, error: "e!" });
		expect(mapErr(ok(1), (e: string) => `${e}!`)).toEqual({ ok: true, value: 1 });
	});

	it("andThen short-circuits on the first failure", () => {
		const half = (n: number) => (n % 2 === 0 ? ok(n / 2) : err(`odd: ${n}`));
		expect(andThen(ok(8), half)).toEqual({ ok: true, value: 4 });
		expect(andThen(ok(3), half)).toEqual({ ok: false, error: "odd: 3" });
	});

	it("unwrap throws the carried Error", () => {
		const e = new Error("bad");
		expect(() => unwrap(err(e))).toThrow(e);
		expect(() => unwrap(err("plain"))).toThrow("plain");
		expect(unwrap(ok("v"))).toBe("v");
	});

	it("unwrapOr falls back on failure", () => {
		expect(unwrapOr(err("x"), 7)).toBe(7);
		expect(unwrapOr(ok(1), 7)).toBe(1);
	});

	it("tryCatch captures thrown values", () => {
		const r = tryCatch(() => JSON.parse("{"));
		expect(r.ok).toBe(false);
		const s = tryCatch(() => {
			throw "str";
		});
		if (!s.ok) expect(s.error.message).toBe("str");
	});
});
