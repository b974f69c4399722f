import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { requestSpec } from "../http/request-spec.js";
import { createCredentials } from "./credentials.js";
import { createAuthenticator } from "./factory.js";
import type { AuthScheme, Authenticator } from "./types.js";

const schemes: AuthScheme[] = ["binance", "mexc", "bybit", "kucoin"];

function build(scheme: AuthScheme, secret: string): Authenticator {
	const result = createAuthenticator(
		scheme,
		createCredentials({ apiKey: "test-key", secret, passphrase: "test-passphrase" }),
	);
	if (!result.ok) throw result.error;
	return result.value;
}

const arbSecret = fc.stringMatching(/^[A-Za-z0-9]{1,40}$/);
const arbQuery = fc.array(fc.tuple(fc.stringMatching(/^[a-z]{1,8}$/), fc.string({ maxLength: 12 })), {
	maxLength: 5,
});
const arbTimestamp = fc.integer({ min: 1_500_000_000_000, max: 2_000_000_000_000 });

describe("signing properties", () => {
	it("same spec, credentials and timestamp give identical output", () => {
		fc.assert(
			fc.property(
				fc.constantFrom(...schemes),
				arbSecret,
				arbQuery,
				arbTimestamp,
				(scheme, secret, query, ts) => {
					const spec = requestSpec({ path: "/v1/private", query, auth: "sign" });
					const a = build(scheme, secret).sign(spec, ts);
					const b = build(scheme, secret).sign(spec, ts);
					expect(a).toEqual(b);
				},
			),
		);
	});

	it("no-auth specs never gain headers or query parameters", () => {
		fc.assert(
			fc.property(fc.constantFrom(...schemes), arbQuery, arbTimestamp, (scheme, query, ts) => {
				const spec = requestSpec({ path: "/v1/public", query });
				const signed = build(scheme, "test-secret").sign(spec, ts);
				expect(signed.ok).toBe(true);
				if (signed.ok) {
					expect(signed.value.headers).toEqual({});
					expect(signed.value.query).toEqual(spec.query);
				}
			}),
		);
	});

	it("a different timestamp changes the signed string", () => {
		fc.assert(
			fc.property(fc.constantFrom(...schemes), arbTimestamp, (scheme, ts) => {
				const spec = requestSpec({ path: "/v1/private", auth: "sign" });
				const auth = build(scheme, "test-secret");
				const a = auth.sign(spec, ts);
				const b = auth.sign(spec, ts + 1);
				expect(a.ok && b.ok && a.value.canonical !== b.value.canonical).toBe(true);
			}),
		);
	});
});
