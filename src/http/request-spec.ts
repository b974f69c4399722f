/**
 * RequestSpec construction and wire encoding.
 */

import { EncodingError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import {
	AuthRequirement,
	type BodyEncoding,
	type HttpMethod,
	type QueryPair,
	type QueryValue,
	type RequestSpec,
} from "./types.js";

export interface RequestSpecInit {
	readonly method?: HttpMethod;
	readonly path: string;
	/** Object keys keep insertion order; `undefined` values are skipped. */
	readonly query?:
		| Readonly<Record<string, QueryValue | undefined>>
		| readonly (readonly [string, QueryValue])[];
	readonly body?: unknown;
	readonly auth?: AuthRequirement;
}

type QueryInit = NonNullable<RequestSpecInit["query"]>;

function isPairList(query: QueryInit): query is readonly (readonly [string, QueryValue])[] {
	return Array.isArray(query);
}

function toPairs(query: RequestSpecInit["query"]): QueryPair[] {
	if (query === undefined) return [];
	const entries: ReadonlyArray<readonly [string, QueryValue | undefined]> = isPairList(query)
		? query
		: Object.entries(query);
	const pairs: QueryPair[] = [];
	for (const [key, value] of entries) {
		if (value !== undefined) pairs.push([key, String(value)]);
	}
	return pairs;
}

/**
 * Build a frozen RequestSpec. Defaults: GET, no auth.
 *
 * @example
 * ```ts
 * requestSpec({ path: "/api/v3/account", query: { symbol: "BTCUSDT" }, auth: "sign" });
 * ```
 */
export function requestSpec(init: RequestSpecInit): RequestSpec {
	const query = Object.freeze(toPairs(init.query).map((pair) => Object.freeze(pair)));
	return Object.freeze({
		method: init.method ?? "GET",
		path: init.path,
		query,
		...(init.body !== undefined && { body: init.body }),
		auth: init.auth ?? AuthRequirement.None,
	});
}

export function requiresAuth(spec: RequestSpec): boolean {
	return spec.auth !== AuthRequirement.None;
}

/** `k=v&k2=v2` in the given order, form-urlencoded. */
export function encodeQuery(pairs: readonly QueryPair[]): string {
	const params = new URLSearchParams();
	for (const [key, value] of pairs) params.append(key, value);
	return params.toString();
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
	const proto: unknown = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

function encodeForm(body: unknown): Result<string, EncodingError> {
	if (!isPlainObject(body)) {
		return err(new EncodingError("Form bodies must be flat objects", { type: typeof body }));
	}
	const pairs: QueryPair[] = [];
	for (const [key, value] of Object.entries(body)) {
		if (value === undefined) continue;
		if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
			pairs.push([key, String(value)]);
			continue;
		}
		return err(new EncodingError(`Form field "${key}" is not a scalar`, { field: key }));
	}
	return ok(encodeQuery(pairs));
}

function encodeJson(body: unknown): Result<string, EncodingError> {
	try {
		const text = JSON.stringify(body);
		if (text === undefined) {
			return err(new EncodingError("Body has no JSON representation", { type: typeof body }));
		}
		return ok(text);
	} catch (e) {
		const reason = e instanceof Error ? e.message : String(e);
		return err(
			new EncodingError(`Body could not be serialized: ${reason}`, {
				cause: e,
			}),
		);
	}
}

/** Serialize the body. `ok(undefined)` when the request has none. */
export function encodeBody(
	spec: RequestSpec,
	encoding: BodyEncoding,
): Result<string | undefined, EncodingError> {
	if (spec.body === undefined) return ok(undefined);
	return encoding === "form" ? encodeForm(spec.body) : encodeJson(spec.body);
}

export const CONTENT_TYPES: Readonly<Record<BodyEncoding, string>> = {
	json: "application/json",
	form: "application/x-www-form-urlencoded",
};

/** Join a base URL, path and encoded query. Fails on a base URL that does not parse. */
export function buildUrl(
	baseUrl: string,
	path: string,
	query: readonly QueryPair[],
): Result<string, EncodingError> {
	let url: URL;
	try {
		url = new URL(path, baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`);
	} catch (e) {
		return err(new EncodingError(`Invalid URL: ${baseUrl} + ${path}`, { cause: e }));
	}
	const encoded = encodeQuery(query);
	url.search = encoded;
	return ok(url.toString());
}
