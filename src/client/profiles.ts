/**
 * Exchange profiles — the per-exchange facts the generic client needs:
 * endpoints, signing scheme, body encoding, error-body shape and stream
 * dialects. Endpoint catalogs and response types stay with the caller.
 */

import type { Authenticator } from "../auth/types.js";
import { AuthScheme } from "../auth/types.js";
import type { RequestPipeline } from "../http/request-pipeline.js";
import { requestSpec } from "../http/request-spec.js";
import { BodyEncoding, type RequestSpec } from "../http/types.js";
import { parseJson, validate, z } from "../lib/validation/index.js";
import { type ClientError, ConfigError, DecodeError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { binanceProtocol } from "../websocket/protocols/binance.js";
import { bybitProtocol } from "../websocket/protocols/bybit.js";
import { kucoinProtocol } from "../websocket/protocols/kucoin.js";
import { mexcProtocol } from "../websocket/protocols/mexc.js";
import type { UrlResolver, WsProtocol } from "../websocket/types.js";

export const ExchangeName = {
	Binance: "binance",
	Bybit: "bybit",
	Mexc: "mexc",
	Kucoin: "kucoin",
} as const;

export type ExchangeName = (typeof ExchangeName)[keyof typeof ExchangeName];

export interface Endpoint {
	readonly mainnet: string;
	/** Absent when the exchange runs no public testnet. */
	readonly testnet?: string;
}

/** `code` / `message` as the exchange reported them. */
export interface ExchangeErrorBody {
	readonly code: string | number | undefined;
	readonly message: string;
}

export interface StreamContext {
	readonly authenticator: Authenticator | undefined;
	readonly pipeline: RequestPipeline;
	readonly clock: Clock;
	readonly testnet: boolean;
}

export interface StreamProfile {
	/** Needs credentials; the protocol logs in on every open. */
	readonly requiresAuth: boolean;
	url(context: StreamContext): Result<string | UrlResolver, ConfigError>;
	protocol(context: StreamContext): WsProtocol;
}

export interface ServerTimeProbe {
	readonly spec: RequestSpec;
	/** Extracts the server time in ms from the decoded body. */
	readonly schema: z.ZodType<number, z.ZodTypeDef, unknown>;
}

export interface ExchangeProfile {
	readonly name: ExchangeName;
	readonly scheme: AuthScheme;
	readonly rest: Endpoint;
	readonly bodyEncoding: BodyEncoding;
	readonly streams: Readonly<Record<string, StreamProfile>>;
	readonly serverTime: ServerTimeProbe;
	/** Exchange error shape inside a non-2xx body. */
	parseError(body: unknown): ExchangeErrorBody | undefined;
	/** Business error reported inside a 2xx body, for exchanges that do that. */
	embeddedError?(body: unknown): ExchangeErrorBody | undefined;
}

export function pickEndpoint(
	endpoint: Endpoint,
	testnet: boolean,
	what: string,
): Result<string, ConfigError> {
	if (!testnet) return ok(endpoint.mainnet);
	if (endpoint.testnet === undefined) {
		return err(new ConfigError(`${what} has no testnet endpoint`, { mainnet: endpoint.mainnet }));
	}
	return ok(endpoint.testnet);
}

function staticStream(
	endpoint: Endpoint,
	protocol: (context: StreamContext) => WsProtocol,
	requiresAuth = false,
): StreamProfile {
	return {
		requiresAuth,
		url: (context) => pickEndpoint(endpoint, context.testnet, endpoint.mainnet),
		protocol,
	};
}

// ── Error bodies ────────────────────────────────────────────────────

const codeMsgBody = z.object({ code: z.union([z.number(), z.string()]), msg: z.string() });
const bybitBody = z.object({ retCode: z.number(), retMsg: z.string() });
const kucoinBody = z.object({ code: z.string(), msg: z.string().optional() });

function codeMsgError(body: unknown): ExchangeErrorBody | undefined {
	const parsed = validate(codeMsgBody, body);
	return parsed.ok ? { code: parsed.value.code, message: parsed.value.msg } : undefined;
}

function bybitError(body: unknown): ExchangeErrorBody | undefined {
	const parsed = validate(bybitBody, body);
	if (!parsed.ok || parsed.value.retCode === 0) return undefined;
	return { code: parsed.value.retCode, message: parsed.value.retMsg };
}

const KUCOIN_SUCCESS = "200000";

function kucoinError(body: unknown): ExchangeErrorBody | undefined {
	const parsed = validate(kucoinBody, body);
	if (!parsed.ok || parsed.value.code === KUCOIN_SUCCESS) return undefined;
	return { code: parsed.value.code, message: parsed.value.msg ?? `code ${parsed.value.code}` };
}

// ── KuCoin session endpoints ────────────────────────────────────────

const bulletResponse = z.object({
	code: z.literal(KUCOIN_SUCCESS),
	data: z.object({
		token: z.string().min(1),
		instanceServers: z.array(z.object({ endpoint: z.string().url() })).min(1),
	}),
});

/**
 * KuCoin hands out a token and server per session. Public streams fetch one
 * from `/api/v1/bullet-public`, private ones from `/api/v1/bullet-private`.
 */
function kucoinBullet(context: StreamContext, privateChannel: boolean): UrlResolver {
	const spec = requestSpec({
		method: "POST",
		path: privateChannel ? "/api/v1/bullet-private" : "/api/v1/bullet-public",
		auth: privateChannel ? "sign" : "none",
	});
	return async (): Promise<Result<string, ClientError>> => {
		const response = await context.pipeline.execute(spec);
		if (!response.ok) return response;
		const text = response.value.text();
		const bullet = parseJson(bulletResponse, text);
		if (!bullet.ok) {
			return err(
				new DecodeError("Unexpected bullet response", text, response.value.status, {
					cause: bullet.error,
				}),
			);
		}
		const [server] = bullet.value.data.instanceServers;
		if (server === undefined) {
			return err(new DecodeError("Bullet response lists no server", text, response.value.status));
		}
		const url = new URL(server.endpoint);
		url.searchParams.set("token", bullet.value.data.token);
		url.searchParams.set("connectId", String(context.clock.now()));
		return ok(url.toString());
	};
}

// ── Profiles ────────────────────────────────────────────────────────

const unixMs = z.number().int().nonnegative();

export const PROFILES: Readonly<Record<ExchangeName, ExchangeProfile>> = {
	binance: {
		name: "binance",
		scheme: AuthScheme.Binance,
		rest: { mainnet: "https://api.binance.com", testnet: "https://testnet.binance.vision" },
		bodyEncoding: BodyEncoding.Form,
		streams: {
			spot: staticStream(
				{
					mainnet: "wss://stream.binance.com:9443/stream",
					testnet: "wss://testnet.binance.vision/stream",
				},
				() => binanceProtocol(),
			),
			futures: staticStream(
				{
					mainnet: "wss://fstream.binance.com/stream",
					testnet: "wss://stream.binancefuture.com/stream",
				},
				() => binanceProtocol(),
			),
		},
		serverTime: {
			spec: requestSpec({ path: "/api/v3/time" }),
			schema: z.object({ serverTime: unixMs }).transform((b) => b.serverTime),
		},
		parseError: codeMsgError,
	},
	bybit: {
		name: "bybit",
		scheme: AuthScheme.Bybit,
		rest: { mainnet: "https://api.bybit.com", testnet: "https://api-testnet.bybit.com" },
		bodyEncoding: BodyEncoding.Json,
		streams: {
			spot: staticStream(
				{
					mainnet: "wss://stream.bybit.com/v5/public/spot",
					testnet: "wss://stream-testnet.bybit.com/v5/public/spot",
				},
				() => bybitProtocol(),
			),
			linear: staticStream(
				{
					mainnet: "wss://stream.bybit.com/v5/public/linear",
					testnet: "wss://stream-testnet.bybit.com/v5/public/linear",
				},
				() => bybitProtocol(),
			),
			private: staticStream(
				{
					mainnet: "wss://stream.bybit.com/v5/private",
					testnet: "wss://stream-testnet.bybit.com/v5/private",
				},
				(context) =>
					context.authenticator
						? bybitProtocol({ authenticator: context.authenticator })
						: bybitProtocol(),
				true,
			),
		},
		serverTime: {
			spec: requestSpec({ path: "/v5/market/time" }),
			schema: z.object({ time: unixMs }).transform((b) => b.time),
		},
		parseError: (body) => bybitError(body) ?? codeMsgError(body),
		embeddedError: bybitError,
	},
	mexc: {
		name: "mexc",
		scheme: AuthScheme.Mexc,
		rest: { mainnet: "https://api.mexc.com" },
		bodyEncoding: BodyEncoding.Form,
		streams: {
			spot: staticStream({ mainnet: "wss://wbs.mexc.com/ws" }, () => mexcProtocol()),
		},
		serverTime: {
			spec: requestSpec({ path: "/api/v3/time" }),
			schema: z.object({ serverTime: unixMs }).transform((b) => b.serverTime),
		},
		parseError: codeMsgError,
	},
	kucoin: {
		name: "kucoin",
		scheme: AuthScheme.Kucoin,
		rest: { mainnet: "https://api.kucoin.com" },
		bodyEncoding: BodyEncoding.Json,
		streams: {
			spot: {
				requiresAuth: false,
				url: (context) => ok(kucoinBullet(context, false)),
				protocol: () => kucoinProtocol(),
			},
			private: {
				requiresAuth: true,
				url: (context) => ok(kucoinBullet(context, true)),
				protocol: () => kucoinProtocol({ privateChannel: true }),
			},
		},
		serverTime: {
			spec: requestSpec({ path: "/api/v1/timestamp" }),
			schema: z.object({ code: z.literal(KUCOIN_SUCCESS), data: unixMs }).transform((b) => b.data),
		},
		parseError: (body) => kucoinError(body),
		embeddedError: kucoinError,
	},
};
