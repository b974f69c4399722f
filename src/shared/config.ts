/**
 * Client configuration: request and connection defaults, zod validation,
 * and environment overrides.
 */

import { validate, z } from "../lib/validation/index.js";
import type { LogLevel } from "../lib/logger/index.js";
import { ConfigError } from "./errors.js";
import { Duration } from "./time.js";

export interface ClientConfig {
	/** Per-call timeout for HTTP requests. */
	readonly timeoutMs: number;
	/** Replay window sent with signed requests. */
	readonly recvWindowMs: number;
	readonly userAgent: string;
	/** Route requests and streams to the exchange's test environment. */
	readonly testnet: boolean;
	readonly logLevel: LogLevel | "silent";
}

export interface ReconnectionConfig {
	readonly baseDelayMs: number;
	readonly maxDelayMs: number;
	/** `Infinity` retries forever. */
	readonly maxAttempts: number;
	/** Fraction of the delay randomized, in [0, 1). */
	readonly jitterFactor: number;
}

export interface WsConnectionConfig {
	readonly handshakeTimeoutMs: number;
	/** Reconnect when no frame arrives within this window. 0 disables. */
	readonly idleTimeoutMs: number;
	/** Reconnect this long after each successful open. 0 disables. */
	readonly refreshAfterMs: number;
	/** Per-subscriber buffer cap with drop-oldest. 0 means unbounded. */
	readonly bufferSize: number;
	/** Socket-level ping interval. 0 disables client pings. */
	readonly pingIntervalMs: number;
	/** Terminate the socket when a ping goes unanswered this long. */
	readonly pongTimeoutMs: number;
	readonly reconnection: ReconnectionConfig;
}

export const CLIENT_VERSION = "0.1.0";

export const DEFAULT_CLIENT_CONFIG: ClientConfig = {
	timeoutMs: Duration.seconds(3),
	recvWindowMs: Duration.seconds(5),
	userAgent: `exchange-client/${CLIENT_VERSION}`,
	testnet: false,
	logLevel: "silent",
};

export const DEFAULT_RECONNECTION_CONFIG: ReconnectionConfig = {
	baseDelayMs: 300,
	maxDelayMs: Duration.seconds(30),
	maxAttempts: Number.POSITIVE_INFINITY,
	jitterFactor: 0,
};

export const DEFAULT_WS_CONFIG: WsConnectionConfig = {
	handshakeTimeoutMs: Duration.seconds(10),
	idleTimeoutMs: 0,
	refreshAfterMs: 0,
	bufferSize: 0,
	pingIntervalMs: Duration.seconds(30),
	pongTimeoutMs: Duration.seconds(10),
	reconnection: DEFAULT_RECONNECTION_CONFIG,
};

const logLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

const clientConfigSchema = z.object({
	timeoutMs: z.number().int().positive(),
	recvWindowMs: z.number().int().positive().max(60_000),
	userAgent: z.string().min(1),
	testnet: z.boolean(),
	logLevel: logLevelSchema,
});

const reconnectionSchema = z
	.object({
		baseDelayMs: z.number().positive(),
		maxDelayMs: z.number().positive(),
		maxAttempts: z.number().int().positive().or(z.literal(Number.POSITIVE_INFINITY)),
		jitterFactor: z.number().min(0).lt(1),
	})
	.refine((c) => c.maxDelayMs >= c.baseDelayMs, {
		message: "maxDelayMs must be at least baseDelayMs",
		path: ["maxDelayMs"],
	});

const wsConfigSchema = z.object({
	handshakeTimeoutMs: z.number().int().positive(),
	idleTimeoutMs: z.number().int().nonnegative(),
	refreshAfterMs: z.number().int().nonnegative(),
	bufferSize: z.number().int().nonnegative(),
	pingIntervalMs: z.number().int().nonnegative(),
	pongTimeoutMs: z.number().int().positive(),
	reconnection: reconnectionSchema,
});

function check<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
	const result = validate(schema, value);
	if (result.ok) return result.value;
	const detail = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
	throw new ConfigError(`Invalid ${what}: ${detail}`, { issues: result.error.issues });
}

/**
 * Merge overrides onto the defaults and validate the result.
 * @throws ConfigError when a value is out of range
 */
export function resolveClientConfig(overrides: Partial<ClientConfig> = {}): ClientConfig {
	return check(clientConfigSchema, { ...DEFAULT_CLIENT_CONFIG, ...overrides }, "client config");
}

export type WsConnectionOverrides = Partial<Omit<WsConnectionConfig, "reconnection">> & {
	readonly reconnection?: Partial<ReconnectionConfig>;
};

/** @throws ConfigError when a value is out of range */
export function resolveWsConfig(overrides: WsConnectionOverrides = {}): WsConnectionConfig {
	const merged: WsConnectionConfig = {
		...DEFAULT_WS_CONFIG,
		...overrides,
		reconnection: { ...DEFAULT_RECONNECTION_CONFIG, ...overrides.reconnection },
	};
	return check(wsConfigSchema, merged, "connection config");
}

/** Mutable builder shape for constructing Partial<ClientConfig> without TS4111 index issues. */
interface MutableClientConfig {
	timeoutMs?: number;
	recvWindowMs?: number;
	testnet?: boolean;
	logLevel?: LogLevel | "silent";
}

/**
 * Reads overrides from EXCHANGE_CLIENT_TIMEOUT_MS, EXCHANGE_CLIENT_RECV_WINDOW_MS,
 * EXCHANGE_CLIENT_TESTNET and EXCHANGE_CLIENT_LOG_LEVEL.
 * @throws ConfigError if a variable holds an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ClientConfig> {
	const result: MutableClientConfig = {};

	const timeout = positiveIntEnv(env, "EXCHANGE_CLIENT_TIMEOUT_MS");
	if (timeout !== undefined) result.timeoutMs = timeout;

	const recvWindow = positiveIntEnv(env, "EXCHANGE_CLIENT_RECV_WINDOW_MS");
	if (recvWindow !== undefined) result.recvWindowMs = recvWindow;

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const testnet = env["EXCHANGE_CLIENT_TESTNET"];
	if (testnet !== undefined && testnet !== "") {
		if (testnet !== "true" && testnet !== "false") {
			throw new ConfigError(`Invalid EXCHANGE_CLIENT_TESTNET: "${testnet}" must be true or false`);
		}
		result.testnet = testnet === "true";
	}

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const level = env["EXCHANGE_CLIENT_LOG_LEVEL"];
	if (level !== undefined && level !== "") {
		const parsed = logLevelSchema.safeParse(level);
		if (!parsed.success) {
			throw new ConfigError(`Invalid EXCHANGE_CLIENT_LOG_LEVEL: "${level}"`);
		}
		result.logLevel = parsed.data;
	}

	return result;
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function positiveIntEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
	const raw = env[key];
	if (!raw) return undefined;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed <= 0) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be a positive integer`);
	}
	return parsed;
}
