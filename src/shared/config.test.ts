import { describe, expect, it } from "vitest";
import {
	DEFAULT_CLIENT_CONFIG,
	DEFAULT_WS_CONFIG,
	configFromEnv,
	resolveClientConfig,
	resolveWsConfig,
} from "./config.js";
import { ConfigError } from "./errors.js";

describe("ClientConfig", () => {
	describe("defaults", () => {
		it("uses a 3s request timeout and a silent logger", () => {
			expect(DEFAULT_CLIENT_CONFIG.timeoutMs).toBe(3_000);
			expect(DEFAULT_CLIENT_CONFIG.logLevel).toBe("silent");
			expect(DEFAULT_CLIENT_CONFIG.userAgent).toBe("exchange-client/0.1.0");
		});

		it("reconnects indefinitely by default", () => {
			expect(DEFAULT_WS_CONFIG.reconnection.maxAttempts).toBe(Number.POSITIVE_INFINITY);
			expect(DEFAULT_WS_CONFIG.idleTimeoutMs).toBe(0);
			expect(DEFAULT_WS_CONFIG.pingIntervalMs).toBe(30_000);
			expect(DEFAULT_WS_CONFIG.pongTimeoutMs).toBe(10_000);
		});
	});

	describe("resolveClientConfig", () => {
		it("merges overrides onto the defaults", () => {
			const config = resolveClientConfig({ timeoutMs: 10_000, testnet: true });
			expect(config).toEqual({ ...DEFAULT_CLIENT_CONFIG, timeoutMs: 10_000, testnet: true });
		});

		it("rejects a non-positive timeout", () => {
			expect(() => resolveClientConfig({ timeoutMs: 0 })).toThrow(ConfigError);
		});

		it("rejects a recv window above 60s", () => {
			expect(() => resolveClientConfig({ recvWindowMs: 60_001 })).toThrow(/recvWindowMs/);
		});
	});

	describe("resolveWsConfig", () => {
		it("merges nested reconnection overrides", () => {
			const config = resolveWsConfig({ reconnection: { maxDelayMs: 5_000 } });
			expect(config.reconnection).toEqual({
				...DEFAULT_WS_CONFIG.reconnection,
				maxDelayMs: 5_000,
			});
		});

		it("accepts a finite attempt limit", () => {
			expect(resolveWsConfig({ reconnection: { maxAttempts: 3 } }).reconnection.maxAttempts).toBe(
				3,
			);
		});

		it("rejects a cap below the base delay", () => {
			expect(() =>
				resolveWsConfig({ reconnection: { baseDelayMs: 1_000, maxDelayMs: 500 } }),
			).toThrow(ConfigError);
		});

		it("rejects a negative buffer size", () => {
			expect(() => resolveWsConfig({ bufferSize: -1 })).toThrow(ConfigError);
		});

		it("rejects a zero pong timeout", () => {
			expect(() => resolveWsConfig({ pongTimeoutMs: 0 })).toThrow(/pongTimeoutMs/);
		});
	});

	describe("configFromEnv", () => {
		it("returns an empty object when nothing is set", () => {
			expect(configFromEnv({})).toEqual({});
		});

		it("reads every supported variable", () => {
			const result = configFromEnv({
				EXCHANGE_CLIENT_TIMEOUT_MS: "5000",
				EXCHANGE_CLIENT_RECV_WINDOW_MS: "10000",
				EXCHANGE_CLIENT_TESTNET: "true",
				EXCHANGE_CLIENT_LOG_LEVEL: "debug",
			});
			expect(result).toEqual({
				timeoutMs: 5_000,
				recvWindowMs: 10_000,
				testnet: true,
				logLevel: "debug",
			});
		});

		it("ignores empty values", () => {
			expect(configFromEnv({ EXCHANGE_CLIENT_TIMEOUT_MS: "", EXCHANGE_CLIENT_TESTNET: "" })).toEqual(
				{},
			);
		});

		it("rejects trailing garbage in numeric variables", () => {
			expect(() => configFromEnv({ EXCHANGE_CLIENT_TIMEOUT_MS: "123abc" })).toThrow(ConfigError);
		});

		it("rejects fractional values", () => {
			expect(() => configFromEnv({ EXCHANGE_CLIENT_RECV_WINDOW_MS: "1000.5" })).toThrow(
				ConfigError,
			);
		});

		it("rejects a testnet flag that is not a boolean", () => {
			expect(() => configFromEnv({ EXCHANGE_CLIENT_TESTNET: "yes" })).toThrow(
				'Invalid EXCHANGE_CLIENT_TESTNET: "yes" must be true or false',
			);
		});

		it("rejects unknown log levels", () => {
			expect(() => configFromEnv({ EXCHANGE_CLIENT_LOG_LEVEL: "verbose" })).toThrow(ConfigError);
		});

		it("reads process.env when no source is given", () => {
			process.env["EXCHANGE_CLIENT_TIMEOUT_MS"] = "7000";
			try {
				expect(configFromEnv().timeoutMs).toBe(7_000);
			} finally {
				Reflect.deleteProperty(process.env, "EXCHANGE_CLIENT_TIMEOUT_MS");
			}
		});
	});
});
