/**
 * Logger wrapper — structured logging backed by pino.
 *
 * Opaque credential objects (anything with `__opaque: true`) are replaced by
 * `[REDACTED]`, and the request headers that carry API keys, signatures or
 * passphrases are censored by path unless the caller supplies its own list.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	/** `"silent"` discards everything. */
	readonly level: LogLevel | "silent";
	/** Replaces {@link DEFAULT_REDACT_PATHS} when given. */
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

/** Structured logger interface with auto-redaction of opaque credentials. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

/** Auth header names every supported exchange signs with. */
export const SENSITIVE_HEADERS = [
	"X-MBX-APIKEY",
	"X-MEXC-APIKEY",
	"X-BAPI-API-KEY",
	"X-BAPI-SIGN",
	"KC-API-KEY",
	"KC-API-SIGN",
	"KC-API-PASSPHRASE",
] as const;

export const DEFAULT_REDACT_PATHS: readonly string[] = [
	...SENSITIVE_HEADERS.map((h) => `headers["${h}"]`),
	"query.signature",
	"secret",
	"passphrase",
];

// ── Credential serializer ───────────────────────────────────────────

function isOpaqueCredential(value: unknown): boolean {
	return (
		typeof value === "object" &&
		value !== null &&
		"__opaque" in value &&
		value.__opaque === true
	);
}

function redactCredentials(obj: object): object {
	if (isOpaqueCredential(obj)) return { credentials: "[REDACTED]" };
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = isOpaqueCredential(value) ? "[REDACTED]" : value;
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info(msgOrObj: unknown, msg?: string): void {
			if (typeof msgOrObj !== "object" || msgOrObj === null) {
				pinoLogger.info(String(msgOrObj ?? ""));
			} else {
				pinoLogger.info(redactCredentials(msgOrObj), msg ?? "");
			}
		},
		warn(msgOrObj: unknown, msg?: string): void {
			if (typeof msgOrObj !== "object" || msgOrObj === null) {
				pinoLogger.warn(String(msgOrObj ?? ""));
			} else {
				pinoLogger.warn(redactCredentials(msgOrObj), msg ?? "");
			}
		},
		error(msgOrObj: unknown, msg?: string): void {
			if (typeof msgOrObj !== "object" || msgOrObj === null) {
				pinoLogger.error(String(msgOrObj ?? ""));
			} else {
				pinoLogger.error(redactCredentials(msgOrObj), msg ?? "");
			}
		},
		debug(msgOrObj: unknown, msg?: string): void {
			if (typeof msgOrObj !== "object" || msgOrObj === null) {
				pinoLogger.debug(String(msgOrObj ?? ""));
			} else {
				pinoLogger.debug(redactCredentials(msgOrObj), msg ?? "");
			}
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino with auto-redaction and optional custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "debug" });
 * logger.child({ component: "request-pipeline" }).debug({ status: 200 }, "response");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	const redactPaths = config.redactPaths ?? DEFAULT_REDACT_PATHS;
	if (redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...redactPaths],
			censor: "[REDACTED]",
		};
	}

	let pinoLogger: pino.Logger;

	const destination = config.destination;
	if (destination) {
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				destination.write(chunk);
			},
		};
		pinoLogger = pino(pinoOptions, stream);
	} else {
		pinoLogger = pino(pinoOptions);
	}

	return wrapPino(pinoLogger);
}

/** Logger that discards everything; the default for library consumers. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent", redactPaths: [] });
}
