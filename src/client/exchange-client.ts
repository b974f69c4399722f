import { type Credentials, createAuthenticator } from "../auth/index.js";
import type { Authenticator } from "../auth/types.js";
import { RequestPipeline } from "../http/request-pipeline.js";
import type { HttpTransport, RequestSpec, ResponseEnvelope } from "../http/types.js";
import { type Logger, createLogger } from "../lib/logger/index.js";
import { validate, type z } from "../lib/validation/index.js";
import {
	type ClientConfig,
	type WsConnectionConfig,
	type WsConnectionOverrides,
	resolveClientConfig,
	resolveWsConfig,
} from "../shared/config.js";
import {
	ApiError,
	type ClientError,
	ConfigError,
	CredentialError,
	DecodeError,
	RateLimitError,
} from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { ConnectionHandle } from "../websocket/connection-handle.js";
import type { ConnectionState } from "../websocket/connection-state.js";
import { type TopicStream, passthrough, schemaDecoder } from "../websocket/topic-stream.js";
import type { SocketFactory } from "../websocket/types.js";
import {
	type ExchangeName,
	type ExchangeProfile,
	PROFILES,
	type StreamContext,
	pickEndpoint,
} from "./profiles.js";

export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface ExchangeClientOptions {
	/** Ownership passes to the client; `close()` disposes them. */
	readonly credentials?: Credentials;
	readonly config?: Partial<ClientConfig>;
	readonly ws?: WsConnectionOverrides;
	/** Replaces the profile's REST base URL. */
	readonly baseUrl?: string;
	readonly transport?: HttpTransport;
	readonly socketFactory?: SocketFactory;
	readonly clock?: Clock;
	/** Defaults to a pino logger at `config.logLevel`. */
	readonly logger?: Logger;
}

const RATE_LIMIT_STATUSES = new Set([418, 429]);

/** `Retry-After` in whole seconds, as exchanges send it. */
export function parseRetryAfter(value: string | undefined): number | undefined {
	if (value === undefined || !/^\d+$/.test(value.trim())) return undefined;
	return Number.parseInt(value.trim(), 10) * 1_000;
}

/**
 * ExchangeClient — one exchange, one optional key set, any number of streams.
 *
 * `call()` runs a request through the pipeline and interprets the answer:
 * 418/429 become RateLimitError, other non-2xx ApiError, unparsable or
 * schema-mismatched bodies DecodeError. `subscribe()` opens one
 * ConnectionHandle per stream name on first use and hands back a
 * TopicStream on it.
 */
export class ExchangeClient {
	readonly exchange: ExchangeName;
	private readonly profile: ExchangeProfile;
	private readonly pipeline: RequestPipeline;
	private readonly authenticator: Authenticator | undefined;
	private readonly config: ClientConfig;
	private readonly wsConfig: WsConnectionConfig;
	private readonly socketFactory: SocketFactory | undefined;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly handles = new Map<string, ConnectionHandle>();
	private closing: Promise<void> | null = null;

	constructor(
		profile: ExchangeProfile,
		pipeline: RequestPipeline,
		authenticator: Authenticator | undefined,
		settings: {
			readonly config: ClientConfig;
			readonly wsConfig: WsConnectionConfig;
			readonly socketFactory: SocketFactory | undefined;
			readonly clock: Clock;
			readonly logger: Logger;
		},
	) {
		this.exchange = profile.name;
		this.profile = profile;
		this.pipeline = pipeline;
		this.authenticator = authenticator;
		this.config = settings.config;
		this.wsConfig = settings.wsConfig;
		this.socketFactory = settings.socketFactory;
		this.clock = settings.clock;
		this.logger = settings.logger.child({ exchange: profile.name });
	}

	get isClosed(): boolean {
		return this.closing !== null;
	}

	/** Stream names this exchange offers. */
	streams(): string[] {
		return Object.keys(this.profile.streams);
	}

	/**
	 * Sends one request and interprets the response.
	 *
	 * @param spec - Built with `requestSpec()`; `auth: "sign"` needs credentials
	 * @param schema - zod schema the 2xx body must satisfy; without one the parsed JSON comes back
	 * @returns the decoded body, or RateLimitError, ApiError, DecodeError, a transport error
	 *   or CredentialError
	 *
	 * @example
	 * ```ts
	 * const price = await client.call(
	 *   requestSpec({ path: "/api/v3/ticker/price", query: { symbol: "BTCUSDT" } }),
	 *   z.object({ symbol: z.string(), price: z.string() }),
	 * );
	 * if (price.ok) console.log(price.value.price);
	 * ```
	 */
	call(spec: RequestSpec): Promise<Result<unknown, ClientError>>;
	call<T>(spec: RequestSpec, schema: Schema<T>): Promise<Result<T, ClientError>>;
	async call<T>(spec: RequestSpec, schema?: Schema<T>): Promise<Result<unknown, ClientError>> {
		if (this.closing) return err(new ConfigError("Client has been closed"));
		const response = await this.pipeline.execute(spec);
		if (!response.ok) return response;
		return this.interpret(spec, response.value, schema);
	}

	/**
	 * Measures the exchange's clock against ours and signs with the
	 * difference from then on. Returns the offset in ms.
	 */
	async syncTime(): Promise<Result<number, ClientError>> {
		const sentAt = this.clock.now();
		const { spec, schema } = this.profile.serverTime;
		const serverTime = await this.call(spec, schema);
		if (!serverTime.ok) return serverTime;
		const midpoint = sentAt + (this.clock.now() - sentAt) / 2;
		const offset = Math.round(serverTime.value - midpoint);
		this.pipeline.setClockOffset(offset);
		this.logger.info({ offsetMs: offset }, "clock offset updated");
		return ok(offset);
	}

	/**
	 * Subscribes to a topic on one of the exchange's streams, opening the
	 * stream's connection on first use.
	 *
	 * @param stream - One of `streams()`, such as "spot" or "private"
	 * @param topic - Exchange topic key, such as "btcusdt@trade"
	 * @param schema - zod schema each payload is decoded with; failures are dropped and counted
	 * @returns the subscriber's stream once the connection is open; ConfigError for an
	 *   unknown stream, CredentialError for a private stream without credentials,
	 *   NetworkError when the first handshake fails
	 *
	 * @example
	 * ```ts
	 * const trades = await client.subscribe("spot", "btcusdt@trade", tradeSchema);
	 * if (trades.ok) {
	 *   for await (const trade of trades.value) console.log(trade.p);
	 * }
	 * ```
	 */
	subscribe(stream: string, topic: string): Promise<Result<TopicStream<unknown>, ClientError>>;
	subscribe<T>(
		stream: string,
		topic: string,
		schema: Schema<T>,
	): Promise<Result<TopicStream<T>, ClientError>>;
	async subscribe<T>(
		stream: string,
		topic: string,
		schema?: Schema<T>,
	): Promise<Result<TopicStream<T> | TopicStream<unknown>, ClientError>> {
		const handle = this.handleFor(stream);
		if (!handle.ok) return handle;
		const started = await handle.value.start();
		if (!started.ok) {
			if (this.handles.get(stream) === handle.value) this.handles.delete(stream);
			return started;
		}
		return ok(
			schema
				? handle.value.subscribe(topic, schemaDecoder(schema))
				: handle.value.subscribe(topic, passthrough),
		);
	}

	/** `undefined` until the stream has been subscribed to. */
	status(stream: string): ConnectionState | undefined {
		return this.handles.get(stream)?.status();
	}

	/** The live handle for a stream, for state events and stats. */
	connection(stream: string): ConnectionHandle | undefined {
		return this.handles.get(stream);
	}

	/** Closes every stream and disposes the credentials. Idempotent. */
	close(): Promise<void> {
		if (this.closing) return this.closing;
		const handles = [...this.handles.values()];
		this.handles.clear();
		this.closing = Promise.all(handles.map((h) => h.close())).then(() => {
			this.authenticator?.dispose();
			this.logger.debug({ streams: handles.length }, "client closed");
		});
		return this.closing;
	}

	private handleFor(stream: string): Result<ConnectionHandle, ClientError> {
		if (this.closing) return err(new ConfigError("Client has been closed"));

		const existing = this.handles.get(stream);
		if (existing && existing.status().status !== "closed") return ok(existing);

		const streamProfile = this.profile.streams[stream];
		if (streamProfile === undefined) {
			return err(
				new ConfigError(`Unknown stream "${stream}" for ${this.exchange}`, {
					streams: this.streams(),
				}),
			);
		}
		if (streamProfile.requiresAuth && this.authenticator === undefined) {
			return err(new CredentialError(`Stream "${stream}" requires credentials`));
		}

		const context: StreamContext = {
			authenticator: this.authenticator,
			pipeline: this.pipeline,
			clock: this.clock,
			testnet: this.config.testnet,
		};
		const url = streamProfile.url(context);
		if (!url.ok) return url;

		const handle = new ConnectionHandle({
			url: url.value,
			protocol: streamProfile.protocol(context),
			config: this.wsConfig,
			clock: this.clock,
			logger: this.logger.child({ stream }),
			...(this.socketFactory ? { socketFactory: this.socketFactory } : {}),
		});
		this.handles.set(stream, handle);
		return ok(handle);
	}

	private interpret<T>(
		spec: RequestSpec,
		envelope: ResponseEnvelope,
		schema: Schema<T> | undefined,
	): Result<unknown, ClientError> {
		const { status } = envelope;
		const text = envelope.text();
		const where = { method: spec.method, path: spec.path };

		if (RATE_LIMIT_STATUSES.has(status)) {
			const retryAfterMs = parseRetryAfter(envelope.headers["retry-after"]);
			this.logger.warn({ ...where, status, retryAfterMs }, "rate limited");
			return err(new RateLimitError(`Rate limited (HTTP ${status})`, status, retryAfterMs, where));
		}

		const body = parseBody(text);
		if (status < 200 || status >= 300) {
			const reported = body.ok ? this.profile.parseError(body.value) : undefined;
			return err(
				new ApiError(reported?.message ?? `HTTP ${status}`, status, reported?.code, text, where),
			);
		}
		if (!body.ok) {
			return err(new DecodeError("Response body is not JSON", text, status, where));
		}

		const embedded = this.profile.embeddedError?.(body.value);
		if (embedded) {
			return err(new ApiError(embedded.message, status, embedded.code, text, where));
		}
		if (schema === undefined) return ok(body.value);

		const decoded = validate(schema, body.value);
		if (!decoded.ok) {
			return err(
				new DecodeError(`Response failed validation: ${decoded.error.describe()}`, text, status, {
					...where,
					cause: decoded.error,
				}),
			);
		}
		return ok(decoded.value);
	}
}

/** An empty body decodes to `null`. */
function parseBody(text: string): Result<unknown, SyntaxError> {
	if (text.trim() === "") return ok(null);
	try {
		const parsed: unknown = JSON.parse(text);
		return ok(parsed);
	} catch (e) {
		return err(e instanceof SyntaxError ? e : new SyntaxError(String(e)));
	}
}

/**
 * Build a client for one exchange.
 *
 * @param exchange - Which profile to use
 * @param options - Credentials, config overrides and injectable transport, sockets, clock, logger
 * @returns the client, or CredentialError when the credentials cannot be used
 * @throws ConfigError for out-of-range settings or a testnet the exchange does not run
 *
 * @example
 * ```ts
 * const created = createExchangeClient("bybit", {
 *   credentials: createCredentials({ apiKey, secret }),
 *   config: { testnet: true },
 * });
 * if (!created.ok) throw created.error;
 * const client = created.value;
 * ```
 */
export function createExchangeClient(
	exchange: ExchangeName,
	options: ExchangeClientOptions = {},
): Result<ExchangeClient, CredentialError> {
	const profile = PROFILES[exchange];
	const config = resolveClientConfig(options.config);
	const wsConfig = resolveWsConfig(options.ws);
	const clock = options.clock ?? SystemClock;
	const logger = options.logger ?? createLogger({ level: config.logLevel });

	let baseUrl = options.baseUrl;
	if (baseUrl === undefined) {
		const picked = pickEndpoint(profile.rest, config.testnet, `${exchange} REST API`);
		if (!picked.ok) throw picked.error;
		baseUrl = picked.value;
	}

	let authenticator: Authenticator | undefined;
	if (options.credentials) {
		const created = createAuthenticator(profile.scheme, options.credentials, {
			recvWindowMs: config.recvWindowMs,
		});
		if (!created.ok) return created;
		authenticator = created.value;
	}

	const pipeline = new RequestPipeline({
		baseUrl,
		bodyEncoding: profile.bodyEncoding,
		timeoutMs: config.timeoutMs,
		userAgent: config.userAgent,
		clock,
		logger,
		...(authenticator ? { authenticator } : {}),
		...(options.transport ? { transport: options.transport } : {}),
	});

	return ok(
		new ExchangeClient(profile, pipeline, authenticator, {
			config,
			wsConfig,
			socketFactory: options.socketFactory,
			clock,
			logger,
		}),
	);
}
