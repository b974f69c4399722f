/**
 * RequestPipeline — turns a RequestSpec into one HTTP exchange.
 *
 * Encodes the body, signs when the RequestSpec asks for it, sends through the
 * transport and hands back the raw envelope. Any status code is a
 * successful exchange; interpreting it is the caller's job. No caching,
 * no retries.
 */

import type { Authenticator } from "../auth/types.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { DEFAULT_CLIENT_CONFIG } from "../shared/config.js";
import {
	CredentialError,
	NetworkError,
	type TransportError,
	classifyError,
	isTransportError,
} from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock, offsetClock } from "../shared/time.js";
import { CONTENT_TYPES, buildUrl, encodeBody, requiresAuth } from "./request-spec.js";
import { FetchTransport, responseEnvelope } from "./transport.js";
import type {
	BodyEncoding,
	HttpTransport,
	QueryPair,
	RequestSpec,
	ResponseEnvelope,
} from "./types.js";

export interface RequestPipelineOptions {
	readonly baseUrl: string;
	readonly authenticator?: Authenticator;
	readonly transport?: HttpTransport;
	readonly bodyEncoding?: BodyEncoding;
	readonly timeoutMs?: number;
	readonly userAgent?: string;
	readonly headers?: Readonly<Record<string, string>>;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

export type PipelineError = TransportError | CredentialError;

export class RequestPipeline {
	private readonly baseUrl: string;
	private readonly authenticator: Authenticator | undefined;
	private readonly transport: HttpTransport;
	private readonly bodyEncoding: BodyEncoding;
	private readonly timeoutMs: number;
	private readonly baseHeaders: Readonly<Record<string, string>>;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private offsetMs = 0;
	private signingClock: Clock;

	constructor(options: RequestPipelineOptions) {
		this.baseUrl = options.baseUrl;
		this.authenticator = options.authenticator;
		this.transport = options.transport ?? new FetchTransport();
		this.bodyEncoding = options.bodyEncoding ?? "json";
		this.timeoutMs = options.timeoutMs ?? DEFAULT_CLIENT_CONFIG.timeoutMs;
		this.baseHeaders = {
			"User-Agent": options.userAgent ?? DEFAULT_CLIENT_CONFIG.userAgent,
			...options.headers,
		};
		this.clock = options.clock ?? SystemClock;
		this.signingClock = this.clock;
		this.logger = (options.logger ?? silentLogger()).child({ component: "request-pipeline" });
	}

	get hasAuthenticator(): boolean {
		return this.authenticator !== undefined;
	}

	get clockOffsetMs(): number {
		return this.offsetMs;
	}

	/**
	 * Shift signing timestamps by `serverTime - localTime`.
	 * @param offsetMs - Milliseconds to add to the local clock; fractions are truncated
	 */
	setClockOffset(offsetMs: number): void {
		this.offsetMs = Math.trunc(offsetMs);
		this.signingClock = offsetClock(this.clock, this.offsetMs);
	}

	/**
	 * Encodes, signs when `spec.auth` asks for it, and sends.
	 *
	 * @param spec - The call to make
	 * @returns the raw envelope for any status code; EncodingError, CredentialError,
	 *   NetworkError or TimeoutError when no response could be had
	 */
	async execute(spec: RequestSpec): Promise<Result<ResponseEnvelope, PipelineError>> {
		const encoded = encodeBody(spec, this.bodyEncoding);
		if (!encoded.ok) return encoded;

		let body = encoded.value;
		let query: readonly QueryPair[] = spec.query;
		let authHeaders: Readonly<Record<string, string>> = {};

		if (requiresAuth(spec)) {
			if (this.authenticator === undefined) {
				return err(
					new CredentialError(`${spec.method} ${spec.path} requires credentials`, {
						auth: spec.auth,
					}),
				);
			}
			const signed = this.authenticator.sign(spec, this.signingClock.now(), body);
			if (!signed.ok) return signed;
			body = signed.value.body;
			query = signed.value.query;
			authHeaders = signed.value.headers;
		}

		const url = buildUrl(this.baseUrl, spec.path, query);
		if (!url.ok) return url;

		const headers: Record<string, string> = { ...this.baseHeaders, ...authHeaders };
		if (body !== undefined) {
			headers["Content-Type"] = CONTENT_TYPES[this.bodyEncoding];
		}

		const started = this.clock.now();
		try {
			const response = await this.transport.send({
				method: spec.method,
				url: url.value,
				headers,
				body,
				timeoutMs: this.timeoutMs,
			});
			this.logger.debug(
				{
					method: spec.method,
					path: spec.path,
					status: response.status,
					elapsedMs: this.clock.now() - started,
				},
				"response",
			);
			return ok(responseEnvelope(response));
		} catch (e) {
			const error = toTransportError(e, this.timeoutMs);
			this.logger.debug(
				{
					method: spec.method,
					path: spec.path,
					code: error.code,
					elapsedMs: this.clock.now() - started,
				},
				"transport failure",
			);
			return err(error);
		}
	}
}

function toTransportError(error: unknown, timeoutMs: number): TransportError {
	const classified = classifyError(error, timeoutMs);
	if (isTransportError(classified)) return classified;
	return new NetworkError(classified.message, { cause: classified });
}
