import { AsyncChannel } from "../lib/channel/index.js";
import { TypedEmitter } from "../lib/events/index.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { WsClient } from "../lib/websocket/index.js";
import { DEFAULT_WS_CONFIG, type WsConnectionConfig } from "../shared/config.js";
import { type ClientError, NetworkError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { ReconnectionPolicy } from "./backoff.js";
import {
	type ConnectionEvent,
	type ConnectionState,
	INITIAL_STATE,
	transition,
} from "./connection-state.js";
import { SubscriptionRegistry } from "./subscription-registry.js";
import { type Decoder, type SubscriberSink, TopicStream } from "./topic-stream.js";
import type {
	InboundMessage,
	SocketFactory,
	SocketLike,
	UrlResolver,
	WsProtocol,
} from "./types.js";

export interface ConnectionHandleOptions {
	readonly url: string | UrlResolver;
	readonly protocol: WsProtocol;
	readonly config?: WsConnectionConfig;
	readonly socketFactory?: SocketFactory;
	readonly clock?: Clock;
	readonly logger?: Logger;
	/** Source of randomness for backoff jitter. */
	readonly random?: () => number;
}

export interface ConnectionStats {
	readonly framesReceived: number;
	/** Data frames whose topic had no subscriber. */
	readonly unmatched: number;
	readonly decodeFailures: number;
	readonly reconnects: number;
	readonly topics: number;
}

export interface ConnectionEvents {
	state: (state: ConnectionState, previous: ConnectionState) => void;
	frame: (message: InboundMessage) => void;
	replay: (topics: readonly string[]) => void;
}

type Stream = SubscriberSink;

type Mail =
	| { readonly type: "subscribe"; readonly stream: Stream }
	| { readonly type: "unsubscribe"; readonly stream: Stream }
	| { readonly type: "reconnect" }
	| { readonly type: "close"; readonly done: () => void }
	| HandshakeMail
	| { readonly type: "message"; readonly gen: number; readonly text: string }
	| {
			readonly type: "socket_closed";
			readonly gen: number;
			readonly code: number;
			readonly reason: string;
	  }
	| { readonly type: "socket_error"; readonly gen: number; readonly error: Error }
	| { readonly type: "retry"; readonly gen: number }
	| { readonly type: "heartbeat"; readonly gen: number }
	| { readonly type: "idle_check"; readonly gen: number }
	| { readonly type: "refresh"; readonly gen: number };

interface HandshakeMail {
	readonly type: "handshake";
	readonly gen: number;
	readonly socket: SocketLike | null;
	readonly result: Result<void, ClientError>;
}

const IDLE_CHECK_MAX_MS = 1_000;

const defaultSocketFactory: SocketFactory = (options) => new WsClient(options);

/**
 * One logical stream connection that outlives its sockets.
 *
 * A single background task owns the socket, the subscription registry and
 * the lifecycle state. Callers, socket callbacks and timers only post mail
 * to it, so every mutation happens in arrival order. Each connection
 * attempt gets a generation number; mail from an older generation is
 * discarded.
 *
 * After every successful handshake the task sends the protocol's opening
 * frames and then one subscribe frame per active topic. A dropped socket
 * is replaced after an exponential backoff. Subscriber streams stay open
 * across reconnects and end only when the handle closes.
 */
export class ConnectionHandle extends TypedEmitter<ConnectionEvents> {
	private readonly url: string | UrlResolver;
	private readonly protocol: WsProtocol;
	private readonly config: WsConnectionConfig;
	private readonly socketFactory: SocketFactory;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly policy: ReconnectionPolicy;
	private readonly registry = new SubscriptionRegistry<Stream>();
	private readonly mailbox = new AsyncChannel<Mail>();

	private state: ConnectionState = INITIAL_STATE;
	private socket: SocketLike | null = null;
	private generation = 0;
	private started: Promise<Result<void, NetworkError>> | null = null;
	private settleStart: ((result: Result<void, NetworkError>) => void) | null = null;
	private closing: Promise<void> | null = null;
	private task: Promise<void> | null = null;

	private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
	private idleTimer: ReturnType<typeof setInterval> | null = null;
	private refreshTimer: ReturnType<typeof setTimeout> | null = null;
	private retryTimer: ReturnType<typeof setTimeout> | null = null;
	/** Frames the current attempt's socket delivered before its handshake mail. */
	private early: string[] = [];
	private lastInboundAt = 0;
	private activitySinceTick = false;

	private framesReceived = 0;
	private unmatched = 0;
	private decodeFailures = 0;
	private reconnects = 0;

	constructor(options: ConnectionHandleOptions) {
		super();
		this.url = options.url;
		this.protocol = options.protocol;
		this.config = options.config ?? DEFAULT_WS_CONFIG;
		this.socketFactory = options.socketFactory ?? defaultSocketFactory;
		this.clock = options.clock ?? SystemClock;
		this.policy = new ReconnectionPolicy(this.config.reconnection, options.random);
		this.logger = (options.logger ?? silentLogger()).child({
			component: "connection",
			protocol: options.protocol.name,
			url: typeof options.url === "string" ? options.url : "(resolved per attempt)",
		});
	}

	/**
	 * Starts the background task and the first handshake. Resolves once the
	 * first socket is open, or with the handshake error, after which the
	 * handle is closed. Calling it again returns the same promise.
	 */
	start(): Promise<Result<void, NetworkError>> {
		if (this.started) return this.started;
		if (this.state.status === "closed") {
			this.started = Promise.resolve(err(new NetworkError("Connection was closed before start")));
			return this.started;
		}
		this.started = new Promise((resolve) => {
			this.settleStart = resolve;
		});
		this.task = this.run();
		this.beginAttempt();
		return this.started;
	}

	/** Current lifecycle state. */
	status(): ConnectionState {
		return this.state;
	}

	stats(): ConnectionStats {
		return {
			framesReceived: this.framesReceived,
			unmatched: this.unmatched,
			decodeFailures: this.decodeFailures,
			reconnects: this.reconnects,
			topics: this.registry.size,
		};
	}

	/**
	 * Registers interest in `topic`. Only the first subscriber of a topic
	 * causes a subscribe frame; payloads that `decode` rejects are dropped
	 * and logged. On a closed handle the returned stream is already ended.
	 *
	 * @param topic - Exchange topic key
	 * @param decode - Turns a raw payload into `T`, see `schemaDecoder`
	 * @param bufferSize - Per-subscriber cap with drop-oldest; 0 is unbounded
	 *
	 * @example
	 * ```ts
	 * const trades = handle.subscribe("btcusdt@trade", schemaDecoder(tradeSchema));
	 * for await (const trade of trades) console.log(trade.p);
	 * ```
	 */
	subscribe<T>(
		topic: string,
		decode: Decoder<T>,
		bufferSize = this.config.bufferSize,
	): TopicStream<T> {
		const stream = new TopicStream<T>(
			topic,
			decode,
			(sink) => this.post({ type: "unsubscribe", stream: sink }),
			bufferSize,
		);
		if (this.state.status === "closed") {
			this.logger.warn({ topic }, "subscribe on closed connection");
			stream.end();
			return stream;
		}
		this.post({ type: "subscribe", stream });
		return stream;
	}

	/** Retires the current socket and reconnects with the usual backoff. */
	requestReconnect(): void {
		this.post({ type: "reconnect" });
	}

	/** Ends every subscriber stream and stops the background task. Idempotent. */
	close(): Promise<void> {
		if (this.closing) return this.closing;
		if (this.task === null || this.state.status === "closed") {
			if (this.state.status !== "closed") this.shutdown();
			this.closing = this.task ?? Promise.resolve();
			return this.closing;
		}
		const task = this.task;
		this.closing = new Promise<void>((resolve) => {
			this.post({ type: "close", done: resolve });
		}).then(() => task);
		return this.closing;
	}

	// ── Background task ─────────────────────────────────────────────

	private async run(): Promise<void> {
		for await (const mail of this.mailbox) {
			try {
				this.handle(mail);
			} catch (error) {
				this.logger.error({ err: error, mail: mail.type }, "connection task step failed");
			}
		}
	}

	/** False once the mailbox has closed. */
	private post(mail: Mail): boolean {
		return this.mailbox.push(mail);
	}

	private handle(mail: Mail): void {
		switch (mail.type) {
			case "subscribe":
				this.onSubscribe(mail.stream);
				return;
			case "unsubscribe":
				this.onUnsubscribe(mail.stream);
				return;
			case "reconnect":
				this.dropSocket("reconnect requested");
				return;
			case "close":
				this.shutdown();
				mail.done();
				return;
			case "handshake":
				this.onHandshake(mail.gen, mail.socket, mail.result);
				return;
			case "retry":
				if (mail.gen === this.generation && this.state.status === "reconnecting") {
					this.retryTimer = null;
					this.beginAttempt();
				}
				return;
		}

		if (mail.gen !== this.generation) return;
		if (mail.type === "message" && this.state.status !== "open") {
			if (this.state.status !== "closed") this.early.push(mail.text);
			return;
		}
		if (this.state.status !== "open") return;
		switch (mail.type) {
			case "message":
				this.onMessage(mail.text);
				return;
			case "socket_closed":
				this.dropSocket(`socket closed (${mail.code}${mail.reason ? `: ${mail.reason}` : ""})`);
				return;
			case "socket_error":
				this.logger.warn({ err: mail.error }, "socket error");
				this.dropSocket("socket error");
				return;
			case "heartbeat":
				if (!this.activitySinceTick && this.protocol.heartbeat) {
					this.sendFrame(this.protocol.heartbeat.frame());
				}
				this.activitySinceTick = false;
				return;
			case "idle_check":
				if (this.clock.now() - this.lastInboundAt >= this.config.idleTimeoutMs) {
					this.dropSocket("idle timeout");
				}
				return;
			case "refresh":
				this.dropSocket("scheduled refresh");
				return;
		}
	}

	private onSubscribe(stream: Stream): void {
		if (this.state.status === "closed") {
			stream.end();
			return;
		}
		const { id, first } = this.registry.add(stream.topic, stream);
		stream.bind(id);
		this.logger.debug({ topic: stream.topic, id, first }, "subscribed");
		if (first && this.state.status === "open") {
			this.sendFrame(this.protocol.subscribeFrame(stream.topic));
		}
	}

	private onUnsubscribe(stream: Stream): void {
		const id = stream.id;
		if (id === undefined) return;
		const removed = this.registry.remove(id);
		if (removed === null) return;
		this.logger.debug({ topic: removed.topic, id, last: removed.last }, "unsubscribed");
		if (removed.last && this.state.status === "open") {
			this.sendFrame(this.protocol.unsubscribeFrame(removed.topic));
		}
	}

	private beginAttempt(): void {
		this.generation += 1;
		this.early = [];
		const gen = this.generation;
		void this.connectSocket(gen).then(
			(mail) => {
				if (!this.post(mail)) mail.socket?.close(1000, "closed");
			},
			(error: unknown) =>
				this.post({
					type: "handshake",
					gen,
					socket: null,
					result: err(new NetworkError("Connection attempt failed", { cause: error })),
				}),
		);
	}

	private async connectSocket(gen: number): Promise<HandshakeMail> {
		let url: string;
		if (typeof this.url === "string") {
			url = this.url;
		} else {
			const resolved = await this.url();
			if (!resolved.ok) return { type: "handshake", gen, socket: null, result: resolved };
			url = resolved.value;
		}
		const socket = this.socketFactory({
			url,
			handshakeTimeoutMs: this.config.handshakeTimeoutMs,
			pingIntervalMs: this.config.pingIntervalMs,
			pongTimeoutMs: this.config.pongTimeoutMs,
		});
		socket.onMessage((text) => this.post({ type: "message", gen, text }));
		socket.onClose((code, reason) => this.post({ type: "socket_closed", gen, code, reason }));
		socket.onError((error) => this.post({ type: "socket_error", gen, error }));
		const result = await socket.connect();
		return { type: "handshake", gen, socket, result };
	}

	private onHandshake(
		gen: number,
		socket: SocketLike | null,
		result: Result<void, ClientError>,
	): void {
		if (gen !== this.generation || this.state.status === "closed") {
			socket?.close();
			return;
		}

		if (!result.ok) {
			socket?.close();
			this.logger.warn({ err: result.error }, "handshake failed");
			if (this.state.status === "connecting") {
				this.setState({ type: "fail", backoffMs: 0 });
				this.resolveStart(err(asNetworkError(result.error)));
				this.shutdown();
				return;
			}
			this.scheduleRetry("fail");
			return;
		}

		if (socket === null) return;
		this.socket = socket;
		const now = this.clock.now();
		this.lastInboundAt = now;
		this.activitySinceTick = false;
		this.policy.reset();
		this.setState({ type: "open", at: now });
		this.logger.info("connected");

		if (this.protocol.onOpenFrames) {
			const frames = this.protocol.onOpenFrames(now);
			if (frames.ok) {
				for (const frame of frames.value) this.sendFrame(frame);
			} else {
				this.logger.error({ err: frames.error }, "could not build opening frames");
			}
		}

		const topics = this.registry.topics();
		for (const topic of topics) {
			if (this.socket === null) break;
			this.sendFrame(this.protocol.subscribeFrame(topic));
		}
		if (this.socket === null) return;
		this.startTimers(gen);
		this.resolveStart(ok(undefined));
		this.safeEmit("replay", topics);

		const early = this.early;
		this.early = [];
		for (const text of early) {
			if (this.socket === null) break;
			this.onMessage(text);
		}
	}

	private onMessage(text: string): void {
		this.framesReceived += 1;
		this.lastInboundAt = this.clock.now();
		this.activitySinceTick = true;

		const message = this.protocol.classify(text);
		switch (message.kind) {
			case "data":
				this.route(message.topic, message.payload);
				break;
			case "ping":
				this.sendFrame(message.reply);
				break;
			case "pong":
			case "ack":
				this.logger.debug({ kind: message.kind }, "control frame");
				break;
			case "error":
				this.logger.warn({ code: message.code }, `exchange reported: ${message.message}`);
				break;
			case "ignored":
				this.logger.debug({ reason: message.reason }, "frame ignored");
				break;
		}
		this.safeEmit("frame", message);
	}

	private route(topic: string, payload: unknown): void {
		const targets = this.registry.lookup(topic);
		if (targets.length === 0) {
			this.unmatched += 1;
			this.logger.debug({ topic }, "no subscriber for topic");
			return;
		}
		for (const stream of targets) {
			const failure = stream.deliver(payload);
			if (failure) {
				this.decodeFailures += 1;
				this.logger.warn({ topic, issues: failure.describe() }, "payload failed to decode");
			}
		}
	}

	private sendFrame(frame: string): void {
		if (this.socket === null) return;
		const sent = this.socket.send(frame);
		if (sent.ok) {
			this.activitySinceTick = true;
			return;
		}
		this.logger.warn({ err: sent.error }, "write failed");
		this.dropSocket("write failed");
	}

	/** Retires an open socket and schedules its replacement. */
	private dropSocket(reason: string): void {
		if (this.state.status !== "open") return;
		this.stopTimers();
		const socket = this.socket;
		this.socket = null;
		socket?.close(1000, reason);
		this.reconnects += 1;
		this.logger.info({ reason }, "connection dropped");
		this.scheduleRetry("drop");
	}

	private scheduleRetry(kind: "fail" | "drop"): void {
		if (!this.policy.shouldRetry()) {
			if (kind === "drop") this.setState({ type: "drop", backoffMs: 0 });
			this.setState({ type: "give_up" });
			this.logger.error({ attempts: this.policy.attempt }, "giving up on reconnecting");
			this.shutdown();
			return;
		}
		const backoffMs = this.policy.nextDelay();
		this.setState({ type: kind, backoffMs });
		const gen = this.generation;
		this.retryTimer = setTimeout(() => this.post({ type: "retry", gen }), backoffMs);
	}

	private startTimers(gen: number): void {
		const heartbeat = this.protocol.heartbeat;
		if (heartbeat) {
			this.heartbeatTimer = setInterval(
				() => this.post({ type: "heartbeat", gen }),
				heartbeat.intervalMs,
			);
		}
		if (this.config.idleTimeoutMs > 0) {
			this.idleTimer = setInterval(
				() => this.post({ type: "idle_check", gen }),
				Math.min(this.config.idleTimeoutMs, IDLE_CHECK_MAX_MS),
			);
		}
		if (this.config.refreshAfterMs > 0) {
			this.refreshTimer = setTimeout(
				() => this.post({ type: "refresh", gen }),
				this.config.refreshAfterMs,
			);
		}
	}

	private stopTimers(): void {
		if (this.heartbeatTimer) clearInterval(this.heartbeatTimer);
		if (this.idleTimer) clearInterval(this.idleTimer);
		if (this.refreshTimer) clearTimeout(this.refreshTimer);
		this.heartbeatTimer = null;
		this.idleTimer = null;
		this.refreshTimer = null;
	}

	/** Terminal: closes the socket, ends every stream, stops the task. */
	private shutdown(): void {
		this.stopTimers();
		if (this.retryTimer) clearTimeout(this.retryTimer);
		this.retryTimer = null;
		this.generation += 1;
		this.early = [];
		const socket = this.socket;
		this.socket = null;
		socket?.close(1000, "closed");
		this.setState({ type: "close" });
		for (const stream of this.registry.clear()) stream.end();
		this.resolveStart(err(new NetworkError("Connection closed before it opened")));
		this.mailbox.close();
	}

	private resolveStart(result: Result<void, NetworkError>): void {
		const settle = this.settleStart;
		this.settleStart = null;
		settle?.(result);
	}

	private setState(event: ConnectionEvent): void {
		const previous = this.state;
		const next = transition(previous, event);
		if (next === previous) return;
		this.state = next;
		this.logger.debug({ from: previous.status, to: next.status }, "state change");
		this.safeEmit("state", next, previous);
	}

	private safeEmit<K extends keyof ConnectionEvents & string>(
		event: K,
		...args: Parameters<ConnectionEvents[K]>
	): void {
		try {
			this.emit(event, ...args);
		} catch (error) {
			this.logger.warn({ err: error, event }, "event listener threw");
		}
	}
}

function asNetworkError(error: ClientError): NetworkError {
	return error instanceof NetworkError ? error : new NetworkError(error.message, { cause: error });
}
