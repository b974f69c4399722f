import WebSocket from "ws";
import { ConnectionError, NetworkError, classifyError } from "../../shared/errors.js";
import { type Result, err, ok } from "../../shared/result.js";
import type {
	WsCloseHandler,
	WsConfig,
	WsErrorHandler,
	WsMessageHandler,
	WsState,
} from "./types.js";

function toText(data: WebSocket.RawData): string {
	if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
	return Buffer.from(data).toString("utf8");
}

function asNetworkError(error: unknown, timeoutMs: number): NetworkError {
	const classified = classifyError(error, timeoutMs);
	if (classified instanceof NetworkError) return classified;
	return new NetworkError(classified.message, { cause: classified });
}

/**
 * WebSocket client wrapper with ping/pong keepalive.
 *
 * Encapsulates the ws library behind a small interface. Protocol-level pings
 * from the server are answered by ws itself. Failures come back as Result,
 * never thrown. One instance covers one physical socket; reconnecting means
 * building a new client.
 */
export class WsClient {
	private readonly config: WsConfig;
	private ws: WebSocket | null = null;
	private state: WsState = "closed";
	private readonly messageHandlers: WsMessageHandler[] = [];
	private readonly closeHandlers: WsCloseHandler[] = [];
	private readonly errorHandlers: WsErrorHandler[] = [];
	private pingTimer: ReturnType<typeof setInterval> | null = null;
	private pongTimer: ReturnType<typeof setTimeout> | null = null;
	private opened = false;
	private settleConnect: ((result: Result<void, NetworkError>) => void) | null = null;

	constructor(config: WsConfig) {
		this.config = config;
	}

	/**
	 * Opens the socket. Resolves `err(TimeoutError)` when the handshake deadline
	 * passes and `err(NetworkError)` for any other failure to open.
	 */
	connect(): Promise<Result<void, NetworkError>> {
		if (this.ws !== null) {
			return Promise.resolve(err(new NetworkError("WebSocket client has already been used")));
		}
		return new Promise((done) => {
			const resolve = (result: Result<void, NetworkError>): void => {
				this.settleConnect = null;
				done(result);
			};
			this.settleConnect = resolve;
			this.state = "connecting";
			const ws = new WebSocket(this.config.url, {
				handshakeTimeout: this.config.handshakeTimeoutMs,
			});
			this.ws = ws;

			ws.on("open", () => {
				this.state = "open";
				this.opened = true;
				this.startPing();
				resolve(ok(undefined));
			});

			ws.on("message", (data) => {
				const message = toText(data);
				for (const handler of this.messageHandlers) {
					handler(message);
				}
			});

			ws.on("close", (code, reason) => {
				this.state = "closed";
				this.clearTimers();
				if (!this.opened) {
					const message = `WebSocket closed during handshake (${code})`;
					this.settleConnect?.(err(new NetworkError(message)));
					return;
				}
				for (const handler of this.closeHandlers) {
					handler(code, reason.toString());
				}
			});

			ws.on("error", (error) => {
				if (this.state === "connecting") {
					this.state = "closed";
					this.clearTimers();
					resolve(err(asNetworkError(error, this.config.handshakeTimeoutMs)));
					return;
				}
				if (this.state === "closed") return;
				for (const handler of this.errorHandlers) {
					handler(error);
				}
			});

			ws.on("pong", () => {
				this.clearPongTimeout();
			});
		});
	}

	/**
	 * Sends a text frame.
	 * @param data - Serialized frame
	 * @returns ok, or a ConnectionError when the socket is not open or the write throws
	 */
	send(data: string): Result<void, ConnectionError> {
		if (this.state !== "open" || this.ws === null) {
			return err(new ConnectionError("WebSocket is not open", { state: this.state }));
		}
		try {
			this.ws.send(data);
			return ok(undefined);
		} catch (error) {
			return err(new ConnectionError("WebSocket send failed", { cause: error }));
		}
	}

	/**
	 * Starts the closing handshake and stops keepalive pings. Close handlers
	 * still fire once the socket is down.
	 * @param code - WebSocket close code
	 * @param reason - Close reason sent to the server
	 */
	close(code = 1000, reason = ""): void {
		this.clearTimers();
		if (this.ws === null || this.state === "closed" || this.state === "closing") return;
		if (this.state === "connecting") {
			this.state = "closed";
			const message = "WebSocket closed before the handshake completed";
			this.settleConnect?.(err(new NetworkError(message)));
			this.ws.terminate();
			return;
		}
		this.state = "closing";
		this.ws.close(code, reason);
	}

	onMessage(handler: WsMessageHandler): void {
		this.messageHandlers.push(handler);
	}

	onClose(handler: WsCloseHandler): void {
		this.closeHandlers.push(handler);
	}

	onError(handler: WsErrorHandler): void {
		this.errorHandlers.push(handler);
	}

	private startPing(): void {
		const interval = this.config.pingIntervalMs ?? 0;
		if (interval <= 0) return;
		const pongTimeout = this.config.pongTimeoutMs ?? interval;
		this.pingTimer = setInterval(() => {
			if (this.ws !== null && this.state === "open") {
				this.ws.ping();
				this.clearPongTimeout();
				this.pongTimer = setTimeout(() => {
					this.ws?.terminate();
				}, pongTimeout);
			}
		}, interval);
	}

	private clearTimers(): void {
		if (this.pingTimer !== null) {
			clearInterval(this.pingTimer);
			this.pingTimer = null;
		}
		this.clearPongTimeout();
	}

	private clearPongTimeout(): void {
		if (this.pongTimer !== null) {
			clearTimeout(this.pongTimer);
			this.pongTimer = null;
		}
	}
}
