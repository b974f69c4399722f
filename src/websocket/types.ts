import type { ClientError, ConnectionError, NetworkError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";

/** One physical socket. Built fresh for every connection attempt. */
export interface SocketLike {
	connect(): Promise<Result<void, NetworkError>>;
	send(data: string): Result<void, ConnectionError>;
	close(code?: number, reason?: string): void;
	onMessage(handler: (data: string) => void): void;
	onClose(handler: (code: number, reason: string) => void): void;
	onError(handler: (error: Error) => void): void;
}

export interface SocketOptions {
	readonly url: string;
	readonly handshakeTimeoutMs: number;
	readonly pingIntervalMs: number;
	readonly pongTimeoutMs: number;
}

export type SocketFactory = (options: SocketOptions) => SocketLike;

/** Resolves the URL before each attempt, for exchanges that hand out per-session endpoints. */
export type UrlResolver = () => Promise<Result<string, ClientError>>;

/** A classified inbound text frame. */
export type InboundMessage =
	| { readonly kind: "data"; readonly topic: string; readonly payload: unknown }
	/** Protocol-level ping from the server; `reply` goes straight back. */
	| { readonly kind: "ping"; readonly reply: string }
	| { readonly kind: "pong" }
	| { readonly kind: "ack"; readonly id?: string | number }
	| { readonly kind: "error"; readonly message: string; readonly code?: string | number }
	| { readonly kind: "ignored"; readonly reason: string };

export interface HeartbeatSpec {
	readonly intervalMs: number;
	frame(): string;
}

/** Wire dialect of one exchange's stream API. */
export interface WsProtocol {
	readonly name: string;
	subscribeFrame(topic: string): string;
	unsubscribeFrame(topic: string): string;
	classify(text: string): InboundMessage;
	readonly heartbeat?: HeartbeatSpec;
	/** Frames sent right after each successful handshake, before subscriptions are replayed. */
	onOpenFrames?(nowMs: number): Result<readonly string[], ClientError>;
}
