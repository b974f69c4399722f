/**
 * Configuration for a single WebSocket connection attempt.
 */
export interface WsConfig {
	/** WebSocket server URL (ws:// or wss://) */
	readonly url: string;
	/** Opening handshake deadline. */
	readonly handshakeTimeoutMs: number;
	/** Interval between socket-level ping frames. 0 or absent disables keepalive pings. */
	readonly pingIntervalMs?: number;
	/** Timeout waiting for pong response before terminating the connection. */
	readonly pongTimeoutMs?: number;
}

/**
 * WebSocket connection lifecycle state.
 * - `connecting`: Connection in progress
 * - `open`: Connected and ready
 * - `closing`: Close initiated
 * - `closed`: Connection terminated
 */
export type WsState = "connecting" | "open" | "closing" | "closed";

export type WsMessageHandler = (data: string) => void;

export type WsCloseHandler = (code: number, reason: string) => void;

export type WsErrorHandler = (error: Error) => void;
