import { z } from "../../lib/validation/index.js";
import type { InboundMessage, WsProtocol } from "../types.js";
import { ignored, match, parseFrame } from "./frame.js";

/** KuCoin's advertised ping interval for the public bullet endpoint. */
export const KUCOIN_PING_INTERVAL_MS = 18_000;

const messageId = z.union([z.string(), z.number()]);

const envelope = z.object({
	type: z.string(),
	id: messageId.optional(),
	topic: z.string().optional(),
	data: z.unknown(),
	code: z.union([z.string(), z.number()]).optional(),
});

/**
 * KuCoin: `type`-keyed frames. Data arrives as `type: "message"` with its
 * `topic`; the server may also ping, which is answered with a pong of the
 * same id.
 */
export interface KucoinProtocolOptions {
	/** Marks subscriptions as private-channel requests; needs a private bullet URL. */
	readonly privateChannel?: boolean;
}

export function kucoinProtocol(options: KucoinProtocolOptions = {}): WsProtocol {
	const privateChannel = options.privateChannel ?? false;
	let nextId = 1;
	const request = (type: "subscribe" | "unsubscribe", topic: string): string =>
		JSON.stringify({ id: String(nextId++), type, topic, privateChannel, response: true });

	return {
		name: "kucoin",
		subscribeFrame: (topic) => request("subscribe", topic),
		unsubscribeFrame: (topic) => request("unsubscribe", topic),
		heartbeat: {
			intervalMs: KUCOIN_PING_INTERVAL_MS,
			frame: () => JSON.stringify({ id: String(nextId++), type: "ping" }),
		},
		classify(text): InboundMessage {
			const frame = parseFrame(text);
			if (frame === undefined) return ignored("not json");
			const msg = match(envelope, frame);
			if (!msg) return ignored("unrecognized frame");
			switch (msg.type) {
				case "message":
					if (msg.topic === undefined) return ignored("message without topic");
					return { kind: "data", topic: msg.topic, payload: msg.data };
				case "ping":
					return { kind: "ping", reply: JSON.stringify({ id: msg.id, type: "pong" }) };
				case "pong":
					return { kind: "pong" };
				case "welcome":
				case "ack":
					return msg.id === undefined ? { kind: "ack" } : { kind: "ack", id: msg.id };
				case "error": {
					const message = typeof msg.data === "string" ? msg.data : "error frame";
					return msg.code === undefined
						? { kind: "error", message }
						: { kind: "error", message, code: msg.code };
				}
				default:
					return ignored(`unhandled type ${msg.type}`);
			}
		},
	};
}
