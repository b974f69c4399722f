import type { Authenticator } from "../../auth/index.js";
import { z } from "../../lib/validation/index.js";
import { ok } from "../../shared/result.js";
import type { InboundMessage, WsProtocol } from "../types.js";
import { ignored, match, parseFrame } from "./frame.js";

export const BYBIT_PING_INTERVAL_MS = 20_000;
export const BYBIT_AUTH_EXPIRY_MS = 1_000;

const dataFrame = z.object({ topic: z.string(), data: z.unknown() });
const operationFrame = z.object({
	op: z.string(),
	success: z.boolean().optional(),
	ret_msg: z.string().optional(),
	req_id: z.string().optional(),
});

export interface BybitProtocolOptions {
	/** Authenticates private streams with an `auth` frame on every open. */
	readonly authenticator?: Authenticator;
	readonly authExpiryMs?: number;
}

/** Bybit v5: `op`-keyed requests, data frames keyed by `topic`, JSON ping every 20s. */
export function bybitProtocol(options: BybitProtocolOptions = {}): WsProtocol {
	const { authenticator } = options;
	const expiry = options.authExpiryMs ?? BYBIT_AUTH_EXPIRY_MS;

	return {
		name: "bybit",
		subscribeFrame: (topic) => JSON.stringify({ op: "subscribe", args: [topic] }),
		unsubscribeFrame: (topic) => JSON.stringify({ op: "unsubscribe", args: [topic] }),
		heartbeat: {
			intervalMs: BYBIT_PING_INTERVAL_MS,
			frame: () => JSON.stringify({ op: "ping" }),
		},
		onOpenFrames(nowMs) {
			if (!authenticator) return ok([]);
			const message = authenticator.buildWsAuthMessage(nowMs + expiry);
			return message.ok ? ok([message.value]) : message;
		},
		classify(text): InboundMessage {
			const frame = parseFrame(text);
			if (frame === undefined) return ignored("not json");
			const data = match(dataFrame, frame);
			if (data) return { kind: "data", topic: data.topic, payload: data.data };
			const operation = match(operationFrame, frame);
			if (!operation) return ignored("unrecognized frame");
			if (operation.success === false) {
				return { kind: "error", message: operation.ret_msg ?? `${operation.op} failed` };
			}
			if (operation.op === "pong" || operation.op === "ping") return { kind: "pong" };
			if (operation.req_id === undefined) return { kind: "ack" };
			return { kind: "ack", id: operation.req_id };
		},
	};
}
