import { z } from "../../lib/validation/index.js";
import type { InboundMessage, WsProtocol } from "../types.js";
import { ignored, match, parseFrame } from "./frame.js";

export const MEXC_PING_INTERVAL_MS = 20_000;

const dataFrame = z.object({ c: z.string(), d: z.unknown() });
const replyFrame = z.object({ id: z.number().optional(), code: z.number(), msg: z.string() });

/** MEXC spot v3 JSON streams: `SUBSCRIPTION` requests, data frames keyed by channel `c`. */
export function mexcProtocol(): WsProtocol {
	return {
		name: "mexc",
		subscribeFrame: (topic) => JSON.stringify({ method: "SUBSCRIPTION", params: [topic] }),
		unsubscribeFrame: (topic) => JSON.stringify({ method: "UNSUBSCRIPTION", params: [topic] }),
		heartbeat: {
			intervalMs: MEXC_PING_INTERVAL_MS,
			frame: () => JSON.stringify({ method: "PING" }),
		},
		classify(text): InboundMessage {
			const frame = parseFrame(text);
			if (frame === undefined) return ignored("not json");
			const data = match(dataFrame, frame);
			if (data) return { kind: "data", topic: data.c, payload: data.d };
			const reply = match(replyFrame, frame);
			if (!reply) return ignored("unrecognized frame");
			if (reply.code !== 0) return { kind: "error", message: reply.msg, code: reply.code };
			if (reply.msg === "PONG") return { kind: "pong" };
			return reply.id === undefined ? { kind: "ack" } : { kind: "ack", id: reply.id };
		},
	};
}
