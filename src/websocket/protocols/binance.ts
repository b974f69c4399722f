import { z } from "../../lib/validation/index.js";
import type { InboundMessage, WsProtocol } from "../types.js";
import { ignored, match, parseFrame } from "./frame.js";

const requestId = z.union([z.number(), z.string()]);

const dataFrame = z.object({ stream: z.string(), data: z.unknown() });
const ackFrame = z.object({ result: z.null(), id: requestId });
const errorFrame = z.object({
	error: z.object({ code: z.number(), msg: z.string() }),
	id: requestId.nullish(),
});

/**
 * Binance combined streams: connect to `/stream` and manage topics with
 * `SUBSCRIBE` / `UNSUBSCRIBE` requests. Keepalive pings are socket-level
 * and answered by the socket itself.
 */
export function binanceProtocol(): WsProtocol {
	let nextId = 1;
	const request = (method: "SUBSCRIBE" | "UNSUBSCRIBE", topic: string): string =>
		JSON.stringify({ method, params: [topic], id: nextId++ });

	return {
		name: "binance",
		subscribeFrame: (topic) => request("SUBSCRIBE", topic),
		unsubscribeFrame: (topic) => request("UNSUBSCRIBE", topic),
		classify(text): InboundMessage {
			const frame = parseFrame(text);
			if (frame === undefined) return ignored("not json");
			const data = match(dataFrame, frame);
			if (data) return { kind: "data", topic: data.stream, payload: data.data };
			const ack = match(ackFrame, frame);
			if (ack) return { kind: "ack", id: ack.id };
			const failure = match(errorFrame, frame);
			if (failure) return { kind: "error", message: failure.error.msg, code: failure.error.code };
			return ignored("unrecognized frame");
		},
	};
}
