import { bench, describe } from "vitest";
import { SubscriptionRegistry } from "../src/websocket/subscription-registry.js";
import { binanceProtocol } from "../src/websocket/protocols/binance.js";
import { bybitProtocol } from "../src/websocket/protocols/bybit.js";

describe("inbound routing", () => {
	const registry = new SubscriptionRegistry<string>();
	for (let i = 0; i < 200; i++) {
		registry.add(`sym${i}@trade`, `sink-${i}a`);
		registry.add(`sym${i}@trade`, `sink-${i}b`);
	}

	const binance = binanceProtocol();
	const bybit = bybitProtocol();
	const binanceFrame = JSON.stringify({
		stream: "sym42@trade",
		data: { e: "trade", s: "SYM42", p: "101.5", q: "0.2", T: 1_700_000_000_000 },
	});
	const bybitFrame = JSON.stringify({
		topic: "publicTrade.SYM42",
		ts: 1_700_000_000_000,
		data: [{ s: "SYM42", p: "101.5", v: "0.2", S: "Buy" }],
	});

	bench("binance classify + lookup 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			const message = binance.classify(binanceFrame);
			if (message.kind === "data") registry.lookup(message.topic);
		}
	});

	bench("bybit classify 1000x", () => {
		for (let i = 0; i < 1000; i++) bybit.classify(bybitFrame);
	});

	bench("registry add/remove 1000x", () => {
		const scratch = new SubscriptionRegistry<number>();
		for (let i = 0; i < 1000; i++) {
			const { id } = scratch.add(`t${i % 50}`, i);
			scratch.remove(id);
		}
	});
});
