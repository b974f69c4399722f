import { createHmac } from "node:crypto";
import { describe, expect, it } from "vitest";
import { createAuthenticator, createCredentials, disposeCredentials } from "../../auth/index.js";
import { binanceProtocol } from "./binance.js";
import { bybitProtocol } from "./bybit.js";
import { kucoinProtocol } from "./kucoin.js";
import { mexcProtocol } from "./mexc.js";

describe("binanceProtocol", () => {
	it("numbers subscribe and unsubscribe requests", () => {
		const protocol = binanceProtocol();
		expect(JSON.parse(protocol.subscribeFrame("btcusdt@trade"))).toEqual({
			method: "SUBSCRIBE",
			params: ["btcusdt@trade"],
			id: 1,
		});
		expect(JSON.parse(protocol.unsubscribeFrame("btcusdt@trade"))).toEqual({
			method: "UNSUBSCRIBE",
			params: ["btcusdt@trade"],
			id: 2,
		});
	});

	it("routes combined-stream frames by stream name", () => {
		const text = JSON.stringify({ stream: "btcusdt@trade", data: { p: "100.5" } });
		expect(binanceProtocol().classify(text)).toEqual({
			kind: "data",
			topic: "btcusdt@trade",
			payload: { p: "100.5" },
		});
	});

	it("recognizes acks and errors", () => {
		const protocol = binanceProtocol();
		expect(protocol.classify('{"result":null,"id":3}')).toEqual({ kind: "ack", id: 3 });
		expect(protocol.classify('{"error":{"code":2,"msg":"Invalid request"},"id":4}')).toEqual({
			kind: "error",
			message: "Invalid request",
			code: 2,
		});
	});

	it("ignores text that is not json", () => {
		expect(binanceProtocol().classify("hello")).toEqual({ kind: "ignored", reason: "not json" });
	});

	it("leaves keepalive to the socket", () => {
		expect(binanceProtocol().heartbeat).toBeUndefined();
	});
});

describe("bybitProtocol", () => {
	it("builds op frames and a json ping", () => {
		const protocol = bybitProtocol();
		expect(protocol.subscribeFrame("publicTrade.BTCUSDT")).toBe(
			'{"op":"subscribe","args":["publicTrade.BTCUSDT"]}',
		);
		expect(protocol.unsubscribeFrame("publicTrade.BTCUSDT")).toBe(
			'{"op":"unsubscribe","args":["publicTrade.BTCUSDT"]}',
		);
		expect(protocol.heartbeat?.intervalMs).toBe(20_000);
		expect(protocol.heartbeat?.frame()).toBe('{"op":"ping"}');
	});

	it("classifies data, pongs, acks and failures", () => {
		const protocol = bybitProtocol();
		const data = JSON.stringify({
			topic: "orderbook.1.BTCUSDT",
			type: "snapshot",
			ts: 1,
			data: { b: [] },
		});
		expect(protocol.classify(data)).toEqual({
			kind: "data",
			topic: "orderbook.1.BTCUSDT",
			payload: { b: [] },
		});
		expect(protocol.classify('{"success":true,"ret_msg":"pong","op":"ping"}')).toEqual({
			kind: "pong",
		});
		expect(protocol.classify('{"op":"pong","args":["1"]}')).toEqual({ kind: "pong" });
		expect(protocol.classify('{"success":true,"ret_msg":"","op":"subscribe","req_id":"7"}')).toEqual(
			{ kind: "ack", id: "7" },
		);
		expect(
			protocol.classify('{"success":false,"ret_msg":"Request not authorized","op":"subscribe"}'),
		).toEqual({ kind: "error", message: "Request not authorized" });
	});

	it("sends no opening frames without an authenticator", () => {
		const frames = bybitProtocol().onOpenFrames?.(0);
		expect(frames).toEqual({ ok: true, value: [] });
	});

	it("authenticates with a signed auth frame that expires after the window", () => {
		const created = createAuthenticator(
			"bybit",
			createCredentials({ apiKey: "test-key", secret: "test-secret" }),
		);
		if (!created.ok) throw created.error;
		const protocol = bybitProtocol({ authenticator: created.value, authExpiryMs: 1_000 });

		const frames = protocol.onOpenFrames?.(1_700_000_000_000);
		const expires = 1_700_000_001_000;
		const signature = createHmac("sha256", "test-secret")
			.update(`GET/realtime${expires}`)
			.digest("hex");
		expect(frames).toEqual({
			ok: true,
			value: [JSON.stringify({ op: "auth", args: ["test-key", expires, signature] })],
		});
	});

	it("reports an error once the credentials are disposed", () => {
		const credentials = createCredentials({ apiKey: "test-key", secret: "test-secret" });
		const created = createAuthenticator("bybit", credentials);
		if (!created.ok) throw created.error;
		disposeCredentials(credentials);
		expect(bybitProtocol({ authenticator: created.value }).onOpenFrames?.(0)?.ok).toBe(false);
	});
});

describe("mexcProtocol", () => {
	it("builds subscription requests and a PING heartbeat", () => {
		const protocol = mexcProtocol();
		expect(protocol.subscribeFrame("spot@public.deals.v3.api@BTCUSDT")).toBe(
			'{"method":"SUBSCRIPTION","params":["spot@public.deals.v3.api@BTCUSDT"]}',
		);
		expect(protocol.unsubscribeFrame("spot@public.deals.v3.api@BTCUSDT")).toBe(
			'{"method":"UNSUBSCRIPTION","params":["spot@public.deals.v3.api@BTCUSDT"]}',
		);
		expect(protocol.heartbeat?.frame()).toBe('{"method":"PING"}');
	});

	it("classifies channel data, pongs, acks and errors", () => {
		const protocol = mexcProtocol();
		const data = JSON.stringify({ c: "spot@public.deals.v3.api@BTCUSDT", d: { deals: [] }, t: 1 });
		expect(protocol.classify(data)).toEqual({
			kind: "data",
			topic: "spot@public.deals.v3.api@BTCUSDT",
			payload: { deals: [] },
		});
		expect(protocol.classify('{"id":0,"code":0,"msg":"PONG"}')).toEqual({ kind: "pong" });
		expect(protocol.classify('{"id":0,"code":0,"msg":"spot@public.deals.v3.api@BTCUSDT"}')).toEqual({
			kind: "ack",
			id: 0,
		});
		expect(protocol.classify('{"id":0,"code":1,"msg":"Not Subscribed successfully"}')).toEqual({
			kind: "error",
			message: "Not Subscribed successfully",
			code: 1,
		});
	});
});

describe("kucoinProtocol", () => {
	it("asks for a response on subscribe and unsubscribe", () => {
		const protocol = kucoinProtocol();
		expect(JSON.parse(protocol.subscribeFrame("/market/ticker:BTC-USDT"))).toEqual({
			id: "1",
			type: "subscribe",
			topic: "/market/ticker:BTC-USDT",
			privateChannel: false,
			response: true,
		});
		expect(JSON.parse(protocol.unsubscribeFrame("/market/ticker:BTC-USDT"))).toMatchObject({
			id: "2",
			type: "unsubscribe",
		});
		expect(JSON.parse(protocol.heartbeat?.frame() ?? "")).toEqual({ id: "3", type: "ping" });
	});

	it("classifies each frame type", () => {
		const protocol = kucoinProtocol();
		const message = JSON.stringify({
			type: "message",
			topic: "/market/ticker:BTC-USDT",
			subject: "trade.ticker",
			data: { price: "1" },
		});
		expect(protocol.classify(message)).toEqual({
			kind: "data",
			topic: "/market/ticker:BTC-USDT",
			payload: { price: "1" },
		});
		expect(protocol.classify('{"id":"w1","type":"welcome"}')).toEqual({ kind: "ack", id: "w1" });
		expect(protocol.classify('{"id":"5","type":"ack"}')).toEqual({ kind: "ack", id: "5" });
		expect(protocol.classify('{"id":"6","type":"pong"}')).toEqual({ kind: "pong" });
		expect(protocol.classify('{"id":"9","type":"ping"}')).toEqual({
			kind: "ping",
			reply: '{"id":"9","type":"pong"}',
		});
		expect(protocol.classify('{"id":"7","type":"error","code":404,"data":"topic not found"}')).toEqual(
			{ kind: "error", message: "topic not found", code: 404 },
		);
		expect(protocol.classify('{"type":"notice"}')).toEqual({
			kind: "ignored",
			reason: "unhandled type notice",
		});
	});
});
