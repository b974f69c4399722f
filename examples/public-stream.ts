/**
 * Public stream — prints Binance trades and the server time offset.
 *
 * No credentials needed.
 * Run: npx tsx examples/public-stream.ts
 */

import { createExchangeClient, requestSpec, z } from "../src/index.js";

const trade = z.object({
	s: z.string(),
	p: z.string(),
	q: z.string(),
	T: z.number(),
});

const ticker = z.object({ symbol: z.string(), price: z.string() });

const created = createExchangeClient("binance", { config: { logLevel: "info" } });
if (!created.ok) throw created.error;
const client = created.value;

const offset = await client.syncTime();
if (offset.ok) console.log(`clock offset ${offset.value}ms`);

const price = await client.call(
	requestSpec({ path: "/api/v3/ticker/price", query: { symbol: "BTCUSDT" } }),
	ticker,
);
if (price.ok) console.log(`${price.value.symbol} last ${price.value.price}`);
else console.error(price.error.toJSON());

const trades = await client.subscribe("spot", "btcusdt@trade", trade);
if (!trades.ok) {
	console.error(trades.error.toJSON());
	await client.close();
	process.exit(1);
}

client.connection("spot")?.on("state", (state) => console.log(`connection: ${state.status}`));

let seen = 0;
for await (const t of trades.value) {
	console.log(`${t.s} ${t.q} @ ${t.p}`);
	if (++seen >= 20) break;
}

await client.close();
