/**
 * Private stream — Bybit order updates on testnet, plus a signed wallet query.
 *
 * Reads BYBIT_API_KEY / BYBIT_API_SECRET. Settings such as EXCHANGE_CLIENT_TESTNET
 * come from the environment through configFromEnv().
 * Run: npx tsx examples/private-orders.ts
 */

import {
	configFromEnv,
	createCredentials,
	createExchangeClient,
	requestSpec,
} from "../src/index.js";

const apiKey = process.env["BYBIT_API_KEY"];
const secret = process.env["BYBIT_API_SECRET"];
if (!apiKey || !secret) {
	console.error("set BYBIT_API_KEY and BYBIT_API_SECRET");
	process.exit(1);
}

const created = createExchangeClient("bybit", {
	credentials: createCredentials({ apiKey, secret }),
	config: { testnet: true, ...configFromEnv() },
	ws: { reconnection: { maxAttempts: 10 } },
});
if (!created.ok) throw created.error;
const client = created.value;

await client.syncTime();

const wallet = await client.call(
	requestSpec({
		path: "/v5/account/wallet-balance",
		query: { accountType: "UNIFIED" },
		auth: "sign",
	}),
);
console.log(wallet.ok ? JSON.stringify(wallet.value) : wallet.error.message);

const orders = await client.subscribe("private", "order");
if (!orders.ok) {
	console.error(orders.error.message);
	await client.close();
	process.exit(1);
}

process.once("SIGINT", () => {
	void client.close();
});

for await (const update of orders.value) {
	console.log(JSON.stringify(update));
}
console.log(client.connection("private")?.stats());
