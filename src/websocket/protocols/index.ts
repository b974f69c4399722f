export { binanceProtocol } from "./binance.js";
export { BYBIT_PING_INTERVAL_MS, type BybitProtocolOptions, bybitProtocol } from "./bybit.js";
export { KUCOIN_PING_INTERVAL_MS, type KucoinProtocolOptions, kucoinProtocol } from "./kucoin.js";
export { MEXC_PING_INTERVAL_MS, mexcProtocol } from "./mexc.js";
