export {
	type ExchangeClientOptions,
	type Schema,
	ExchangeClient,
	createExchangeClient,
	parseRetryAfter,
} from "./exchange-client.js";
export {
	type Endpoint,
	type ExchangeErrorBody,
	type ExchangeProfile,
	type ServerTimeProbe,
	type StreamContext,
	type StreamProfile,
	ExchangeName,
	PROFILES,
	pickEndpoint,
} from "./profiles.js";
export { DEFAULT_RETRY_CONFIG, type RetryConfig, computeDelay, withRetry } from "./retry.js";
