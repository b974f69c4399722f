export {
	type Result,
	ok,
	err,
	map,
	mapErr,
	andThen,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
	tryCatch,
} from "./result.js";

export {
	ErrorCategory,
	ClientError,
	CredentialError,
	ConfigError,
	TransportError,
	NetworkError,
	TimeoutError,
	EncodingError,
	DecodeError,
	ApiError,
	RateLimitError,
	ConnectionError,
	classifyError,
	isTransportError,
	isNetworkError,
	isDecodeError,
	isApiError,
	isRateLimitError,
	isCredentialError,
} from "./errors.js";

export { type Clock, SystemClock, FakeClock, offsetClock, Duration } from "./time.js";
export {
	type ClientConfig,
	type ReconnectionConfig,
	type WsConnectionConfig,
	type WsConnectionOverrides,
	CLIENT_VERSION,
	DEFAULT_CLIENT_CONFIG,
	DEFAULT_RECONNECTION_CONFIG,
	DEFAULT_WS_CONFIG,
	configFromEnv,
	resolveClientConfig,
	resolveWsConfig,
} from "./config.js";
