export { ReconnectionPolicy } from "./backoff.js";
export {
	type ConnectionEvents,
	ConnectionHandle,
	type ConnectionHandleOptions,
	type ConnectionStats,
} from "./connection-handle.js";
export {
	type CloseReason,
	type ConnectionEvent,
	type ConnectionState,
	type ConnectionStatus,
	INITIAL_STATE,
	isLive,
	transition,
} from "./connection-state.js";
export { SubscriptionRegistry } from "./subscription-registry.js";
export {
	type Decoder,
	passthrough,
	schemaDecoder,
	type SubscriberSink,
	TopicStream,
} from "./topic-stream.js";
export type {
	HeartbeatSpec,
	InboundMessage,
	SocketFactory,
	SocketLike,
	SocketOptions,
	UrlResolver,
	WsProtocol,
} from "./types.js";
export * from "./protocols/index.js";
