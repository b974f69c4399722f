export type {
	WsConfig,
	WsState,
	WsMessageHandler,
	WsCloseHandler,
	WsErrorHandler,
} from "./types.js";
export { WsClient } from "./client.js";
