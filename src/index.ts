// ── Shared Kernel ────────────────────────────────────────────────────
export * from "./shared/index.js";

// ── Client ───────────────────────────────────────────────────────────
export * from "./client/index.js";

// ── HTTP ─────────────────────────────────────────────────────────────
export * from "./http/index.js";

// ── Auth ─────────────────────────────────────────────────────────────
export * from "./auth/index.js";

// ── WebSocket ────────────────────────────────────────────────────────
export * from "./websocket/index.js";

// ── Lib: WebSocket ───────────────────────────────────────────────────
export { WsClient } from "./lib/websocket/index.js";
export type { WsConfig, WsState } from "./lib/websocket/index.js";

// ── Lib: Logger ──────────────────────────────────────────────────────
export { createLogger, silentLogger } from "./lib/logger/index.js";
export type { Logger, LoggerConfig, LogLevel } from "./lib/logger/index.js";

// ── Lib: Validation ──────────────────────────────────────────────────
export { validate, parseJson, ValidationError, z } from "./lib/validation/index.js";
export type { ValidationIssue } from "./lib/validation/index.js";

// ── Lib: Events ──────────────────────────────────────────────────────
export { TypedEmitter } from "./lib/events/index.js";
export type { EventMap } from "./lib/events/index.js";

// ── Lib: Channel ─────────────────────────────────────────────────────
export { AsyncChannel, type ChannelOptions } from "./lib/channel/index.js";
