import { validate, type z } from "../../lib/validation/index.js";
import { type Result, tryCatch } from "../../shared/result.js";
import type { InboundMessage } from "../types.js";

/** Parses a text frame as JSON; `undefined` when it is not JSON. */
export function parseFrame(text: string): unknown {
	const parsed: Result<unknown, Error> = tryCatch((): unknown => JSON.parse(text));
	return parsed.ok ? parsed.value : undefined;
}

/** Narrows a parsed frame against `schema`, or `undefined` when it does not match. */
export function match<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	frame: unknown,
): T | undefined {
	const result = validate(schema, frame);
	return result.ok ? result.value : undefined;
}

export function ignored(reason: string): InboundMessage {
	return { kind: "ignored", reason };
}
