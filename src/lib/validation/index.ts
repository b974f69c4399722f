/**
 * Validation wrapper — thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Client code uses this instead of importing Zod directly, and re-exports `z`
 * so response and frame schemas are declared through a single import path.
 */

import { z } from "zod";
import { ClientError, ErrorCategory } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

export class ValidationError extends ClientError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorCategory.NonRetryable);
		this.name = "ValidationError";
		this.issues = issues;
	}

	/** One line per issue, `path: message`. */
	describe(): string {
		return this.issues
			.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
			.join("; ");
	}
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	return err(new ValidationError("Validation failed", issues));
}

/** Parse JSON text, then validate it. A syntax error becomes a single root-level issue. */
export function parseJson<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	text: string,
): Result<T, ValidationError> {
	let data: unknown;
	try {
		data = JSON.parse(text);
	} catch (e) {
		const message = e instanceof Error ? e.message : String(e);
		return err(new ValidationError("Invalid JSON", [{ path: [], message }]));
	}
	return validate(schema, data);
}
