/**
 * Caller-side retry with exponential backoff and jitter.
 *
 * The client never retries on its own. Wrap a call in `withRetry` to retry
 * errors marked `isRetryable`; everything else comes back on the first try.
 */

import { type ClientError, RateLimitError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";

export interface RetryConfig {
	/** Total attempts, the first one included. */
	readonly maxAttempts: number;
	readonly baseDelayMs: number;
	readonly maxDelayMs: number;
	/** 0 disables jitter; 0.2 spreads each delay by ±20%. */
	readonly jitterFactor: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
	maxAttempts: 3,
	baseDelayMs: 200,
	maxDelayMs: 5_000,
	jitterFactor: 0.2,
};

/** @internal Exported for testing only. */
export function computeDelay(
	attempt: number,
	config: RetryConfig,
	error: ClientError,
	random: () => number = Math.random,
): number {
	const exponential = config.baseDelayMs * 2 ** attempt;
	const jitter = 1 + (random() - 0.5) * 2 * config.jitterFactor;
	const delay = Math.min(exponential, config.maxDelayMs) * jitter;

	if (error instanceof RateLimitError && error.retryAfterMs !== undefined) {
		return Math.max(delay, error.retryAfterMs);
	}
	return delay;
}

function sleep(ms: number): Promise<void> {
	if (ms <= 0) return Promise.resolve();
	return new Promise((resolve) => {
		setTimeout(resolve, ms);
	});
}

/**
 * Runs `operation` until it succeeds, fails with a non-retryable error, or
 * the attempts run out. A `RateLimitError` waits at least its `retryAfterMs`.
 *
 * @example
 * ```ts
 * const ticker = await withRetry(() => client.call(spec, tickerSchema), { maxAttempts: 5 });
 * ```
 */
export async function withRetry<T, E extends ClientError>(
	operation: () => Promise<Result<T, E>>,
	config?: Partial<RetryConfig>,
): Promise<Result<T, E>> {
	const resolved: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
	let lastResult = await operation();

	for (let attempt = 1; attempt < resolved.maxAttempts; attempt++) {
		if (lastResult.ok || !lastResult.error.isRetryable) return lastResult;
		await sleep(computeDelay(attempt - 1, resolved, lastResult.error));
		lastResult = await operation();
	}

	return lastResult;
}
