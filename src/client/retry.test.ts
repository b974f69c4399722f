import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ApiError, CredentialError, NetworkError, RateLimitError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { DEFAULT_RETRY_CONFIG, computeDelay, withRetry } from "./retry.js";

type CallResult = Result<string, NetworkError | ApiError | CredentialError | RateLimitError>;

function scripted(results: CallResult[]): () => Promise<CallResult> {
	return vi.fn(async () => results.shift() ?? err(new NetworkError("script exhausted")));
}

describe("computeDelay", () => {
	const noJitter = { ...DEFAULT_RETRY_CONFIG, jitterFactor: 0 };

	it("doubles per attempt up to the cap", () => {
		const e = new NetworkError("down");
		expect(computeDelay(0, noJitter, e)).toBe(200);
		expect(computeDelay(1, noJitter, e)).toBe(400);
		expect(computeDelay(10, noJitter, e)).toBe(5_000);
	});

	it("waits at least retryAfterMs for rate limits", () => {
		const e = new RateLimitError("slow down", 429, 3_000);
		expect(computeDelay(0, noJitter, e)).toBe(3_000);
	});

	it("never lets jitter pull a rate-limit wait below retryAfterMs", () => {
		const e = new RateLimitError("slow down", 429, 2_000);
		expect(computeDelay(0, DEFAULT_RETRY_CONFIG, e, () => 0)).toBe(2_000);
		expect(computeDelay(4, DEFAULT_RETRY_CONFIG, e, () => 1)).toBeCloseTo(3_840);
	});

	it("keeps jitter within the factor", () => {
		const config = { ...DEFAULT_RETRY_CONFIG, jitterFactor: 0.5 };
		const e = new NetworkError("down");
		expect(computeDelay(0, config, e, () => 0)).toBe(100);
		expect(computeDelay(0, config, e, () => 1)).toBe(300);
	});
});

describe("withRetry", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("returns the first success without waiting", async () => {
		const op = scripted([ok("done")]);
		expect(await withRetry(op)).toEqual(ok("done"));
		expect(op).toHaveBeenCalledTimes(1);
	});

	it("retries retryable errors until success", async () => {
		const op = scripted([err(new NetworkError("reset")), ok("done")]);
		const pending = withRetry(op, { jitterFactor: 0 });
		await vi.advanceTimersByTimeAsync(200);
		expect(await pending).toEqual(ok("done"));
		expect(op).toHaveBeenCalledTimes(2);
	});

	it("gives back non-retryable errors immediately", async () => {
		const failure = new ApiError("Invalid symbol.", 400, -1121, "{}");
		const op = scripted([err(failure), ok("never")]);
		const result = await withRetry(op);
		expect(result).toEqual(err(failure));
		expect(op).toHaveBeenCalledTimes(1);
	});

	it("stops after maxAttempts", async () => {
		const op = scripted([
			err(new NetworkError("1")),
			err(new NetworkError("2")),
			err(new NetworkError("3")),
			ok("late"),
		]);
		const pending = withRetry(op, { maxAttempts: 3, jitterFactor: 0 });
		await vi.advanceTimersByTimeAsync(200 + 400);
		const result = await pending;
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.message).toBe("3");
		expect(op).toHaveBeenCalledTimes(3);
	});

	it("retries server-side api errors", async () => {
		const op = scripted([err(new ApiError("busy", 503, undefined, "")), ok("done")]);
		const pending = withRetry(op, { jitterFactor: 0 });
		await vi.advanceTimersByTimeAsync(200);
		expect(await pending).toEqual(ok("done"));
	});
});
