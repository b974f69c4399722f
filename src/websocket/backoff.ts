import type { ReconnectionConfig } from "../shared/config.js";

/**
 * Exponential backoff for reconnection attempts.
 *
 * Delays start at `baseDelayMs`, double per attempt and stop growing at
 * `maxDelayMs`. With jitter, each delay is randomized and then clamped so
 * the sequence stays non-decreasing and capped. `reset()` after a
 * successful open starts over from the base.
 */
export class ReconnectionPolicy {
	private readonly config: ReconnectionConfig;
	private readonly random: () => number;
	private attempts = 0;
	private lastDelay = 0;

	constructor(config: ReconnectionConfig, random: () => number = Math.random) {
		this.config = config;
		this.random = random;
	}

	/** Attempts handed out since the last reset. */
	get attempt(): number {
		return this.attempts;
	}

	nextDelay(): number {
		const raw = this.config.baseDelayMs * 2 ** this.attempts;
		const capped = Math.min(raw, this.config.maxDelayMs);
		this.attempts += 1;
		if (this.config.jitterFactor === 0) {
			this.lastDelay = capped;
			return capped;
		}
		const jitter = capped * this.config.jitterFactor * (this.random() * 2 - 1);
		const delay = Math.min(
			this.config.maxDelayMs,
			Math.max(this.lastDelay, Math.round(capped + jitter)),
		);
		this.lastDelay = delay;
		return delay;
	}

	reset(): void {
		this.attempts = 0;
		this.lastDelay = 0;
	}

	shouldRetry(): boolean {
		return this.attempts < this.config.maxAttempts;
	}
}
