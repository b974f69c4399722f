/**
 * Time utilities — injectable clock so signing timestamps, idle detection
 * and heartbeats can be driven deterministically in tests.
 */

/** Injectable time source. Client code calls `clock.now()` instead of `Date.now()`. */
export interface Clock {
	now(): number;
}

/** Production clock backed by `Date.now()`. */
export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Clock that only moves when told to. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

/** Clock shifted by a fixed offset, used to follow the exchange's server time. */
export function offsetClock(base: Clock, offsetMs: number): Clock {
	return { now: () => base.now() + offsetMs };
}

export const Duration = {
	ms: (n: number) => n,
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
	hours: (n: number) => n * 3_600_000,
} as const;
