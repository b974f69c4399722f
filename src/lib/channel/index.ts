/**
 * AsyncChannel — single-consumer queue exposed as an async iterable.
 *
 * Producers call `push()` synchronously; the consumer awaits `next()` or
 * iterates with `for await`. With `bufferSize` set, the oldest queued item
 * is discarded when the queue is full and `dropped` counts the losses.
 */

export interface ChannelOptions {
	/** Maximum queued items before drop-oldest kicks in. 0 or absent means unbounded. */
	readonly bufferSize?: number;
}

export class AsyncChannel<T> implements AsyncIterableIterator<T> {
	private readonly queue: Array<{ readonly value: T }> = [];
	private readonly waiters: Array<(result: IteratorResult<T>) => void> = [];
	private readonly bufferSize: number;
	private _closed = false;
	private _dropped = 0;

	constructor(options: ChannelOptions = {}) {
		this.bufferSize = options.bufferSize ?? 0;
	}

	get closed(): boolean {
		return this._closed;
	}

	get dropped(): number {
		return this._dropped;
	}

	/** Items queued and not yet taken. */
	get size(): number {
		return this.queue.length;
	}

	/** Returns false once the channel is closed. */
	push(value: T): boolean {
		if (this._closed) return false;
		const waiter = this.waiters.shift();
		if (waiter) {
			waiter({ value, done: false });
			return true;
		}
		this.queue.push({ value });
		if (this.bufferSize > 0 && this.queue.length > this.bufferSize) {
			this.queue.shift();
			this._dropped += 1;
		}
		return true;
	}

	/** Ends the stream. Items already queued are still handed out. */
	close(): void {
		if (this._closed) return;
		this._closed = true;
		for (const waiter of this.waiters.splice(0)) {
			waiter({ value: undefined, done: true });
		}
	}

	next(): Promise<IteratorResult<T>> {
		const item = this.queue.shift();
		if (item) {
			return Promise.resolve({ value: item.value, done: false });
		}
		if (this._closed) {
			return Promise.resolve({ value: undefined, done: true });
		}
		return new Promise((resolve) => this.waiters.push(resolve));
	}

	return(): Promise<IteratorResult<T>> {
		this.close();
		this.queue.length = 0;
		return Promise.resolve({ value: undefined, done: true });
	}

	[Symbol.asyncIterator](): AsyncIterableIterator<T> {
		return this;
	}
}
