import { AsyncChannel } from "../lib/channel/index.js";
import { type ValidationError, validate, type z } from "../lib/validation/index.js";
import { type Result, ok } from "../shared/result.js";

export type Decoder<T> = (payload: unknown) => Result<T, ValidationError>;

export const passthrough: Decoder<unknown> = (payload) => ok(payload);

export function schemaDecoder<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): Decoder<T> {
	return (payload) => validate(schema, payload);
}

/** What the connection task sees of a subscriber. */
export interface SubscriberSink {
	readonly topic: string;
	readonly id: number | undefined;
	bind(id: number): void;
	/** Returns the decode error when the payload does not match. */
	deliver(payload: unknown): ValidationError | undefined;
	end(): void;
}

/**
 * Consumer side of one subscription: an async iterable of decoded payloads.
 *
 * `unsubscribe()`, or leaving a `for await` loop early, removes it from
 * its connection. The stream also ends when the connection is closed.
 */
export class TopicStream<T> implements AsyncIterableIterator<T>, SubscriberSink {
	readonly topic: string;
	private readonly channel: AsyncChannel<T>;
	private readonly decode: Decoder<T>;
	private readonly onCancel: (sink: SubscriberSink) => void;
	private boundId: number | undefined;
	private cancelled = false;
	private _decodeFailures = 0;

	constructor(
		topic: string,
		decode: Decoder<T>,
		onCancel: (sink: SubscriberSink) => void,
		bufferSize = 0,
	) {
		this.topic = topic;
		this.decode = decode;
		this.onCancel = onCancel;
		this.channel = new AsyncChannel({ bufferSize });
	}

	/** @internal Registry id, assigned by the connection task. */
	get id(): number | undefined {
		return this.boundId;
	}

	/** @internal */
	bind(id: number): void {
		this.boundId = id;
	}

	/** @internal */
	deliver(payload: unknown): ValidationError | undefined {
		const decoded = this.decode(payload);
		if (!decoded.ok) {
			this._decodeFailures += 1;
			return decoded.error;
		}
		this.channel.push(decoded.value);
		return undefined;
	}

	/** @internal End of stream, without notifying the connection. */
	end(): void {
		this.channel.close();
	}

	get ended(): boolean {
		return this.channel.closed;
	}

	/** Payloads discarded because the buffer was full. */
	get dropped(): number {
		return this.channel.dropped;
	}

	/** Payloads discarded because they failed to decode. */
	get decodeFailures(): number {
		return this._decodeFailures;
	}

	unsubscribe(): void {
		if (this.cancelled) return;
		this.cancelled = true;
		this.channel.close();
		this.onCancel(this);
	}

	next(): Promise<IteratorResult<T>> {
		return this.channel.next();
	}

	return(): Promise<IteratorResult<T>> {
		this.unsubscribe();
		return this.channel.return();
	}

	[Symbol.asyncIterator](): AsyncIterableIterator<T> {
		return this;
	}
}
