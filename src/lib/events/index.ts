import { EventEmitter } from "eventemitter3";

/**
 * Event map: keys are event names, values are handler signatures.
 * Example: { state: (s: ConnectionState) => void; frame: (topic: string) => void }
 */
// biome-ignore lint/suspicious/noExplicitAny: base constraint for event handler signatures
export type EventMap<T> = { [K in keyof T]: (...args: any[]) => void };

/**
 * Type-safe event emitter over eventemitter3. Handlers run synchronously
 * inside `emit`, so a throwing handler propagates to the emitter's caller.
 *
 * @example
 * ```ts
 * interface Events { state: (next: string, previous: string) => void }
 * const emitter = new TypedEmitter<Events>();
 * emitter.on("state", (next, previous) => console.log(previous, "->", next));
 * emitter.emit("state", "open", "connecting");
 * ```
 */
export class TypedEmitter<TEvents extends EventMap<TEvents>> {
	private readonly ee = new EventEmitter();

	/**
	 * Registers an event handler.
	 * @param event - Event name
	 * @param handler - Handler matching the event signature
	 */
	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, handler as (...args: unknown[]) => void);
		return this;
	}

	/**
	 * Removes a previously registered handler.
	 * @param event - Event name
	 * @param handler - The handler passed to `on` or `once`
	 */
	off<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.off(event, handler as (...args: unknown[]) => void);
		return this;
	}

	/**
	 * Registers a handler that removes itself after the first emission.
	 * @param event - Event name
	 * @param handler - Handler matching the event signature
	 */
	once<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.once(event, handler as (...args: unknown[]) => void);
		return this;
	}

	/**
	 * Invokes every handler registered for `event`, in registration order.
	 * @param event - Event name
	 * @param args - Arguments matching the event signature
	 * @returns false when nobody listens
	 */
	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}
}
