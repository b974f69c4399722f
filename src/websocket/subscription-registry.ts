/**
 * Topic → delivery targets, with stable per-target ids.
 *
 * Only the first `add` of a topic and the `remove` of its last target
 * report `first` / `last`, which is what drives the wire-level
 * subscribe and unsubscribe frames. Topics iterate in insertion order.
 */
export class SubscriptionRegistry<T> {
	private readonly byTopic = new Map<string, Map<number, T>>();
	private readonly topicOf = new Map<number, string>();
	private nextId = 1;

	add(topic: string, target: T): { readonly id: number; readonly first: boolean } {
		const id = this.nextId++;
		let targets = this.byTopic.get(topic);
		const first = targets === undefined;
		if (targets === undefined) {
			targets = new Map();
			this.byTopic.set(topic, targets);
		}
		targets.set(id, target);
		this.topicOf.set(id, topic);
		return { id, first };
	}

	/** `null` for an unknown or already-removed id. */
	remove(id: number): { readonly topic: string; readonly last: boolean } | null {
		const topic = this.topicOf.get(id);
		if (topic === undefined) return null;
		this.topicOf.delete(id);
		const targets = this.byTopic.get(topic);
		targets?.delete(id);
		const last = targets === undefined || targets.size === 0;
		if (last) this.byTopic.delete(topic);
		return { topic, last };
	}

	lookup(topic: string): readonly T[] {
		const targets = this.byTopic.get(topic);
		return targets === undefined ? [] : [...targets.values()];
	}

	has(topic: string): boolean {
		return this.byTopic.has(topic);
	}

	topics(): string[] {
		return [...this.byTopic.keys()];
	}

	/** Number of distinct topics. */
	get size(): number {
		return this.byTopic.size;
	}

	/** Empties the registry and returns every target it held. */
	clear(): T[] {
		const all: T[] = [];
		for (const targets of this.byTopic.values()) all.push(...targets.values());
		this.byTopic.clear();
		this.topicOf.clear();
		return all;
	}
}
