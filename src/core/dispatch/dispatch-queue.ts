/**
 * A closure queued by a socket or timer callback, awaiting the consumer tick.
 */
export type PendingAction = () => void;

/**
 * Configuration for DispatchQueue
 */
export interface DispatchQueueConfig {
	/** Default cap on actions run per drain (default: 100) */
	maxPerDrain?: number;

	/** Enable debug logging */
	debug?: boolean;
}

/**
 * FIFO that marshals network callbacks onto the single consumer loop.
 *
 * Socket `data`/`message`/`close` handlers and timers never touch session,
 * room or synchronizer state themselves; they enqueue a closure here and the
 * game's per-tick update runs it through {@link drain}. Each drain is capped,
 * so a burst of traffic spreads over several ticks instead of stalling one.
 *
 * Node runs every callback on one event loop, so enqueue and drain never
 * interleave and need no lock.
 *
 * @example
 * ```ts
 * const queue = new DispatchQueue({ maxPerDrain: 64 });
 * socket.on("data", (chunk) => queue.enqueue(() => handle(chunk)));
 *
 * // once per frame
 * queue.drain();
 * ```
 */
export class DispatchQueue {
	private items: Array<PendingAction | undefined> = [];
	private head = 0;
	private readonly maxPerDrain: number;
	private readonly debug: boolean;

	constructor(config: DispatchQueueConfig = {}) {
		this.maxPerDrain = config.maxPerDrain ?? 100;
		this.debug = config.debug ?? false;

		if (!Number.isInteger(this.maxPerDrain) || this.maxPerDrain < 1) {
			throw new Error(`maxPerDrain must be a positive integer, got ${this.maxPerDrain}`);
		}
	}

	/**
	 * Queue an action for the next drain.
	 */
	enqueue(action: PendingAction): void {
		this.items.push(action);
	}

	/**
	 * Run up to `limit` queued actions in FIFO order.
	 * Actions left over (including ones enqueued while draining) wait for the next call.
	 * @returns Number of actions run
	 */
	drain(limit: number = this.maxPerDrain): number {
		let processed = 0;

		while (processed < limit && this.head < this.items.length) {
			const action = this.items[this.head];
			this.items[this.head] = undefined;
			this.head++;
			processed++;

			if (!action) continue;

			try {
				action();
			} catch (error) {
				console.error(`[DispatchQueue] Error executing queued action: ${error}`);
			}
		}

		this.compact();

		if (this.debug && this.size > 0) {
			console.log(`[DispatchQueue] ${this.size} action(s) carried over to next drain`);
		}

		return processed;
	}

	/**
	 * Number of actions waiting.
	 */
	get size(): number {
		return this.items.length - this.head;
	}

	/**
	 * Drop everything queued.
	 */
	clear(): void {
		this.items = [];
		this.head = 0;
	}

	private compact(): void {
		if (this.head === this.items.length) {
			this.items = [];
			this.head = 0;
		} else if (this.head > 1024 && this.head * 2 > this.items.length) {
			this.items = this.items.slice(this.head);
			this.head = 0;
		}
	}
}
