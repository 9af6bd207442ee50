import type { PingCommand } from "../protocol/messages/commands";

/**
 * Configuration for LatencyMonitor
 */
export interface LatencyMonitorConfig {
	/** Number of round-trip samples averaged (default: 10) */
	windowSize?: number;

	/** Clock in milliseconds (default: Date.now) */
	now?: () => number;

	/** Enable debug logging */
	debug?: boolean;
}

/**
 * Round-trip time estimate from timestamped PING / PING_RESPONSE pairs.
 *
 * The relay echoes the ping's timestamp, so a pong needs no bookkeeping on
 * this side: the sample is simply `now - timestamp`. Samples live in a fixed
 * ring; once full, each new sample evicts the oldest.
 *
 * @example
 * ```ts
 * const monitor = new LatencyMonitor({ windowSize: 10 });
 * session.sendReliable(monitor.createPing());
 * session.onMessage("PING_RESPONSE", (e) => monitor.recordPong(e.timestamp));
 * monitor.average; // ms
 * ```
 */
export class LatencyMonitor {
	private readonly samples: number[];
	private readonly windowSize: number;
	private readonly now: () => number;
	private readonly debug: boolean;
	private next = 0;
	private count = 0;
	private sum = 0;
	private last: number | null = null;

	constructor(config: LatencyMonitorConfig = {}) {
		this.windowSize = config.windowSize ?? 10;
		this.now = config.now ?? Date.now;
		this.debug = config.debug ?? false;

		if (!Number.isInteger(this.windowSize) || this.windowSize < 1) {
			throw new Error(`windowSize must be a positive integer, got ${this.windowSize}`);
		}

		this.samples = new Array<number>(this.windowSize).fill(0);
	}

	/**
	 * Build a PING stamped with the current clock.
	 */
	createPing(): PingCommand {
		return { type: "PING", timestamp: this.now() };
	}

	/**
	 * Record the round trip of an echoed ping timestamp.
	 * @returns The sample in milliseconds, or null when it was rejected
	 */
	recordPong(timestamp: number): number | null {
		const sample = this.now() - timestamp;

		if (!Number.isFinite(sample) || sample < 0) {
			this.log(`Rejected pong with timestamp ${timestamp} (sample ${sample})`);
			return null;
		}

		if (this.count === this.windowSize) {
			this.sum -= this.samples[this.next];
		} else {
			this.count++;
		}

		this.samples[this.next] = sample;
		this.sum += sample;
		this.next = (this.next + 1) % this.windowSize;
		this.last = sample;

		return sample;
	}

	/**
	 * Mean of the samples in the window, 0 before the first pong.
	 */
	get average(): number {
		return this.count === 0 ? 0 : this.sum / this.count;
	}

	get lastSample(): number | null {
		return this.last;
	}

	get sampleCount(): number {
		return this.count;
	}

	reset(): void {
		this.samples.fill(0);
		this.next = 0;
		this.count = 0;
		this.sum = 0;
		this.last = null;
	}

	private log(message: string): void {
		if (this.debug) {
			console.log(`[LatencyMonitor] ${message}`);
		}
	}
}
