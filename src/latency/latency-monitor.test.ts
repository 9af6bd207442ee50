import { describe, expect, test } from "vitest";
import { LatencyMonitor } from "./latency-monitor";

function createMonitor(windowSize = 3) {
	const clock = { t: 10_000 };
	const monitor = new LatencyMonitor({ windowSize, now: () => clock.t });
	return { clock, monitor };
}

describe("LatencyMonitor", () => {
	test("createPing stamps the current clock", () => {
		const { monitor } = createMonitor();
		expect(monitor.createPing()).toEqual({ type: "PING", timestamp: 10_000 });
	});

	test("records the round trip of an echoed timestamp", () => {
		const { clock, monitor } = createMonitor();
		const ping = monitor.createPing();

		clock.t += 42;
		expect(monitor.recordPong(ping.timestamp)).toBe(42);
		expect(monitor.lastSample).toBe(42);
		expect(monitor.average).toBe(42);
		expect(monitor.sampleCount).toBe(1);
	});

	test("averages 0 before any sample", () => {
		const { monitor } = createMonitor();
		expect(monitor.average).toBe(0);
		expect(monitor.lastSample).toBeNull();
	});

	test("evicts the oldest sample once the window is full", () => {
		const { clock, monitor } = createMonitor(3);

		for (const rtt of [10, 20, 30, 100]) {
			monitor.recordPong(clock.t - rtt);
		}

		// window holds 20, 30, 100
		expect(monitor.sampleCount).toBe(3);
		expect(monitor.average).toBe(50);
		expect(monitor.lastSample).toBe(100);
	});

	test("rejects timestamps from the future", () => {
		const { clock, monitor } = createMonitor();

		expect(monitor.recordPong(clock.t + 5)).toBeNull();
		expect(monitor.sampleCount).toBe(0);
	});

	test("reset clears the window", () => {
		const { clock, monitor } = createMonitor();
		monitor.recordPong(clock.t - 15);

		monitor.reset();

		expect(monitor.sampleCount).toBe(0);
		expect(monitor.average).toBe(0);
		expect(monitor.lastSample).toBeNull();
	});

	test("rejects a non-positive window size", () => {
		expect(() => new LatencyMonitor({ windowSize: 0 })).toThrow("windowSize must be a positive integer, got 0");
	});
});
