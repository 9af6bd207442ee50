import { describe, expect, it } from "vitest";
import type { PlayerState, Vec3 } from "../protocol/messages/types";
import { StateSynchronizer, type ApplyStateResult } from "./state-synchronizer";

const ZERO: Vec3 = { x: 0, y: 0, z: 0 };

function state(playerId: string, x: number, timestamp: number, velocity: Vec3 = ZERO): PlayerState {
  return {
    playerId,
    position: { x, y: 0, z: 0 },
    rotation: { x: 0, y: 0, z: 0, w: 1 },
    velocity,
    angularVelocity: ZERO,
    timestamp,
  };
}

function createSync(localId: string | undefined = "local") {
  return new StateSynchronizer({ localId: () => localId, desyncThreshold: 5, blendRate: 10 });
}

describe("StateSynchronizer.applyState", () => {
  it("teleports on first contact", () => {
    const sync = createSync();

    expect(sync.applyState(state("p2", 3, 1.0))).toBe("first-contact");

    const record = sync.get("p2");
    expect(record?.current.position).toEqual({ x: 3, y: 0, z: 0 });
    expect(record?.target.position).toEqual({ x: 3, y: 0, z: 0 });
    expect(record?.lastTimestamp).toBe(1.0);
    expect(sync.players()).toEqual(["p2"]);
  });

  it("ignores states of the local player", () => {
    const sync = createSync();

    expect(sync.applyState(state("local", 3, 1.0))).toBe("ignored-local");
    expect(sync.players()).toEqual([]);
  });

  it("discards a state older than the last applied one", () => {
    const sync = createSync();
    sync.applyState(state("p2", 1, 5.0));

    expect(sync.applyState(state("p2", 2, 4.0))).toBe("stale");

    const record = sync.get("p2");
    expect(record?.lastTimestamp).toBe(5.0);
    expect(record?.target.position.x).toBe(1);
  });

  it("keeps the applied timestamp monotonic over a shuffled stream", () => {
    const sync = createSync();
    const applied: number[] = [];

    for (const timestamp of [1, 3, 2, 4, 4, 0.5, 6, 5]) {
      const result = sync.applyState(state("p2", timestamp * 0.1, timestamp));
      if (result !== "stale") applied.push(timestamp);
      expect(sync.get("p2")?.lastTimestamp).toBe(Math.max(...applied));
    }

    expect(applied).toEqual([1, 3, 4, 4, 6]);
  });

  it("snaps when the drift exceeds the threshold", () => {
    const sync = createSync();
    sync.applyState(state("p2", 0, 1));

    expect(sync.applyState(state("p2", 10, 2))).toBe("snapped");
    expect(sync.get("p2")?.current.position).toEqual({ x: 10, y: 0, z: 0 });
  });

  it("sets a nearby state as the interpolation target", () => {
    const sync = createSync();
    sync.applyState(state("p2", 0, 1));

    expect(sync.applyState(state("p2", 2, 2))).toBe("interpolating");

    const record = sync.get("p2");
    expect(record?.current.position.x).toBe(0);
    expect(record?.target.position.x).toBe(2);
  });

  it("emits stateApplied for remote players only", () => {
    const sync = createSync();
    const seen: ApplyStateResult[] = [];
    sync.on("stateApplied", ({ result }) => seen.push(result));

    sync.applyState(state("local", 0, 1));
    sync.applyState(state("p2", 0, 1));
    sync.applyState(state("p2", 0, 0));

    expect(seen).toEqual(["first-contact", "stale"]);
  });
});

describe("StateSynchronizer.step", () => {
  it("blends toward the target with factor blendRate * dt", () => {
    const sync = createSync();
    sync.applyState(state("p2", 0, 1));
    sync.applyState(state("p2", 2, 2, { x: 4, y: 0, z: 0 }));

    sync.step(0.05);

    const record = sync.get("p2");
    expect(record?.current.position.x).toBeCloseTo(1);
    expect(record?.current.velocity.x).toBeCloseTo(2);
    expect(record?.current.rotation).toEqual({ x: 0, y: 0, z: 0, w: 1 });
  });

  it("never overshoots the target on a long frame", () => {
    const sync = createSync();
    sync.applyState(state("p2", 0, 1));
    sync.applyState(state("p2", 2, 2));

    sync.step(1);

    expect(sync.get("p2")?.current.position.x).toBe(2);
  });

  it("does nothing for a zero delta", () => {
    const sync = createSync();
    sync.applyState(state("p2", 0, 1));
    sync.applyState(state("p2", 2, 2));

    sync.step(0);

    expect(sync.get("p2")?.current.position.x).toBe(0);
  });
});

describe("StateSynchronizer inputs and prediction", () => {
  it("clamps inputs to their ranges", () => {
    const sync = createSync();
    sync.applyState(state("p2", 0, 1));

    expect(sync.applyInput({ playerId: "p2", steering: 2, throttle: -1, brake: 0.5, timestamp: 1 })).toBe(true);

    expect(sync.inputOf("p2")).toEqual({ playerId: "p2", steering: 1, throttle: 0, brake: 0.5, timestamp: 1 });
  });

  it("applies inputs regardless of their timestamp", () => {
    const sync = createSync();

    sync.applyInput({ playerId: "p2", steering: 0.1, throttle: 1, brake: 0, timestamp: 9 });
    sync.applyInput({ playerId: "p2", steering: -0.3, throttle: 1, brake: 0, timestamp: 2 });

    expect(sync.inputOf("p2")?.steering).toBe(-0.3);
  });

  it("keeps an early input for the record created on first contact", () => {
    const sync = createSync();

    sync.applyInput({ playerId: "p2", steering: 0.5, throttle: 1, brake: 0, timestamp: 1 });
    sync.applyState(state("p2", 0, 1));

    expect(sync.get("p2")?.input?.steering).toBe(0.5);
  });

  it("refuses inputs of the local player", () => {
    const sync = createSync();

    expect(sync.applyInput({ playerId: "local", steering: 0, throttle: 0, brake: 0, timestamp: 1 })).toBe(false);
    expect(sync.inputOf("local")).toBeUndefined();
  });

  it("extrapolates along the current velocity", () => {
    const sync = createSync();
    sync.applyState(state("p2", 1, 1, { x: 10, y: 0, z: -2 }));

    expect(sync.predict("p2", 0.5)).toEqual({ x: 6, y: 0, z: -1 });
    expect(sync.predict("nobody", 0.5)).toBeUndefined();
  });

  it("removes and clears records", () => {
    const sync = createSync();
    sync.applyState(state("p2", 0, 1));
    sync.applyState(state("p3", 0, 1));

    expect(sync.remove("p2")).toBe(true);
    expect(sync.remove("p2")).toBe(false);
    expect(sync.players()).toEqual(["p3"]);

    sync.clear();
    expect(sync.players()).toEqual([]);
  });
});
