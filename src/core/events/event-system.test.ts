import { afterEach, describe, expect, it, vi } from "vitest";
import { EventSystem } from "./event-system";

type TestEvents = {
  joined: { playerId: string };
  left: { playerId: string };
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe("EventSystem", () => {
  it("delivers payloads to handlers in registration order", () => {
    const events = new EventSystem<TestEvents>();
    const calls: string[] = [];

    events.on("joined", ({ playerId }) => calls.push(`a:${playerId}`));
    events.on("joined", ({ playerId }) => calls.push(`b:${playerId}`));
    events.emit("joined", { playerId: "p1" });

    expect(calls).toEqual(["a:p1", "b:p1"]);
  });

  it("on returns an unsubscribe function", () => {
    const events = new EventSystem<TestEvents>();
    const handler = vi.fn();

    const off = events.on("left", handler);
    off();
    events.emit("left", { playerId: "p1" });

    expect(handler).not.toHaveBeenCalled();
    expect(events.listenerCount("left")).toBe(0);
  });

  it("once fires a single time", () => {
    const events = new EventSystem<TestEvents>();
    const handler = vi.fn();

    events.once("joined", handler);
    events.emit("joined", { playerId: "p1" });
    events.emit("joined", { playerId: "p2" });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ playerId: "p1" });
  });

  it("keeps delivering after a handler throws", () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => {});
    const events = new EventSystem<TestEvents>({ name: "Rooms" });
    const after = vi.fn();

    events.on("joined", () => {
      throw new Error("boom");
    });
    events.on("joined", after);
    events.emit("joined", { playerId: "p1" });

    expect(after).toHaveBeenCalledTimes(1);
    expect(errors).toHaveBeenCalledWith('[Rooms] Error in "joined" handler: Error: boom');
  });

  it("a handler may unsubscribe another during delivery", () => {
    const events = new EventSystem<TestEvents>();
    const second = vi.fn();

    events.on("joined", () => events.off("joined", second));
    events.on("joined", second);
    events.emit("joined", { playerId: "p1" });
    events.emit("joined", { playerId: "p2" });

    expect(second).toHaveBeenCalledTimes(1);
  });

  it("clear removes one event's handlers or all of them", () => {
    const events = new EventSystem<TestEvents>();
    events.on("joined", () => {});
    events.on("left", () => {});

    events.clear("joined");
    expect(events.listenerCount("joined")).toBe(0);
    expect(events.listenerCount("left")).toBe(1);

    events.clear();
    expect(events.listenerCount("left")).toBe(0);
  });
});
