import { describe, it, expect, vi } from "vitest";
import { EventBus } from "../../src/core/event-bus.js";

describe("EventBus", () => {
  it("delivers events to subscribers until they unsubscribe", () => {
    const bus = new EventBus();
    const handler = vi.fn();
    const unsubscribe = bus.on("hub:idle", handler);

    bus.emit("hub:idle", { idle: true });
    unsubscribe();
    bus.emit("hub:idle", { idle: false });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ idle: true });
    expect(bus.listenerCount("hub:idle")).toBe(0);
  });

  it("fires once handlers a single time", () => {
    const bus = new EventBus();
    const handler = vi.fn();
    bus.once("session:created", handler);

    bus.emit("session:created", { skillId: "a" });
    bus.emit("session:created", { skillId: "b" });

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("keeps delivering after a handler throws", () => {
    const bus = new EventBus();
    const after = vi.fn();
    bus.on("skill:unregistered", () => {
      throw new Error("listener broke");
    });
    bus.on("skill:unregistered", after);

    bus.emit("skill:unregistered", { skillId: "retail_helper" });

    expect(after).toHaveBeenCalledWith({ skillId: "retail_helper" });
  });
});
