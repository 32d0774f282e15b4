import { describe, it, expect, vi } from "vitest";
import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { SkillRouter } from "../../src/core/skill-router.js";
import { SkillRegistry } from "../../src/skills/registry.js";
import {
  FeatureSkillDescriptor,
  PassThroughDescriptor,
  isAnySkill,
} from "../../src/skills/descriptors.js";
import { retailBuilder } from "../../src/features/builders.js";
import { TelemetrySink } from "../../src/telemetry/telemetry-sink.js";
import {
  SkillExecutionError,
  SkillNotFoundError,
  SkillTypeMismatchError,
} from "../../src/types/errors.js";
import { toPayload } from "../../src/types/payload.js";
import type { FeatureVector } from "../../src/types/payload.js";

function steppingClock(step: number): () => number {
  let now = 0;
  return () => {
    const current = now;
    now += step;
    return current;
  };
}

function setup() {
  const registry = new SkillRegistry();
  const telemetry = new TelemetrySink({ storageDir: mkdtempSync(join(tmpdir(), "skillrt-router-")) });
  const router = new SkillRouter({ registry, telemetry, now: steppingClock(5) });
  return { registry, telemetry, router };
}

const doubling = { runSkill: (features: FeatureVector) => features.map((value) => value * 2) };

describe("SkillRouter.routeSkill", () => {
  it("builds features, runs the skill and records a success event", async () => {
    const { registry, telemetry, router } = setup();
    registry.registerSkill("retail_helper", new FeatureSkillDescriptor(retailBuilder, doubling, 8), ["shop"]);

    const result = await router.routeSkill("retail_helper", toPayload({ price: 1000 }));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toHaveLength(8);
    expect(result.value[0]).toBe(1);
    expect(result.durationMs).toBe(5);

    const events = await telemetry.events();
    expect(events).toHaveLength(1);
    expect(events[0]?.event).toBe("router.success.retail_helper");
    expect(events[0]?.attributes).toEqual({ skill: "retail_helper", outcome: "success" });
    expect(events[0]?.metrics).toEqual({ "router.success": 1, "router.failure": 0, durationMs: 5 });
  });

  it("fails with SkillNotFoundError for an unknown id", async () => {
    const { telemetry, router } = setup();

    const result = await router.routeSkill("ghost", {});

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(SkillNotFoundError);
    const events = await telemetry.events();
    expect(events[0]?.event).toBe("router.failure.ghost");
    expect(events[0]?.attributes["errorCategory"]).toBe("not_found");
  });

  it("fails with SkillTypeMismatchError when the descriptor is not a vector skill", async () => {
    const { registry, router } = setup();
    registry.registerSkill("echo", new PassThroughDescriptor<string>());

    const result = await router.routeSkill("echo", {});

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(SkillTypeMismatchError);
    expect(result.error.message).toBe(
      'Skill echo is registered as a "passthrough" skill and cannot serve this request',
    );
  });

  it("wraps a runner failure in SkillExecutionError with the cause", async () => {
    const { registry, telemetry, router } = setup();
    const crash = new Error("backend crashed");
    registry.registerSkill(
      "energy_monitor",
      new FeatureSkillDescriptor(retailBuilder, { runSkill: () => Promise.reject(crash) }, 8),
    );

    const result = await router.routeSkill("energy_monitor", {});

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(SkillExecutionError);
    expect(result.error.cause).toBe(crash);
    const events = await telemetry.events();
    expect(events[0]?.attributes).toEqual({
      skill: "energy_monitor",
      outcome: "failure",
      errorCategory: "execution",
      error: "Skill energy_monitor failed: backend crashed",
    });
  });

  it("keeps a missing session as a lookup failure", async () => {
    const { registry, telemetry, router } = setup();
    const vanished = new SkillNotFoundError("ghost_session");
    registry.registerSkill(
      "ghost_session",
      new FeatureSkillDescriptor(retailBuilder, { runSkill: () => Promise.reject(vanished) }, 8),
    );

    const result = await router.routeSkill("ghost_session", {});

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBe(vanished);
    const events = await telemetry.events();
    expect(events[0]?.attributes["errorCategory"]).toBe("not_found");
  });

  it("routes any descriptor shape through routeTyped", async () => {
    const { registry, router } = setup();
    registry.registerSkill("echo", new PassThroughDescriptor<string>());

    const result = await router.routeTyped("echo", "hello", isAnySkill);

    expect(result).toEqual({ ok: true, skillId: "echo", value: "hello", durationMs: 5 });
  });

  it("emits a routed event on the registry bus", async () => {
    const { registry, router } = setup();
    const routed = vi.fn();
    registry.events.on("skill:routed", routed);

    await router.routeSkill("ghost", {});

    expect(routed).toHaveBeenCalledWith({ skillId: "ghost", ok: false, durationMs: 5 });
  });
});

describe("SkillRouter.routeByTrigger", () => {
  it("resolves a normalized trigger to the earliest registration", async () => {
    const { registry, router } = setup();
    registry.registerSkill("first", new FeatureSkillDescriptor(retailBuilder, doubling, 8), ["Shop"]);
    registry.registerSkill("second", new FeatureSkillDescriptor(retailBuilder, doubling, 8), ["shop"]);

    const result = await router.routeByTrigger("  SHOP ", toPayload({ price: 500 }));

    expect(result.ok).toBe(true);
    expect(result.skillId).toBe("first");
  });

  it("skips earlier registrations that are not vector skills", async () => {
    const { registry, router } = setup();
    registry.registerSkill("first", new PassThroughDescriptor<string>(), ["shop"]);
    registry.registerSkill("second", new FeatureSkillDescriptor(retailBuilder, doubling, 8), ["shop"]);

    const result = await router.routeByTrigger("shop", toPayload({ price: 500 }));

    expect(result.ok).toBe(true);
    expect(result.skillId).toBe("second");
  });

  it("reports the trigger itself when nothing matches", async () => {
    const { router } = setup();

    const result = await router.routeByTrigger("teleport", {});

    expect(result.ok).toBe(false);
    expect(result.skillId).toBe("teleport");
  });
});

describe("SkillRouter telemetry failures", () => {
  it("keeps the route result when telemetry cannot be written", async () => {
    const registry = new SkillRegistry();
    const telemetry = new TelemetrySink({ storageDir: mkdtempSync(join(tmpdir(), "skillrt-router-")) });
    vi.spyOn(telemetry, "recordRouterSuccess").mockRejectedValue(new Error("disk full"));
    const router = new SkillRouter({ registry, telemetry });
    registry.registerSkill("retail_helper", new FeatureSkillDescriptor(retailBuilder, doubling, 8));

    const result = await router.routeSkill("retail_helper", {});

    expect(result.ok).toBe(true);
  });

  it("routes without a telemetry sink", async () => {
    const registry = new SkillRegistry();
    const router = new SkillRouter({ registry });
    registry.registerSkill("retail_helper", new FeatureSkillDescriptor(retailBuilder, doubling, 8));

    const result = await router.routeSkill("retail_helper", {});

    expect(result.ok && result.value).toEqual(new Array<number>(8).fill(0));
  });
});
