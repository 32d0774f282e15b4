import { describe, it, expect } from "vitest";
import {
  DecisionEngine,
  HEALTH_DISCLAIMER,
  HEALTH_DISCLAIMER_EN,
  HEALTH_DISCLAIMER_ZH,
} from "../../src/core/decision-engine.js";

describe("DecisionEngine.decide", () => {
  const engine = new DecisionEngine();

  it("proceeds when confidence meets the health gate", () => {
    const outcome = engine.decide("hc_gait_guard", 0.82, "Stride looks steady");

    expect(outcome.action).toBe("proceed");
    expect(outcome.sigmaGate).toBe(0.82);
    expect(outcome.message).toBe(`Stride looks steady\n\n${HEALTH_DISCLAIMER}`);
  });

  it("asks when confidence is below the health gate", () => {
    const outcome = engine.decide("hc_gait_guard", 0.75);

    expect(outcome).toEqual({
      action: "ask",
      message: HEALTH_DISCLAIMER,
      confidence: 0.75,
      sigmaGate: 0.82,
    });
  });

  it("joins the English and Chinese disclaimers with a newline", () => {
    expect(HEALTH_DISCLAIMER).toBe(`${HEALTH_DISCLAIMER_EN}\n${HEALTH_DISCLAIMER_ZH}`);
  });

  it("leaves messages of non-health skills untouched", () => {
    expect(engine.decide("travel_planner", 0.9, "Booked").message).toBe("Booked");
    expect(engine.decide("travel_planner", 0.1).message).toBe("");
  });

  it("falls back to the default gate for skills without one", () => {
    expect(engine.decide("travel_planner", 0.5).action).toBe("proceed");
    expect(engine.decide("travel_planner", 0.49).action).toBe("ask");
  });

  it("does not range-check confidence", () => {
    expect(engine.decide("hc_med_sentinel", 1.7).action).toBe("proceed");
    expect(engine.decide("hc_med_sentinel", -0.2).action).toBe("ask");
  });

  it("honours a custom configuration", () => {
    const custom = new DecisionEngine({ defaultGate: 0.9, healthPrefix: "med_", sigmaGates: { med_scan: 0.4 } });

    expect(custom.decide("med_scan", 0.5).action).toBe("proceed");
    expect(custom.decide("med_scan", 0.5).message).toBe(HEALTH_DISCLAIMER);
    expect(custom.decide("hc_gait_guard", 0.85).action).toBe("ask");
    expect(custom.isHealthSkill("hc_gait_guard")).toBe(false);
  });
});

describe("DecisionEngine.decideWithMetadata", () => {
  const engine = new DecisionEngine();

  it("asks with compliance disclaimers below a metadata gate", () => {
    const outcome = engine.decideWithMetadata({
      id: "req-1",
      skillId: "hc_sun_hydro",
      confidence: 0.28,
      metadata: { sigmaGate: 0.3, source: "glasses" },
    });

    expect(outcome.action).toBe("ask");
    expect(outcome.sigmaGate).toBe(0.3);
    expect(outcome.metadata["source"]).toBe("glasses");
    expect(outcome.metadata.complianceDisclaimers?.["en-US"]).toEqual([
      HEALTH_DISCLAIMER_EN,
      "Confidence is below the safety threshold; confirm before acting.",
    ]);
    expect(outcome.metadata.complianceDisclaimers?.["zh-CN"]).toEqual([
      HEALTH_DISCLAIMER_ZH,
      "置信度低于安全阈值，请确认后再执行。",
    ]);
  });

  it("lets the override win and names the skill as the action", () => {
    const outcome = engine.decideWithMetadata(
      { id: "req-2", skillId: "travel_planner", confidence: 0.82, metadata: { sigmaGate: 0.95 } },
      0.6,
    );

    expect(outcome).toEqual({
      id: "req-2",
      skillId: "travel_planner",
      action: "travel_planner",
      confidence: 0.82,
      sigmaGate: 0.6,
      metadata: { sigmaGate: 0.6 },
    });
  });

  it("uses the per-skill gate when metadata has no numeric gate", () => {
    const outcome = engine.decideWithMetadata({
      id: "req-3",
      skillId: "hc_med_sentinel",
      confidence: 0.9,
      metadata: { sigmaGate: "high" },
    });

    expect(outcome.sigmaGate).toBe(0.88);
    expect(outcome.action).toBe("hc_med_sentinel");
    expect(outcome.metadata).toEqual({ sigmaGate: 0.88 });
  });

  it("ignores a non-finite metadata gate", () => {
    const outcome = engine.decideWithMetadata({
      id: "req-nan",
      skillId: "hc_gait_guard",
      confidence: 0.5,
      metadata: { sigmaGate: Number.NaN },
    });

    expect(outcome.sigmaGate).toBe(0.82);
    expect(outcome.action).toBe("ask");
    expect(outcome.metadata.sigmaGate).toBe(0.82);
  });

  it("falls back past a non-finite override", () => {
    const request = { id: "req-inf", skillId: "travel_planner", confidence: 0.5, metadata: { sigmaGate: 0.7 } };

    expect(engine.decideWithMetadata(request, Number.NaN).sigmaGate).toBe(0.7);
    expect(engine.decideWithMetadata(request, Number.NEGATIVE_INFINITY).action).toBe("ask");
  });

  it("drops stale disclaimers from incoming metadata", () => {
    const outcome = engine.decideWithMetadata({
      id: "req-4",
      skillId: "hc_gait_guard",
      confidence: 0.95,
      metadata: { complianceDisclaimers: { "en-US": ["old"], "zh-CN": ["旧"] } },
    });

    expect(outcome.metadata).toEqual({ sigmaGate: 0.82 });
  });

  it("adds no disclaimers for non-health skills below the gate", () => {
    const outcome = engine.decideWithMetadata({ id: "req-5", skillId: "retail_helper", confidence: 0.1 });

    expect(outcome.action).toBe("ask");
    expect(outcome.metadata).toEqual({ sigmaGate: 0.5 });
  });
});

describe("DecisionEngine gate lookups", () => {
  it("reports which skills carry an explicit gate", () => {
    const engine = new DecisionEngine();

    expect(engine.hasSigmaGate("hc_gait_guard")).toBe(true);
    expect(engine.hasSigmaGate("travel_planner")).toBe(false);
    expect(engine.hasSigmaGate("toString")).toBe(false);
    expect(engine.sigmaGateFor("travel_planner")).toBe(0.5);
  });
});
