import { describe, it, expect } from "vitest";
import {
  boolFlag,
  composeVector,
  delta,
  keywordFeats,
  linearFeats,
  normalize,
  normalizedCount,
  normalizedLength,
  ratio,
  readNumber,
  readText,
} from "../../src/features/signals.js";
import { FeatureShapeError } from "../../src/types/errors.js";
import { bool, list, num, text } from "../../src/types/payload.js";

describe("numeric signals", () => {
  it("normalizes and clamps to [-1, 1]", () => {
    expect(normalize(6, 12)).toBe(0.5);
    expect(normalize(50, 10)).toBe(1);
    expect(normalize(-50, 10)).toBe(-1);
    expect(normalize(undefined, 10)).toBe(0);
    expect(normalize(5, 0)).toBe(0);
  });

  it("treats non-finite input as 0 or ±1", () => {
    expect(normalize(Number.NaN, 10)).toBe(0);
    expect(normalize(Number.POSITIVE_INFINITY, 10)).toBe(1);
    expect(normalize(Number.NEGATIVE_INFINITY, 10)).toBe(-1);
  });

  it("returns 0 for a ratio with a zero or absent total", () => {
    expect(ratio(7, 9)).toBeCloseTo(7 / 9);
    expect(ratio(3, 0)).toBe(0);
    expect(ratio(3, undefined)).toBe(0);
  });

  it("computes relative change", () => {
    expect(delta(150, 100)).toBe(0.5);
    expect(delta(5, 0)).toBe(5);
    expect(delta(undefined, 100)).toBe(0);
  });

  it("bounds counts and lengths to [0, 1]", () => {
    expect(normalizedCount(30, 10)).toBe(1);
    expect(normalizedCount(2, 10)).toBe(0.2);
    expect(normalizedLength("abcd", 8)).toBe(0.5);
    expect(normalizedLength("", 8)).toBe(0);
  });
});

describe("lexical signals", () => {
  it("flags keywords case-insensitively", () => {
    expect(keywordFeats("Math EXAM tomorrow", ["math", "science", "exam"])).toEqual([1, 0, 1]);
    expect(keywordFeats(undefined, ["math", "exam"])).toEqual([0, 0]);
  });

  it("extracts the first three coefficients and the summed magnitude", () => {
    const [a, b, c, magnitude] = linearFeats("3x + 4 = 10");
    expect(a).toBeCloseTo(0.03);
    expect(b).toBeCloseTo(0.04);
    expect(c).toBeCloseTo(0.1);
    expect(magnitude).toBeCloseTo(17 / 400);
    expect(linearFeats("")).toEqual([0, 0, 0, 0]);
  });

  it("maps booleans, non-zero numbers and \"true\" text to 1", () => {
    expect(boolFlag(bool(true))).toBe(1);
    expect(boolFlag(num(2))).toBe(1);
    expect(boolFlag(text("TRUE"))).toBe(1);
    expect(boolFlag(text("yes"))).toBe(0);
    expect(boolFlag(list(["true"]))).toBe(0);
    expect(boolFlag(undefined)).toBe(0);
  });
});

describe("payload readers", () => {
  it("parses numeric text and ignores lists", () => {
    const payload = { a: text(" 42 "), b: list(["1"]), c: bool(false), d: text("n/a") };
    expect(readNumber(payload, "a")).toBe(42);
    expect(readNumber(payload, "b")).toBeUndefined();
    expect(readNumber(payload, "c")).toBe(0);
    expect(readNumber(payload, "d")).toBeUndefined();
  });

  it("joins non-blank text fields in key order", () => {
    expect(readText({ topic: text("math"), question: text("  ") }, "topic", "question")).toBe("math");
    expect(readText({}, "topic")).toBeUndefined();
  });
});

describe("composeVector", () => {
  it("zero-pads short signal lists", () => {
    expect(composeVector(4, [0.5, 0.25])).toEqual([0.5, 0.25, 0, 0]);
  });

  it("folds overflow into index mod dimension and clamps the folded slot", () => {
    const [first, second] = composeVector(2, [0.5, 0.25, 0.75, 0.1]);
    expect(first).toBe(1);
    expect(second).toBeCloseTo(0.35);
  });

  it("rejects a non-positive or fractional dimension", () => {
    expect(() => composeVector(0, [1])).toThrow(FeatureShapeError);
    expect(() => composeVector(2.5, [1])).toThrow(FeatureShapeError);
  });
});
