/**
 * Signal primitives shared by every domain feature builder.
 * All helpers map absent input to 0 and never return NaN or an infinite value.
 */

import { FeatureShapeError } from "../types/errors.js";
import type { FeatureVector, Payload, PayloadValue } from "../types/payload.js";

const NUMBER_PATTERN = /[-+]?\d*\.?\d+/g;

export const LINEAR_FEATURE_COUNT = 4;

// ── Payload Readers ──────────────────────────────────────────────────────

export function readNumber(payload: Payload, key: string): number | undefined {
  const value = payload[key];
  if (!value) return undefined;

  switch (value.kind) {
    case "number":
      return value.value;
    case "boolean":
      return value.value ? 1 : 0;
    case "text": {
      const trimmed = value.value.trim();
      if (trimmed === "") return undefined;
      const parsed = Number(trimmed);
      return Number.isNaN(parsed) ? undefined : parsed;
    }
    case "list":
      return undefined;
    default:
      return assertNever(value);
  }
}

export function readString(payload: Payload, key: string): string | undefined {
  const value = payload[key];
  if (!value) return undefined;

  switch (value.kind) {
    case "text":
      return value.value;
    case "number":
    case "boolean":
      return String(value.value);
    case "list":
      return undefined;
    default:
      return assertNever(value);
  }
}

/**
 * Joins the non-blank string fields named by keys, in key order.
 */
export function readText(payload: Payload, ...keys: string[]): string | undefined {
  const pieces: string[] = [];
  for (const key of keys) {
    const piece = readString(payload, key);
    if (piece !== undefined && piece.trim() !== "") {
      pieces.push(piece);
    }
  }
  return pieces.length > 0 ? pieces.join(" ") : undefined;
}

export function collectionSize(payload: Payload, key: string): number | undefined {
  const value = payload[key];
  if (!value) return undefined;

  switch (value.kind) {
    case "list":
      return value.items.length;
    case "text":
      return value.value.length;
    case "number":
    case "boolean":
      return undefined;
    default:
      return assertNever(value);
  }
}

export function boolFlag(value: PayloadValue | undefined): number {
  if (!value) return 0;

  switch (value.kind) {
    case "boolean":
      return value.value ? 1 : 0;
    case "number":
      return value.value !== 0 ? 1 : 0;
    case "text":
      return value.value.toLowerCase() === "true" ? 1 : 0;
    case "list":
      return 0;
    default:
      return assertNever(value);
  }
}

// ── Numeric Signals ──────────────────────────────────────────────────────

export function clean(value: number): number {
  if (Number.isNaN(value)) return 0;
  if (!Number.isFinite(value)) return Math.sign(value);
  return value;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * value / scale, clamped to [-1, 1].
 */
export function normalize(value: number | undefined, scale: number): number {
  if (value === undefined || scale === 0) return 0;
  return clamp(clean(value / scale), -1, 1);
}

export function ratio(part: number | undefined, total: number | undefined): number {
  if (part === undefined || total === undefined || total === 0) return 0;
  return clean(clamp(part / total, -1, 1));
}

/**
 * Relative change of current against reference. A zero reference divides by 1.
 */
export function delta(current: number | undefined, reference: number | undefined): number {
  if (current === undefined || reference === undefined) return 0;
  const divisor = reference === 0 ? 1 : Math.abs(reference);
  return clean((current - reference) / divisor);
}

export function normalizedCount(count: number | undefined, max: number): number {
  if (count === undefined || max <= 0) return 0;
  return clean(clamp(count / max, 0, 1));
}

export function normalizedLength(value: string | undefined, maxLength: number): number {
  if (value === undefined || value.length === 0 || maxLength <= 0) return 0;
  return clean(Math.min(value.length, maxLength) / maxLength);
}

// ── Lexical Signals ──────────────────────────────────────────────────────

export function keywordFeats(value: string | undefined, keywords: readonly string[]): number[] {
  if (value === undefined || value.trim() === "") {
    return keywords.map(() => 0);
  }
  const source = value.toLowerCase();
  return keywords.map((keyword) => (source.includes(keyword.toLowerCase()) ? 1 : 0));
}

/**
 * Coefficients of a formula string: the first three numbers over 100, then the
 * summed magnitude of every number over 400.
 */
export function linearFeats(formula: string | undefined): number[] {
  const coefficients = new Array<number>(LINEAR_FEATURE_COUNT).fill(0);
  if (formula === undefined || formula.trim() === "") {
    return coefficients;
  }

  const numbers: number[] = [];
  for (const match of formula.matchAll(NUMBER_PATTERN)) {
    const parsed = Number(match[0]);
    if (!Number.isNaN(parsed)) {
      numbers.push(parsed);
    }
  }

  const limit = Math.min(LINEAR_FEATURE_COUNT - 1, numbers.length);
  for (let index = 0; index < limit; index++) {
    coefficients[index] = normalize(numbers[index], 100);
  }

  const magnitude = numbers.reduce((sum, value) => sum + Math.abs(value), 0);
  coefficients[LINEAR_FEATURE_COUNT - 1] = normalize(magnitude, 400);

  return coefficients;
}

// ── Composition ──────────────────────────────────────────────────────────

/**
 * Fits computed signals into exactly inputDim slots. Short signal lists are
 * zero-padded; overflow is folded into slot (index mod inputDim) and clamped.
 */
export function composeVector(inputDim: number, values: readonly number[]): FeatureVector {
  if (!Number.isInteger(inputDim) || inputDim <= 0) {
    throw new FeatureShapeError(`inputDim must be a positive integer, got ${inputDim}`);
  }

  const vector = new Array<number>(inputDim).fill(0);
  values.forEach((value, index) => {
    const slot = index % inputDim;
    const current = vector[slot] ?? 0;
    vector[slot] = index < inputDim ? clean(value) : clamp(clean(current + value), -1, 1);
  });

  return vector;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled payload value: ${JSON.stringify(value)}`);
}
