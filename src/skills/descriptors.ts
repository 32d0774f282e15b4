/**
 * Skill descriptor and runner variants, plus the guards that recover their
 * static types from a registry lookup.
 */

import { DEFAULT_FEATURE_DIM } from "../types/config.js";
import { FeatureShapeError } from "../types/errors.js";
import type { FeatureVector, Payload } from "../types/payload.js";
import type {
  AnySkillDescriptor,
  ISkillDescriptor,
  ISkillRunner,
  SkillKind,
  VectorSkillDescriptor,
  VectorSkillRunner,
} from "../types/skill.js";
import type { IFeatureBuilder } from "../features/builders.js";
import { composeVector } from "../features/signals.js";

// ── Runners ──────────────────────────────────────────────────────────────

export class EchoRunner<T> implements ISkillRunner<T, T> {
  runSkill(features: T): T {
    return features;
  }
}

// ── Descriptors ──────────────────────────────────────────────────────────

/**
 * Feature-builder-backed skill: Payload → fixed-width vector → runner output.
 */
export class FeatureSkillDescriptor implements VectorSkillDescriptor {
  readonly kind = "vector" as const;
  readonly runner: VectorSkillRunner;
  readonly inputDim: number;
  private readonly builder: IFeatureBuilder;

  constructor(builder: IFeatureBuilder, runner: VectorSkillRunner, inputDim: number = DEFAULT_FEATURE_DIM) {
    this.builder = builder;
    this.runner = runner;
    this.inputDim = inputDim;
  }

  get builderName(): string {
    return this.builder.name;
  }

  buildFeatures(payload: Payload): FeatureVector {
    const features = this.builder.build(payload, this.inputDim);
    if (features.length !== this.inputDim) {
      throw new FeatureShapeError(
        `builder "${this.builder.name}" returned ${features.length} values, expected ${this.inputDim}`,
      );
    }
    return features;
  }
}

/**
 * Hands the payload to the runner untouched.
 */
export class PassThroughDescriptor<T> implements ISkillDescriptor<T, T, T> {
  readonly kind = "passthrough" as const;
  readonly runner: ISkillRunner<T, T>;

  constructor(runner: ISkillRunner<T, T> = new EchoRunner<T>()) {
    this.runner = runner;
  }

  buildFeatures(payload: T): T {
    return payload;
  }
}

/**
 * Free-text skill: the utterance is tokenized and hashed into a bag-of-words vector.
 */
export class TextPipelineDescriptor<Output> implements ISkillDescriptor<string, FeatureVector, Output> {
  readonly kind = "text" as const;
  readonly runner: ISkillRunner<FeatureVector, Output>;
  readonly inputDim: number;

  constructor(runner: ISkillRunner<FeatureVector, Output>, inputDim: number = DEFAULT_FEATURE_DIM) {
    this.runner = runner;
    this.inputDim = inputDim;
  }

  buildFeatures(payload: string): FeatureVector {
    const tokens = tokenize(payload);
    if (tokens.length === 0) {
      return composeVector(this.inputDim, []);
    }

    const counts = new Array<number>(this.inputDim).fill(0);
    for (const token of tokens) {
      const bucket = hashToken(token) % this.inputDim;
      counts[bucket] = (counts[bucket] ?? 0) + 1;
    }
    return composeVector(this.inputDim, counts.map((count) => count / tokens.length));
  }
}

export function tokenize(value: string): string[] {
  return value
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

/** 32-bit FNV-1a. */
export function hashToken(token: string): number {
  let hash = 0x811c9dc5;
  for (let index = 0; index < token.length; index++) {
    hash ^= token.charCodeAt(index);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

// ── Guards ───────────────────────────────────────────────────────────────

function hasKind(descriptor: AnySkillDescriptor, kind: SkillKind): boolean {
  return descriptor.kind === kind;
}

export function isVectorSkill(descriptor: AnySkillDescriptor): descriptor is VectorSkillDescriptor {
  return hasKind(descriptor, "vector");
}

export function isTextSkill(
  descriptor: AnySkillDescriptor,
): descriptor is ISkillDescriptor<string, FeatureVector, unknown> {
  return hasKind(descriptor, "text");
}

export function isAnySkill(_descriptor: AnySkillDescriptor): _descriptor is AnySkillDescriptor {
  return true;
}
