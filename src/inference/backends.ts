/**
 * Inference backends — the seam between a session and whatever executes the model.
 */

import type { InferenceBackendName } from "../types/config.js";
import type { FeatureVector } from "../types/payload.js";
import type { Awaitable, SkillId } from "../types/skill.js";

export interface IInferenceBackend {
  readonly name: string;
  infer(features: FeatureVector): Awaitable<FeatureVector>;
}

export type BackendFactory = (skillId: SkillId) => Awaitable<IInferenceBackend>;

/** Returns a copy of its input. */
export class EchoBackend implements IInferenceBackend {
  readonly name = "echo";

  infer(features: FeatureVector): FeatureVector {
    return [...features];
  }
}

/**
 * Deterministic stand-in for a model: shifts every element by a per-skill offset
 * derived from the skill id.
 */
export class OffsetBackend implements IInferenceBackend {
  readonly name = "offset";
  readonly offset: number;

  constructor(skillId: SkillId) {
    this.offset = (skillId.length % 7) + 1;
  }

  infer(features: FeatureVector): FeatureVector {
    return features.map((value) => value + this.offset);
  }
}

export function createBackendFactory(name: InferenceBackendName): BackendFactory {
  switch (name) {
    case "echo":
      return () => new EchoBackend();
    case "offset":
      return (skillId) => new OffsetBackend(skillId);
  }
}
