/**
 * InferenceSession — one cached backend bound to one skill id.
 */

import type { FeatureVector } from "../types/payload.js";
import type { SkillId } from "../types/skill.js";
import type { IInferenceBackend } from "./backends.js";

export interface IRunCounters {
  active: number;
  skipped: number;
}

export interface IIdleSource {
  isIdle(): boolean;
}

export class InferenceSession {
  readonly skillId: SkillId;
  readonly outputDim: number | undefined;
  private readonly backend: IInferenceBackend;
  private readonly idleSource: IIdleSource;
  private readonly hubCounters: IRunCounters;
  private readonly counters: IRunCounters = { active: 0, skipped: 0 };

  constructor(
    skillId: SkillId,
    backend: IInferenceBackend,
    idleSource: IIdleSource,
    hubCounters: IRunCounters,
    outputDim?: number,
  ) {
    this.skillId = skillId;
    this.backend = backend;
    this.idleSource = idleSource;
    this.hubCounters = hubCounters;
    this.outputDim = outputDim;
  }

  get backendName(): string {
    return this.backend.name;
  }

  /**
   * While the hub is idle the backend is not touched and a zero vector comes back.
   * Backend errors propagate; the session stays usable.
   */
  async run(features: FeatureVector): Promise<FeatureVector> {
    if (this.idleSource.isIdle()) {
      this.counters.skipped++;
      this.hubCounters.skipped++;
      return new Array<number>(this.outputDim ?? features.length).fill(0);
    }

    this.counters.active++;
    this.hubCounters.active++;
    return await this.backend.infer(features);
  }

  stats(): Readonly<IRunCounters> {
    return { ...this.counters };
  }

  toString(): string {
    return `InferenceSession(skillId=${this.skillId}, backend=${this.backend.name})`;
  }
}
