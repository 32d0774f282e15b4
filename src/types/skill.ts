/**
 * Skill contracts — descriptors, runners, registrations and route results.
 */

import type { FeatureVector, Payload } from "./payload.js";

export type SkillId = string;

export type SkillKind = "vector" | "text" | "passthrough" | "custom";

export type Awaitable<T> = T | Promise<T>;

export interface ISkillRunner<Features, Output> {
  runSkill(features: Features): Awaitable<Output>;
}

export interface ISkillDescriptor<Payload, Features, Output> {
  readonly kind: SkillKind;
  buildFeatures(payload: Payload): Features;
  readonly runner: ISkillRunner<Features, Output>;
}

export type AnySkillDescriptor = ISkillDescriptor<unknown, unknown, unknown>;

/** Descriptor shape produced by feature-builder-backed skills. */
export type VectorSkillDescriptor = ISkillDescriptor<Payload, FeatureVector, FeatureVector>;

export type VectorSkillRunner = ISkillRunner<FeatureVector, FeatureVector>;

/**
 * Narrows a stored descriptor to the triple a caller expects.
 * Registry lookups return undefined when the guard rejects.
 */
export type SkillGuard<P, F, O> = (
  descriptor: AnySkillDescriptor,
) => descriptor is ISkillDescriptor<P, F, O>;

export interface ISkillRegistration<P = unknown, F = unknown, O = unknown> {
  readonly id: SkillId;
  readonly descriptor: ISkillDescriptor<P, F, O>;
  readonly runner: ISkillRunner<F, O>;
  readonly triggers: readonly string[];
  readonly registeredAt: Date;
}

/**
 * Creates the runner bound to a skill id while a definition document is loaded.
 */
export type RunnerFactory = (skillId: SkillId) => VectorSkillRunner;

// ── Route Results ────────────────────────────────────────────────────────

export interface IRouteSuccess<O> {
  readonly ok: true;
  readonly skillId: SkillId;
  readonly value: O;
  readonly durationMs: number;
}

export interface IRouteFailure {
  readonly ok: false;
  readonly skillId: SkillId;
  readonly error: Error;
  readonly durationMs: number;
}

export type RouteResult<O> = IRouteSuccess<O> | IRouteFailure;

// ── Definition Document ──────────────────────────────────────────────────

export interface ISkillDefinitionEntry {
  readonly id: SkillId;
  readonly featureBuilder: string;
  readonly triggers: readonly string[];
  readonly inputDim?: number | undefined;
  readonly description?: string | undefined;
}

export interface ISkillDefinitionDocument {
  readonly version?: string | undefined;
  readonly skills: readonly ISkillDefinitionEntry[];
}
