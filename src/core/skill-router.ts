/**
 * Skill routing: registry lookup → feature build → runner → result, with an
 * outcome recorded to telemetry for every call.
 * Resolution pipeline: registration → type guard → buildFeatures → runSkill
 */

import {
  SkillExecutionError,
  SkillNotFoundError,
  SkillTypeMismatchError,
  categorizeError,
} from "../types/errors.js";
import type { FeatureVector, Payload } from "../types/payload.js";
import type { RouteResult, SkillGuard, SkillId } from "../types/skill.js";
import { logger } from "../utils/logger.js";
import { isVectorSkill } from "../skills/descriptors.js";
import type { SkillRegistry } from "../skills/registry.js";
import type { TelemetrySink } from "../telemetry/telemetry-sink.js";

export interface ISkillRouterOptions {
  readonly registry: SkillRegistry;
  readonly telemetry?: TelemetrySink | undefined;
  readonly now?: (() => number) | undefined;
}

export class SkillRouter {
  private readonly registry: SkillRegistry;
  private readonly telemetry: TelemetrySink | undefined;
  private readonly now: () => number;

  constructor(options: ISkillRouterOptions) {
    this.registry = options.registry;
    this.telemetry = options.telemetry;
    this.now = options.now ?? (() => performance.now());
  }

  /**
   * Route a payload to a feature-builder-backed skill.
   */
  routeSkill(skillId: SkillId, payload: Payload): Promise<RouteResult<FeatureVector>> {
    return this.routeTyped(skillId, payload, isVectorSkill);
  }

  /**
   * Route to any descriptor shape the guard accepts. Never rejects: every
   * failure comes back as an `ok: false` result.
   */
  async routeTyped<P, F, O>(skillId: SkillId, payload: P, guard: SkillGuard<P, F, O>): Promise<RouteResult<O>> {
    const startedAt = this.now();

    const registration = this.registry.getRegistration(skillId);
    if (!registration) {
      return this.fail(skillId, new SkillNotFoundError(skillId), startedAt);
    }

    const descriptor = registration.descriptor;
    if (!guard(descriptor)) {
      return this.fail(skillId, new SkillTypeMismatchError(skillId, descriptor.kind), startedAt);
    }

    let value: O;
    try {
      const features = descriptor.buildFeatures(payload);
      value = await descriptor.runner.runSkill(features);
    } catch (error: unknown) {
      // A runner may find its session gone; that stays a lookup failure.
      const failure = error instanceof SkillNotFoundError ? error : new SkillExecutionError(skillId, error);
      return this.fail(skillId, failure, startedAt);
    }

    const durationMs = this.elapsed(startedAt);
    logger.debug({ skill: skillId, durationMs }, "Skill routed");
    this.registry.events.emit("skill:routed", { skillId, ok: true, durationMs });
    await this.safeRecord(() => this.telemetry?.recordRouterSuccess(skillId, durationMs));
    return { ok: true, skillId, value, durationMs };
  }

  /**
   * Resolve a trigger phrase to the earliest vector skill registered for it
   * and route to that skill.
   */
  async routeByTrigger(trigger: string, payload: Payload): Promise<RouteResult<FeatureVector>> {
    const skillId = this.registry.resolveTrigger(trigger, isVectorSkill);
    if (skillId === undefined) {
      return this.fail(trigger, new SkillNotFoundError(trigger), this.now());
    }
    return this.routeSkill(skillId, payload);
  }

  // ── Private Helpers ──────────────────────────────────────────────────

  private async fail(skillId: SkillId, error: Error, startedAt: number): Promise<RouteResult<never>> {
    const durationMs = this.elapsed(startedAt);
    const category = categorizeError(error);
    logger.warn({ skill: skillId, category, error: error.message }, "Skill route failed");
    this.registry.events.emit("skill:routed", { skillId, ok: false, durationMs });
    await this.safeRecord(() => this.telemetry?.recordRouterFailure(skillId, error, category, durationMs));
    return { ok: false, skillId, error, durationMs };
  }

  private async safeRecord(write: () => Promise<boolean> | undefined): Promise<void> {
    try {
      await write();
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ error: message }, "Telemetry write failed");
    }
  }

  private elapsed(startedAt: number): number {
    return Math.max(0, this.now() - startedAt);
  }
}
