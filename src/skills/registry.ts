/**
 * SkillRegistry — owns skill registrations and the trigger-phrase index.
 *
 * Re-registering an id overwrites the previous registration and its trigger
 * mappings; update manifests rely on that replacement. Every mutation runs in
 * one synchronous block, so readers never observe a half-applied registration.
 * When several skills share a trigger, lookups prefer the earliest registration.
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { DEFAULT_FEATURE_DIM } from "../types/config.js";
import { MalformedDefinitionError } from "../types/errors.js";
import type {
  AnySkillDescriptor,
  ISkillDefinitionDocument,
  ISkillDescriptor,
  ISkillRegistration,
  RunnerFactory,
  SkillGuard,
  SkillId,
} from "../types/skill.js";
import { logger } from "../utils/logger.js";
import { EventBus } from "../core/event-bus.js";
import { createDefaultFeatureBuilders } from "../features/registry.js";
import type { FeatureBuilderRegistry } from "../features/registry.js";
import { FeatureSkillDescriptor } from "./descriptors.js";
import { SkillDefinitionLoader } from "./loader.js";

// ── Types ───────────────────────────────────────────────────────────────

export interface ISkillRegistryOptions {
  readonly featureBuilders?: FeatureBuilderRegistry | undefined;
  readonly defaultInputDim?: number | undefined;
  readonly events?: EventBus | undefined;
  readonly loader?: SkillDefinitionLoader | undefined;
}

export interface IDefinitionLoadOptions {
  /** When false, entries whose id is already registered are skipped. Defaults to true. */
  readonly replaceExisting?: boolean | undefined;
}

export function normalizeTrigger(trigger: string): string {
  return trigger.trim().toLowerCase();
}

// ── SkillRegistry Class ─────────────────────────────────────────────────

export class SkillRegistry {
  readonly events: EventBus;
  private readonly featureBuilders: FeatureBuilderRegistry;
  private readonly defaultInputDim: number;
  private readonly loader: SkillDefinitionLoader;
  private readonly skills: Map<SkillId, ISkillRegistration> = new Map();
  private readonly triggerIndex: Map<string, SkillId[]> = new Map();
  private loadedDefinitionVersions: Array<string | undefined> = [];
  private readonly loadedFiles: Set<string> = new Set();

  constructor(options: ISkillRegistryOptions = {}) {
    this.featureBuilders = options.featureBuilders ?? createDefaultFeatureBuilders();
    this.defaultInputDim = options.defaultInputDim ?? DEFAULT_FEATURE_DIM;
    this.events = options.events ?? new EventBus();
    this.loader = options.loader ?? new SkillDefinitionLoader();
  }

  /**
   * Insert or replace the registration for id.
   */
  registerSkill<P, F, O>(
    id: SkillId,
    descriptor: ISkillDescriptor<P, F, O>,
    triggers: readonly string[] = [],
  ): ISkillRegistration<P, F, O> {
    const registration = createRegistration(id, descriptor, triggers);
    this.commit([registration]);
    return registration;
  }

  unregisterSkill(id: SkillId): boolean {
    const existing = this.skills.get(id);
    if (!existing) return false;

    this.removeTriggers(id, existing.triggers);
    this.skills.delete(id);
    logger.info({ skill: id }, "Skill unregistered");
    this.events.emit("skill:unregistered", { skillId: id });
    return true;
  }

  isRegistered(id: SkillId): boolean {
    return this.skills.has(id);
  }

  /**
   * Look up a descriptor. With a guard, a registration of another shape reads as absent.
   */
  getSkill(id: SkillId): AnySkillDescriptor | undefined;
  getSkill<P, F, O>(id: SkillId, guard: SkillGuard<P, F, O>): ISkillDescriptor<P, F, O> | undefined;
  getSkill<P, F, O>(
    id: SkillId,
    guard?: SkillGuard<P, F, O>,
  ): ISkillDescriptor<P, F, O> | AnySkillDescriptor | undefined {
    const descriptor = this.skills.get(id)?.descriptor;
    if (!descriptor) return undefined;
    if (guard && !guard(descriptor)) return undefined;
    return descriptor;
  }

  getRegistration(id: SkillId): ISkillRegistration | undefined;
  getRegistration<P, F, O>(id: SkillId, guard: SkillGuard<P, F, O>): ISkillRegistration<P, F, O> | undefined;
  getRegistration<P, F, O>(
    id: SkillId,
    guard?: SkillGuard<P, F, O>,
  ): ISkillRegistration<P, F, O> | ISkillRegistration | undefined {
    const registration = this.skills.get(id);
    if (!registration) return undefined;
    if (!guard) return registration;

    const descriptor = registration.descriptor;
    if (!guard(descriptor)) return undefined;
    return { ...registration, descriptor, runner: descriptor.runner };
  }

  getSkillByTrigger(trigger: string): AnySkillDescriptor | undefined;
  getSkillByTrigger<P, F, O>(trigger: string, guard: SkillGuard<P, F, O>): ISkillDescriptor<P, F, O> | undefined;
  getSkillByTrigger<P, F, O>(
    trigger: string,
    guard?: SkillGuard<P, F, O>,
  ): ISkillDescriptor<P, F, O> | AnySkillDescriptor | undefined {
    const id = this.resolveTrigger(trigger, guard);
    if (id === undefined) return undefined;
    return guard ? this.getSkill(id, guard) : this.getSkill(id);
  }

  /**
   * Resolve a trigger to the earliest-registered skill id that satisfies the guard.
   */
  resolveTrigger<P, F, O>(trigger: string, guard?: SkillGuard<P, F, O>): SkillId | undefined {
    const ids = this.triggerIndex.get(normalizeTrigger(trigger)) ?? [];
    for (const id of ids) {
      const descriptor = this.skills.get(id)?.descriptor;
      if (descriptor && (!guard || guard(descriptor))) {
        return id;
      }
    }
    return undefined;
  }

  findSkillIdsForTrigger(trigger: string): ReadonlySet<SkillId> {
    return new Set(this.triggerIndex.get(normalizeTrigger(trigger)) ?? []);
  }

  listSkills(): ReadonlySet<SkillId> {
    return new Set(this.skills.keys());
  }

  listTriggers(): ReadonlySet<string> {
    return new Set(this.triggerIndex.keys());
  }

  registrations(): readonly ISkillRegistration[] {
    return [...this.skills.values()];
  }

  get size(): number {
    return this.skills.size;
  }

  /**
   * True once any definition document has been loaded into this registry.
   */
  hasLoadedDefinitions(): boolean {
    return this.loadedDefinitionVersions.length > 0;
  }

  /**
   * True once loadDefinitionFile has succeeded for this path.
   */
  hasLoadedDefinitionFile(filePath: string): boolean {
    return this.loadedFiles.has(resolve(filePath));
  }

  /**
   * Register every skill of a definition document. Nothing is registered unless
   * the whole document validates and every runner is created.
   */
  initializeFromDefinition(
    source: unknown,
    runnerFactory: RunnerFactory,
    options: IDefinitionLoadOptions = {},
  ): readonly ISkillRegistration[] {
    const document: ISkillDefinitionDocument = this.loader.parse(source);
    const replaceExisting = options.replaceExisting ?? true;

    const pending: ISkillRegistration[] = [];
    for (const entry of document.skills) {
      if (!replaceExisting && this.skills.has(entry.id)) {
        logger.debug({ skill: entry.id }, "Skill already registered, keeping existing registration");
        continue;
      }

      const builder = this.featureBuilders.get(entry.featureBuilder);
      if (!builder) {
        throw new MalformedDefinitionError(
          `skill "${entry.id}" references unknown feature builder "${entry.featureBuilder}"`,
        );
      }

      const runner = runnerFactory(entry.id);
      const descriptor = new FeatureSkillDescriptor(builder, runner, entry.inputDim ?? this.defaultInputDim);
      pending.push(createRegistration(entry.id, descriptor, entry.triggers));
    }

    this.commit(pending);
    this.loadedDefinitionVersions.push(document.version);

    const skillIds = pending.map((registration) => registration.id);
    logger.info(
      { version: document.version, totalSkills: this.skills.size, totalTriggers: this.triggerIndex.size },
      "Skill definitions loaded",
    );
    this.events.emit("definitions:loaded", { version: document.version, skillIds });

    return pending;
  }

  async loadDefinitionFile(
    filePath: string,
    runnerFactory: RunnerFactory,
    options: IDefinitionLoadOptions = {},
  ): Promise<readonly ISkillRegistration[]> {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf-8");
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new MalformedDefinitionError(`cannot read ${filePath}: ${message}`, error);
    }
    const registrations = this.initializeFromDefinition(raw, runnerFactory, options);
    this.loadedFiles.add(resolve(filePath));
    return registrations;
  }

  reset(): void {
    this.skills.clear();
    this.triggerIndex.clear();
    this.loadedDefinitionVersions = [];
    this.loadedFiles.clear();
  }

  // ── Private Helpers ──────────────────────────────────────────────────

  private commit(registrations: readonly ISkillRegistration[]): void {
    const replaced = new Set<SkillId>();

    for (const registration of registrations) {
      const existing = this.skills.get(registration.id);
      if (existing) {
        this.removeTriggers(registration.id, existing.triggers);
        replaced.add(registration.id);
      }
      this.skills.set(registration.id, registration);
      for (const trigger of registration.triggers) {
        const ids = this.triggerIndex.get(trigger) ?? [];
        if (!ids.includes(registration.id)) {
          ids.push(registration.id);
        }
        this.triggerIndex.set(trigger, ids);
      }
    }

    for (const registration of registrations) {
      const wasReplaced = replaced.has(registration.id);
      logger.debug(
        { skill: registration.id, triggers: registration.triggers, replaced: wasReplaced },
        wasReplaced ? "Skill registration replaced" : "Skill registered",
      );
      this.events.emit("skill:registered", {
        skillId: registration.id,
        triggers: registration.triggers,
        replaced: wasReplaced,
      });
    }
  }

  private removeTriggers(id: SkillId, triggers: readonly string[]): void {
    for (const trigger of triggers) {
      const remaining = (this.triggerIndex.get(trigger) ?? []).filter((candidate) => candidate !== id);
      if (remaining.length > 0) {
        this.triggerIndex.set(trigger, remaining);
      } else {
        this.triggerIndex.delete(trigger);
      }
    }
  }
}

function createRegistration<P, F, O>(
  id: SkillId,
  descriptor: ISkillDescriptor<P, F, O>,
  triggers: readonly string[],
): ISkillRegistration<P, F, O> {
  const normalized = [...new Set(triggers.map(normalizeTrigger).filter((trigger) => trigger.length > 0))];
  return Object.freeze({
    id,
    descriptor,
    runner: descriptor.runner,
    triggers: Object.freeze(normalized),
    registeredAt: new Date(),
  });
}
