/**
 * InferenceHub — lazily created, memoized inference sessions per skill,
 * a hub-wide idle switch and per-key connection flags.
 */

import { SkillNotFoundError } from "../types/errors.js";
import type { FeatureVector } from "../types/payload.js";
import type { RunnerFactory, SkillId, VectorSkillRunner } from "../types/skill.js";
import { logger } from "../utils/logger.js";
import { getBuiltInDefinitionPath } from "../utils/pathResolver.js";
import type { SkillRegistry } from "../skills/registry.js";
import { EchoBackend } from "./backends.js";
import type { BackendFactory } from "./backends.js";
import { InferenceSession } from "./session.js";
import type { IRunCounters } from "./session.js";

export interface IInferenceHubOptions {
  readonly registry: SkillRegistry;
  readonly backendFactory?: BackendFactory | undefined;
  readonly outputDim?: number | undefined;
  /** Definition document loaded once by init(). */
  readonly definitionPath?: string | undefined;
}

export interface IHubStats {
  readonly active: number;
  readonly skipped: number;
  readonly sessions: number;
}

export class InferenceHub {
  readonly registry: SkillRegistry;
  private readonly backendFactory: BackendFactory;
  private readonly outputDim: number | undefined;
  private readonly definitionPath: string;
  private readonly sessions: Map<SkillId, Promise<InferenceSession>> = new Map();
  private readonly connected: Set<string> = new Set();
  private readonly counters: IRunCounters = { active: 0, skipped: 0 };
  private initPromise: Promise<void> | undefined;
  private idle = false;

  constructor(options: IInferenceHubOptions) {
    this.registry = options.registry;
    this.backendFactory = options.backendFactory ?? (() => new EchoBackend());
    this.outputDim = options.outputDim;
    this.definitionPath = options.definitionPath ?? getBuiltInDefinitionPath();

    this.registry.events.on("skill:registered", ({ skillId, replaced }) => {
      if (replaced) this.evict(skillId);
    });
    this.registry.events.on("skill:unregistered", ({ skillId }) => {
      this.evict(skillId);
    });
  }

  /**
   * Runner factory binding each skill to its hub session.
   */
  readonly runnerFactory: RunnerFactory = (skillId: SkillId): VectorSkillRunner => ({
    runSkill: async (features: FeatureVector): Promise<FeatureVector> => {
      const session = await this.session(skillId);
      if (!session) {
        throw new SkillNotFoundError(skillId);
      }
      return session.run(features);
    },
  });

  // ── Lifecycle ────────────────────────────────────────────────────────

  /**
   * Loads the configured definition file once. Concurrent callers share the same
   * promise; a failed load may be retried. Skills registered before init, for
   * example by an applied update, keep their registrations.
   */
  init(): Promise<void> {
    if (!this.initPromise) {
      const pending = this.loadDefinitions();
      this.initPromise = pending;
      pending.catch(() => {
        if (this.initPromise === pending) {
          this.initPromise = undefined;
        }
      });
    }
    return this.initPromise;
  }

  private async loadDefinitions(): Promise<void> {
    if (this.registry.hasLoadedDefinitionFile(this.definitionPath)) {
      logger.debug({ path: this.definitionPath, skills: this.registry.size }, "Definitions already loaded, skipping");
      return;
    }
    await this.registry.loadDefinitionFile(this.definitionPath, this.runnerFactory, { replaceExisting: false });
    logger.info({ path: this.definitionPath, skills: this.registry.size }, "Inference hub initialized");
  }

  // ── Sessions ─────────────────────────────────────────────────────────

  /**
   * Resolve the cached session for a registered skill, creating it on first use.
   */
  session(skillId: SkillId): Promise<InferenceSession | undefined> {
    if (!this.registry.isRegistered(skillId)) {
      return Promise.resolve(undefined);
    }

    const cached = this.sessions.get(skillId);
    if (cached) return cached;

    const pending = this.createSession(skillId);
    this.sessions.set(skillId, pending);
    pending.catch((error: unknown) => {
      if (this.sessions.get(skillId) === pending) {
        this.sessions.delete(skillId);
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ skill: skillId, error: message }, "Session creation failed");
    });
    return pending;
  }

  hasSession(skillId: SkillId): boolean {
    return this.sessions.has(skillId);
  }

  private async createSession(skillId: SkillId): Promise<InferenceSession> {
    const backend = await this.backendFactory(skillId);
    const session = new InferenceSession(skillId, backend, this, this.counters, this.outputDim);
    logger.debug({ skill: skillId, backend: backend.name }, "Inference session created");
    this.registry.events.emit("session:created", { skillId });
    return session;
  }

  private evict(skillId: SkillId): void {
    if (this.sessions.delete(skillId)) {
      logger.debug({ skill: skillId }, "Inference session evicted");
      this.registry.events.emit("session:evicted", { skillId });
    }
  }

  // ── Idle Mode ────────────────────────────────────────────────────────

  setIdleMode(idle: boolean): void {
    if (this.idle === idle) return;
    this.idle = idle;
    logger.info({ idle }, "Idle mode changed");
    this.registry.events.emit("hub:idle", { idle });
  }

  isIdle(): boolean {
    return this.idle;
  }

  stats(): IHubStats {
    return { active: this.counters.active, skipped: this.counters.skipped, sessions: this.sessions.size };
  }

  // ── Connections ──────────────────────────────────────────────────────

  connect(key: string): boolean {
    if (!this.connected.has(key)) {
      this.connected.add(key);
      this.registry.events.emit("hub:connection", { key, connected: true });
    }
    return true;
  }

  disconnect(key: string): boolean {
    const removed = this.connected.delete(key);
    if (removed) {
      this.registry.events.emit("hub:connection", { key, connected: false });
    }
    return removed;
  }

  isConnected(key: string): boolean {
    return this.connected.has(key);
  }

  connections(): ReadonlySet<string> {
    return new Set(this.connected);
  }
}
